/**
 * Error handler middleware.
 * Catches errors thrown by handlers and maps them to structured JSON responses.
 * AppError subclasses get their status code and details; unknown errors become 500
 * and are logged with their stack, never returned to the client.
 */

import { AppError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { Handler, Middleware } from './pipeline.js';
import type { ApiErrorResponse } from '../types/api.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export function createErrorHandler(logProvider: ILogProvider): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      try {
        return await next(req, ctx);
      } catch (err) {
        if (err instanceof AppError) {
          const body: ApiErrorResponse = {
            error: {
              code: err.code,
              message: err.message,
              ...(err.details && { details: err.details }),
            },
          };

          return new Response(JSON.stringify(body), {
            status: err.statusCode,
            headers: JSON_HEADERS,
          });
        }

        logProvider.error('Unhandled error', {
          requestId: ctx.requestId,
          error: err instanceof Error ? err.message : String(err),
          stack: err instanceof Error ? err.stack : undefined,
        });

        const body: ApiErrorResponse = {
          error: {
            code: 'INTERNAL_ERROR',
            message: 'An unexpected error occurred',
          },
        };

        return new Response(JSON.stringify(body), {
          status: 500,
          headers: JSON_HEADERS,
        });
      }
    };
  };
}
