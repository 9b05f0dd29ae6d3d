/**
 * Body validation middleware.
 * Parses the JSON body and checks it against a zod schema.
 * Returns 400 with one "path: message" entry per issue when validation fails;
 * otherwise the handler receives the request with the parsed body, defaults applied.
 */

import type { z } from 'zod';
import { ValidationError } from '../errors.js';
import { describeIssues } from '../schemas.js';
import type { Handler, Middleware } from './pipeline.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

/** Parse a request body as JSON. Throws ValidationError on malformed input. */
export async function readJson(req: Request): Promise<unknown> {
  const text = await req.text();
  try {
    return JSON.parse(text);
  } catch {
    throw new ValidationError('Request body must be valid JSON');
  }
}

export function validateBody(schema: z.ZodTypeAny): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      let body: unknown;
      try {
        body = await readJson(req);
      } catch (err) {
        if (err instanceof ValidationError) return errorResponse(err.message);
        throw err;
      }

      if (typeof body !== 'object' || body === null || Array.isArray(body)) {
        return errorResponse('Request body must be a JSON object');
      }

      const parsed = schema.safeParse(body);
      if (!parsed.success) {
        const issues = describeIssues(parsed.error);
        return errorResponse(issues.join('; '), { issues });
      }

      const validated = new Request(req.url, {
        method: req.method,
        headers: req.headers,
        body: JSON.stringify(parsed.data),
      });
      return next(validated, ctx);
    };
  };
}

function errorResponse(message: string, details?: Record<string, unknown>): Response {
  return new Response(
    JSON.stringify({
      error: {
        code: 'INVALID_REQUEST',
        message,
        ...(details && { details }),
      },
    }),
    { status: 400, headers: JSON_HEADERS }
  );
}
