/**
 * Access log middleware: one event per request, `METHOD /path STATUS`,
 * with method, path, status, durationMs and requestId as fields.
 * 5xx and thrown errors log at error, 4xx at warn, everything else at info.
 */

import type { ILogProvider, LogLevel } from '../providers/ILogProvider.js';
import type { Handler, Middleware } from './pipeline.js';

function levelFor(status: number): LogLevel {
  return status >= 500 ? 'error' : status >= 400 ? 'warn' : 'info';
}

export function createLoggingMiddleware(logger: ILogProvider): Middleware {
  return (next: Handler): Handler => async (req, ctx) => {
    const { pathname } = new URL(req.url);
    const startedAt = performance.now();

    const record = (status: number, extra?: Record<string, unknown>) =>
      logger.log({
        level: extra ? 'error' : levelFor(status),
        message: `${req.method} ${pathname} ${status}`,
        fields: {
          method: req.method,
          path: pathname,
          status,
          durationMs: Math.round(performance.now() - startedAt),
          requestId: ctx.requestId,
          ...extra,
        },
      });

    let response: Response;
    try {
      response = await next(req, ctx);
    } catch (err) {
      record(500, { error: err instanceof Error ? err.message : String(err) });
      throw err;
    }
    record(response.status);
    return response;
  };
}
