/**
 * Express host for the Request/Response router.
 * Express reads the body and enforces the size cap; this module maps its
 * req/res onto the fetch Request/Response the router speaks.
 */

import { randomUUID } from 'node:crypto';
import type { IncomingHttpHeaders } from 'node:http';
import express, { type ErrorRequestHandler, type Express } from 'express';
import type { Handler } from './middleware/pipeline.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import { httpStatusOf } from './errors.js';

/** Imports carry whole collections; everything else is far smaller. */
const MAX_BODY = '50mb';

/** The parts of an Express request the bridge reads. */
export interface IncomingRequest {
  method: string;
  originalUrl: string;
  headers: IncomingHttpHeaders;
  body: unknown;
}

/** The parts of an Express response the bridge writes. */
export interface OutgoingResponse {
  status(code: number): unknown;
  setHeader(name: string, value: string): unknown;
  send(body: Buffer): unknown;
}

export function createApp(handle: Handler, logger: ILogProvider): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(express.raw({ type: () => true, limit: MAX_BODY }));

  app.use(async (req, res, next) => {
    try {
      const requestId = requestIdOf(req.headers);
      const response = await handle(toRequest(req), { requestId, params: {} });
      res.setHeader('X-Request-Id', requestId);
      await sendResponse(res, response);
    } catch (err) {
      next(err);
    }
  });

  const onError: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
    if (httpStatusOf(err) === 413) {
      res.status(413).json({
        error: { code: 'PAYLOAD_TOO_LARGE', message: 'Request body too large' },
      });
      return;
    }
    logger.error('HTTP host error', {
      error: err instanceof Error ? err.message : String(err),
    });
    if (res.headersSent) {
      res.end();
      return;
    }
    res.status(500).json({
      error: { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' },
    });
  };
  app.use(onError);

  return app;
}

export function requestIdOf(headers: IncomingHttpHeaders): string {
  const header = headers['x-request-id'];
  return typeof header === 'string' && header ? header : randomUUID();
}

export function toRequest(req: IncomingRequest): Request {
  const url = `http://${req.headers.host ?? 'localhost'}${req.originalUrl}`;
  const headers = new Headers();
  for (const [key, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    headers.set(key, Array.isArray(value) ? value.join(', ') : value);
  }

  // express.raw leaves `{}` when there is no body.
  const body =
    req.method === 'GET' || req.method === 'HEAD' || !Buffer.isBuffer(req.body)
      ? undefined
      : new Uint8Array(req.body);
  return new Request(url, { method: req.method, headers, body });
}

export async function sendResponse(res: OutgoingResponse, response: Response): Promise<void> {
  res.status(response.status);
  response.headers.forEach((value, key) => {
    res.setHeader(key, value);
  });
  res.send(Buffer.from(await response.arrayBuffer()));
}
