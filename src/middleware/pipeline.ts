/**
 * Handler and middleware types, and their composition.
 */

export interface HandlerContext {
  /** Correlates the log lines of one request. */
  requestId: string;
  /** Named groups captured by the router, e.g. { uuid }. */
  params: Record<string, string>;
}

export type Handler = (req: Request, ctx: HandlerContext) => Promise<Response>;
export type Middleware = (next: Handler) => Handler;

/**
 * `pipeline(a, b)(handler)` is `a(b(handler))`: the first middleware
 * sees the request first and the response last.
 */
export function pipeline(...middlewares: Middleware[]): (handler: Handler) => Handler {
  return (handler) => middlewares.reduceRight<Handler>((next, mw) => mw(next), handler);
}
