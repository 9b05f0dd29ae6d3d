/**
 * API router.
 * Routes are declared as path templates under /api/v1; `:name` segments
 * become ctx.params. Answers CORS preflight, 405 with Allow for a known
 * path under another method, and 404 otherwise.
 */

import type { Container } from '../container.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import { createIntelligenceHandlers } from './intelligences.js';
import { createQueryHandlers } from './query.js';
import { createManualRatingHandlers } from './manual-ratings.js';
import { createPortabilityHandlers } from './portability.js';
import { createPipelineHandlers } from './pipeline.js';
import { createStatsHandlers } from './stats.js';
import { json } from './respond.js';

const API_PREFIX = '/api/v1';

const CORS_HEADERS: Readonly<Record<string, string>> = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, PATCH, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type, X-Request-Id',
  'Access-Control-Max-Age': '86400',
};

export type HttpMethod = 'GET' | 'POST' | 'PATCH';

export interface Route {
  method: HttpMethod;
  path: string;
  pattern: RegExp;
  handler: Handler;
}

/** `/intelligences/:uuid` → /^\/api\/v1\/intelligences\/(?<uuid>[^/]+)\/?$/ */
function compile(path: string): RegExp {
  const source = `${API_PREFIX}${path}`
    .split('/')
    .map((segment) =>
      segment.startsWith(':')
        ? `(?<${segment.slice(1)}>[^/]+)`
        : segment.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
    )
    .join('\\/');
  return new RegExp(`^${source}\\/?$`);
}

export function createRouter(container: Container) {
  const intelligences = createIntelligenceHandlers(container);
  const query = createQueryHandlers(container);
  const ratings = createManualRatingHandlers(container);
  const portability = createPortabilityHandlers(container);
  const control = createPipelineHandlers(container);
  const stats = createStatsHandlers(container);

  const route = (method: HttpMethod, path: string, handler: Handler): Route => ({
    method,
    path,
    pattern: compile(path),
    handler,
  });

  // Literal paths precede the `:uuid` patterns they would otherwise match.
  const routes: Route[] = [
    route('POST', '/intelligences', intelligences.ingest),
    route('POST', '/intelligences/query', query.search),
    route('GET', '/intelligences/:uuid', intelligences.getByUuid),
    route('POST', '/intelligences/:uuid/retry', intelligences.retry),
    route('POST', '/manual-ratings', ratings.submit),
    route('GET', '/export', portability.exportCollection),
    route('POST', '/import', portability.importCollection),
    route('POST', '/index/rebuild', portability.rebuildIndex),
    route('GET', '/pipeline/policy', control.getPolicy),
    route('PATCH', '/pipeline/policy', control.updatePolicy),
    route('POST', '/pipeline/drain', control.drain),
    route('GET', '/statistics/score-distribution', stats.scoreDistribution),
    route('GET', '/statistics/distribution/:period', stats.periodCounts),
    route('GET', '/statistics/summary', stats.summary),
  ];

  const handle: Handler = async (req: Request, ctx: HandlerContext) => {
    if (req.method === 'OPTIONS') {
      return new Response(null, { status: 204, headers: CORS_HEADERS });
    }

    const { pathname } = new URL(req.url);
    const allowed = new Set<string>();

    for (const r of routes) {
      const match = r.pattern.exec(pathname);
      if (!match) continue;
      if (r.method !== req.method) {
        allowed.add(r.method);
        continue;
      }
      const params = { ...ctx.params, ...decodeParams(match.groups) };
      return withCors(await r.handler(req, { ...ctx, params }));
    }

    if (allowed.size > 0) {
      return withCors(
        json(
          { error: { code: 'METHOD_NOT_ALLOWED', message: `Method ${req.method} not allowed` } },
          405
        ),
        { Allow: [...allowed].join(', ') }
      );
    }

    return withCors(
      json(
        { error: { code: 'NOT_FOUND', message: `No route matches ${req.method} ${pathname}` } },
        404
      )
    );
  };

  return { handle, routes };
}

function decodeParams(groups: Record<string, string> | undefined): Record<string, string> {
  const params: Record<string, string> = {};
  for (const [key, value] of Object.entries(groups ?? {})) {
    try {
      params[key] = decodeURIComponent(value);
    } catch {
      // Malformed escapes pass through undecoded.
      params[key] = value;
    }
  }
  return params;
}

function withCors(response: Response, extra?: Record<string, string>): Response {
  const headers = new Headers(response.headers);
  for (const [key, value] of Object.entries({ ...CORS_HEADERS, ...extra })) {
    headers.set(key, value);
  }
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
