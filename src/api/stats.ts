/**
 * Statistics endpoints. Ranges are ISO-8601 `start`/`end` query parameters.
 * GET /api/v1/statistics/score-distribution?start=&end=  — both required
 * GET /api/v1/statistics/distribution/:period            — hour | day | week | month
 * GET /api/v1/statistics/summary                         — total and top informants
 */

import { pipeline } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { searchParams } from './respond.js';

function cached(body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: {
      'Content-Type': 'application/json',
      'Cache-Control': 'public, max-age=60',
    },
  });
}

export function createStatsHandlers(container: Container) {
  const scoreDistribution: Handler = pipeline(container.logging, container.errors)(async (req) => {
    const params = searchParams(req, ['start', 'end']);
    return cached(await container.statisticsService.scoreDistribution(params));
  });

  const periodCounts: Handler = pipeline(container.logging, container.errors)(async (req, ctx) => {
    const params = searchParams(req, ['start', 'end']);
    return cached(await container.statisticsService.countsByPeriod(ctx.params.period, params));
  });

  const summary: Handler = pipeline(container.logging, container.errors)(async (req) => {
    const params = searchParams(req, ['start', 'end']);
    return cached(await container.statisticsService.summary(params));
  });

  return { scoreDistribution, periodCounts, summary };
}
