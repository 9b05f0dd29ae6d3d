/**
 * Intelligence endpoints.
 * POST /api/v1/intelligences             — Ingest one feed record or an array of them
 * GET  /api/v1/intelligences/:uuid       — Get one item from any partition
 * POST /api/v1/intelligences/:uuid/retry — Operator retry of a failed item
 */

import { pipeline, readJson } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { json } from './respond.js';

export function createIntelligenceHandlers(container: Container) {
  const ingest: Handler = pipeline(container.logging, container.errors)(async (req) => {
    const body = await readJson(req);

    if (Array.isArray(body)) {
      const result = await container.ingestionService.ingestBatch(body);
      return json(result, 200);
    }

    const result = await container.ingestionService.ingest(body);
    return json({ status: 'queued', ...result }, 201);
  });

  const getByUuid: Handler = pipeline(container.logging, container.errors)(async (_req, ctx) => {
    const result = await container.queryService.getByUuid(ctx.params.uuid);
    return json(result);
  });

  const retry: Handler = pipeline(container.logging, container.errors)(async (_req, ctx) => {
    const row = await container.stagingService.retry(ctx.params.uuid);
    return json({ uuid: row.uuid, state: row.state, attempts: row.attempts });
  });

  return { ingest, getByUuid, retry };
}
