/**
 * Query endpoint.
 * POST /api/v1/intelligences/query — filter, vector_text or vector_similar search
 */

import { z } from 'zod';
import { pipeline, validateBody } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { json } from './respond.js';

/** Envelope check only; each search mode validates its own fields. */
const queryEnvelopeSchema = z
  .object({
    searchMode: z.enum(['filter', 'vector_text', 'vector_similar']).optional(),
  })
  .passthrough();

export function createQueryHandlers(container: Container) {
  const search: Handler = pipeline(
    container.logging,
    container.errors,
    validateBody(queryEnvelopeSchema)
  )(async (req) => {
    const body: unknown = await req.json();
    const result = await container.queryService.query(body);
    return json(result);
  });

  return { search };
}
