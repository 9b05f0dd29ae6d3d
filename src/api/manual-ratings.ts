/**
 * Manual rating endpoint.
 * POST /api/v1/manual-ratings — { uuid, ratings: { dimension: score }, timestamp? }
 */

import { pipeline, validateBody } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { manualRatingSchema } from '../schemas.js';
import { json } from './respond.js';

export function createManualRatingHandlers(container: Container) {
  const submit: Handler = pipeline(
    container.logging,
    container.errors,
    validateBody(manualRatingSchema)
  )(async (req) => {
    const body: unknown = await req.json();
    const result = await container.manualRatingService.submit(body);
    return json(result);
  });

  return { submit };
}
