/**
 * Pipeline control endpoints.
 * GET   /api/v1/pipeline/policy — Current policy for new claims
 * PATCH /api/v1/pipeline/policy — Update it; items already claimed are unaffected
 * POST  /api/v1/pipeline/drain  — Process until nothing is claimable
 */

import { pipeline, validateBody } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { policyPatchSchema } from '../schemas.js';
import { json } from './respond.js';

export function createPipelineHandlers(container: Container) {
  const getPolicy: Handler = pipeline(container.logging, container.errors)(async () =>
    json(container.workerPool.currentPolicy)
  );

  const updatePolicy: Handler = pipeline(
    container.logging,
    container.errors,
    validateBody(policyPatchSchema)
  )(async (req) => {
    const patch = policyPatchSchema.parse(await req.json());
    return json(container.workerPool.updatePolicy(patch));
  });

  const drain: Handler = pipeline(container.logging, container.errors)(async () =>
    json(await container.workerPool.drain())
  );

  return { getPolicy, updatePolicy, drain };
}
