/**
 * Bulk import/export and index maintenance endpoints.
 * GET  /api/v1/export?collection=&format=&start=&end=
 * POST /api/v1/import?collection=&format=   — body is JSON Lines or a JSON array
 * POST /api/v1/index/rebuild?force=true     — re-embed archived items
 */

import { pipeline } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { json, searchParams } from './respond.js';

export function createPortabilityHandlers(container: Container) {
  const exportCollection: Handler = pipeline(container.logging, container.errors)(async (req) => {
    const params = searchParams(req, ['collection', 'format', 'start', 'end']);
    const result = await container.portabilityService.export(params);
    const extension = result.contentType === 'application/json' ? 'json' : 'jsonl';

    return new Response(result.body, {
      status: 200,
      headers: {
        'Content-Type': result.contentType,
        'Content-Disposition': `attachment; filename="${params.collection}.${extension}"`,
        'X-Total-Count': String(result.count),
      },
    });
  });

  const importCollection: Handler = pipeline(container.logging, container.errors)(async (req) => {
    const params = searchParams(req, ['collection', 'format']);
    const result = await container.portabilityService.import(params, await req.text());
    return json(result);
  });

  const rebuildIndex: Handler = pipeline(container.logging, container.errors)(async (req) => {
    const force = new URL(req.url).searchParams.get('force') === 'true';
    const result = await container.embeddingIndexer.rebuild({ force });
    return json(result);
  });

  return { exportCollection, importCollection, rebuildIndex };
}
