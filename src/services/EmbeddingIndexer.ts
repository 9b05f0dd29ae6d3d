/**
 * Embedding indexing for archived items.
 *   summary  — title + brief
 *   fulltext — translated text, falling back to the raw content
 * Only archived items are indexed; low-value and staged items never are.
 */

import type { IEmbeddingProvider } from '../providers/IEmbeddingProvider.js';
import type { IEmbeddingRepository } from '../repositories/IEmbeddingRepository.js';
import type { IIntelligenceRepository } from '../repositories/IIntelligenceRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { IntelligenceRow } from '../types/database.js';
import type { EmbeddingSpan } from '../types/models.js';
import type { RebuildIndexResponse } from '../types/api.js';

export interface IndexedSpans {
  inSummary: boolean;
  inFulltext: boolean;
}

const REBUILD_BATCH_SIZE = 32;

export function spanText(row: IntelligenceRow, span: EmbeddingSpan): string {
  if (span === 'summary') {
    return [row.title, row.brief].filter((s): s is string => Boolean(s?.trim())).join('\n');
  }
  return row.text?.trim() ? row.text : row.raw_content;
}

export function enabledSpans(spans: IndexedSpans): EmbeddingSpan[] {
  const result: EmbeddingSpan[] = [];
  if (spans.inSummary) result.push('summary');
  if (spans.inFulltext) result.push('fulltext');
  return result;
}

function archivedAt(row: IntelligenceRow): string {
  return row.appendix.time_archived ?? row.updated_at;
}

export class EmbeddingIndexer {
  constructor(
    private readonly embeddingProvider: IEmbeddingProvider,
    private readonly embeddingRepo: IEmbeddingRepository,
    private readonly intelligenceRepo: IIntelligenceRepository,
    private readonly logger: ILogProvider,
    private readonly spans: IndexedSpans
  ) {}

  /**
   * Embed a freshly archived item. Failures are logged and reported as 0
   * vectors written; the item stays archived and `rebuild` picks it up later.
   */
  async index(row: IntelligenceRow): Promise<number> {
    try {
      let written = 0;
      for (const span of enabledSpans(this.spans)) {
        written += await this.embedRows([row], span);
      }
      return written;
    } catch (err) {
      this.logger.error('Embedding failed', {
        uuid: row.uuid,
        provider: this.embeddingProvider.name,
        error: err instanceof Error ? err.message : String(err),
      });
      return 0;
    }
  }

  /**
   * Re-embed archived items missing a vector for an enabled span,
   * or every archived item when `force` is set.
   */
  async rebuild(opts?: { force?: boolean }): Promise<RebuildIndexResponse> {
    const force = opts?.force ?? false;
    const spans = enabledSpans(this.spans);
    const archived = await this.intelligenceRepo.listAll('archived');
    const touched = new Set<string>();
    let vectors = 0;

    for (const span of spans) {
      const indexed = force
        ? new Set<string>()
        : new Set(await this.embeddingRepo.listIndexed(span));
      const targets = archived.filter((row) => !indexed.has(row.uuid));

      for (let i = 0; i < targets.length; i += REBUILD_BATCH_SIZE) {
        const batch = targets.slice(i, i + REBUILD_BATCH_SIZE);
        vectors += await this.embedRows(batch, span);
        for (const row of batch) touched.add(row.uuid);
      }
    }

    this.logger.info('Embedding index rebuilt', {
      items: touched.size,
      vectors,
      spans,
      force,
    });
    return { items: touched.size, vectors, spans };
  }

  private async embedRows(rows: IntelligenceRow[], span: EmbeddingSpan): Promise<number> {
    const withText = rows
      .map((row) => ({ row, text: spanText(row, span) }))
      .filter((entry) => entry.text.trim().length > 0);
    if (withText.length === 0) return 0;

    const embeddings = await this.embeddingProvider.generateBatch(
      withText.map((entry) => entry.text),
      'document'
    );

    await Promise.all(
      withText.map((entry, i) =>
        this.embeddingRepo.upsert(entry.row.uuid, span, embeddings[i], archivedAt(entry.row))
      )
    );
    return withText.length;
  }
}
