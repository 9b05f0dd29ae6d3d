/**
 * Vector similarity search over archived items.
 * Text-seeded queries embed the query text; reference-seeded queries reuse the
 * reference item's stored vectors. Results from several spans are merged by
 * UUID, keeping the highest score.
 */

import type { IEmbeddingProvider } from '../providers/IEmbeddingProvider.js';
import type { IEmbeddingRepository } from '../repositories/IEmbeddingRepository.js';
import type { IIntelligenceRepository } from '../repositories/IIntelligenceRepository.js';
import type { QueryResponse } from '../types/api.js';
import type { ScoredEmbeddingRow } from '../types/database.js';
import type { EmbeddingSpan } from '../types/models.js';
import { NotFoundError, ValidationError } from '../errors.js';
import {
  describeIssues,
  referenceSimilaritySchema,
  textSimilaritySchema,
  type SimilarityOptions,
} from '../schemas.js';
import { enabledSpans, spanText } from './EmbeddingIndexer.js';
import { toIntelligenceResponse } from './intelligence-mapper.js';

/** Candidates fetched per span before merging and paging. */
const MAX_CANDIDATES = 1000;

export class SimilaritySearchService {
  constructor(
    private readonly intelligenceRepo: IIntelligenceRepository,
    private readonly embeddingRepo: IEmbeddingRepository,
    private readonly embeddingProvider: IEmbeddingProvider
  ) {}

  async searchByText(input: unknown): Promise<QueryResponse> {
    const parsed = textSimilaritySchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError('Invalid similarity query', { issues: describeIssues(parsed.error) });
    }
    const query = parsed.data;
    const spans = this.requireSpans(query);

    const embedding = await this.embeddingProvider.generate(query.text, 'query');
    const vectors = new Map<EmbeddingSpan, number[]>(spans.map((span) => [span, embedding]));
    return this.search(vectors, query);
  }

  async searchByReference(input: unknown): Promise<QueryResponse> {
    const parsed = referenceSimilaritySchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError('Invalid similarity query', { issues: describeIssues(parsed.error) });
    }
    const query = parsed.data;
    const spans = this.requireSpans(query);

    const located = await this.intelligenceRepo.findByUuid(query.reference);
    if (!located) {
      throw new NotFoundError(`Reference intelligence "${query.reference}" not found`);
    }

    const vectors = new Map<EmbeddingSpan, number[]>();
    for (const span of spans) {
      const stored = await this.embeddingRepo.findVector(query.reference, span);
      if (stored) {
        vectors.set(span, stored);
        continue;
      }
      // Not indexed (not archived yet, or indexing failed): embed its text now.
      const text = spanText(located.row, span);
      if (text.trim()) {
        vectors.set(span, await this.embeddingProvider.generate(text, 'document'));
      }
    }

    return this.search(vectors, query, query.reference);
  }

  // ── Private ──

  private requireSpans(options: SimilarityOptions): EmbeddingSpan[] {
    const spans = enabledSpans(options);
    if (spans.length === 0) {
      throw new ValidationError('At least one of inSummary or inFulltext must be true');
    }
    return spans;
  }

  private async search(
    vectors: Map<EmbeddingSpan, number[]>,
    options: SimilarityOptions,
    excludeUuid?: string
  ): Promise<QueryResponse> {
    const maxResults = Math.max(MAX_CANDIDATES, options.page * options.perPage);

    const perSpan = await Promise.all(
      [...vectors].map(([span, embedding]) =>
        this.embeddingRepo.search(embedding, {
          span,
          maxResults,
          scoreThreshold: options.scoreThreshold,
          excludeUuid,
        })
      )
    );

    const ranked = mergeBySimilarity(perSpan.flat()).filter(
      (hit) => hit.uuid !== excludeUuid && hit.similarity >= options.scoreThreshold
    );
    const start = (options.page - 1) * options.perPage;
    const pageHits = ranked.slice(start, start + options.perPage);

    const rows = await this.intelligenceRepo.findManyInPartition(
      'archived',
      pageHits.map((hit) => hit.uuid)
    );
    const byUuid = new Map(rows.map((row) => [row.uuid, row]));

    const results = pageHits.flatMap((hit) => {
      const row = byUuid.get(hit.uuid);
      return row
        ? [toIntelligenceResponse(row, 'archived', { vectorScore: hit.similarity })]
        : [];
    });

    return { results, total: ranked.length };
  }
}

/**
 * One hit per UUID with its best score, highest first;
 * ties go to the most recently archived item.
 */
export function mergeBySimilarity(hits: ScoredEmbeddingRow[]): ScoredEmbeddingRow[] {
  const best = new Map<string, ScoredEmbeddingRow>();
  for (const hit of hits) {
    const current = best.get(hit.uuid);
    if (!current || hit.similarity > current.similarity) best.set(hit.uuid, hit);
  }

  return [...best.values()].sort(
    (a, b) =>
      b.similarity - a.similarity ||
      Date.parse(b.archived_at) - Date.parse(a.archived_at)
  );
}
