/**
 * Embedding vector storage and similarity search.
 */

import type { ScoredEmbeddingRow } from '../types/database.js';
import type { EmbeddingSpan } from '../types/models.js';

export interface EmbeddingSearchOptions {
  span: EmbeddingSpan;
  maxResults: number;
  /** Minimum cosine similarity. */
  scoreThreshold: number;
  /** Left out of the results, e.g. the reference item of a similarity search. */
  excludeUuid?: string;
}

export interface IEmbeddingRepository {
  /** Insert or replace the vector for (uuid, span). */
  upsert(
    uuid: string,
    span: EmbeddingSpan,
    embedding: number[],
    archivedAt: string
  ): Promise<void>;

  findVector(uuid: string, span: EmbeddingSpan): Promise<number[] | null>;

  /** Highest similarity first. */
  search(
    embedding: number[],
    options: EmbeddingSearchOptions
  ): Promise<ScoredEmbeddingRow[]>;

  /** UUIDs that already have a vector for the span. */
  listIndexed(span: EmbeddingSpan): Promise<string[]>;
}
