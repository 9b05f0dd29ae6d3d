/**
 * In-memory mock for IEmbeddingRepository.
 * Simulates pgvector search with cosine similarity.
 */

import type {
  EmbeddingSearchOptions,
  IEmbeddingRepository,
} from '../../src/repositories/IEmbeddingRepository.js';
import type { ScoredEmbeddingRow } from '../../src/types/database.js';
import type { EmbeddingSpan } from '../../src/types/models.js';

interface StoredVector {
  uuid: string;
  span: EmbeddingSpan;
  embedding: number[];
  archivedAt: string;
}

export class MockEmbeddingRepository implements IEmbeddingRepository {
  private vectors = new Map<string, StoredVector>();

  async upsert(
    uuid: string,
    span: EmbeddingSpan,
    embedding: number[],
    archivedAt: string
  ): Promise<void> {
    this.vectors.set(key(uuid, span), { uuid, span, embedding: [...embedding], archivedAt });
  }

  async findVector(uuid: string, span: EmbeddingSpan): Promise<number[] | null> {
    const stored = this.vectors.get(key(uuid, span));
    return stored ? [...stored.embedding] : null;
  }

  async search(
    embedding: number[],
    options: EmbeddingSearchOptions
  ): Promise<ScoredEmbeddingRow[]> {
    return [...this.vectors.values()]
      .filter((v) => v.span === options.span && v.uuid !== options.excludeUuid)
      .map((v) => ({
        uuid: v.uuid,
        span: v.span,
        archived_at: v.archivedAt,
        similarity: cosineSimilarity(embedding, v.embedding),
      }))
      .filter((row) => row.similarity >= options.scoreThreshold)
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, options.maxResults);
  }

  async listIndexed(span: EmbeddingSpan): Promise<string[]> {
    return [...this.vectors.values()].filter((v) => v.span === span).map((v) => v.uuid);
  }

  // ── Test Helpers ──

  get size(): number {
    return this.vectors.size;
  }

  has(uuid: string, span: EmbeddingSpan): boolean {
    return this.vectors.has(key(uuid, span));
  }
}

function key(uuid: string, span: EmbeddingSpan): string {
  return `${uuid}:${span}`;
}

function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * (b[i] ?? 0);
    normA += a[i] * a[i];
    normB += (b[i] ?? 0) * (b[i] ?? 0);
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  return denom === 0 ? 0 : dot / denom;
}
