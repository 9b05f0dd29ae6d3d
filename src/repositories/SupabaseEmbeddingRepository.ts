/**
 * Supabase implementation of IEmbeddingRepository.
 * Vectors live in intelligence_embeddings; search runs through the
 * match_intelligence_embeddings RPC (pgvector cosine distance).
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type {
  EmbeddingSearchOptions,
  IEmbeddingRepository,
} from './IEmbeddingRepository.js';
import type { ScoredEmbeddingRow } from '../types/database.js';
import type { EmbeddingSpan } from '../types/models.js';

export class SupabaseEmbeddingRepository implements IEmbeddingRepository {
  constructor(private readonly db: SupabaseClient) {}

  async upsert(
    uuid: string,
    span: EmbeddingSpan,
    embedding: number[],
    archivedAt: string
  ): Promise<void> {
    const { error } = await this.db.from('intelligence_embeddings').upsert(
      {
        uuid,
        span,
        embedding: JSON.stringify(embedding),
        archived_at: archivedAt,
      },
      { onConflict: 'uuid,span' }
    );

    if (error) throw new Error(`Failed to store embedding: ${error.message}`);
  }

  async findVector(uuid: string, span: EmbeddingSpan): Promise<number[] | null> {
    const { data, error } = await this.db
      .from('intelligence_embeddings')
      .select('embedding')
      .eq('uuid', uuid)
      .eq('span', span)
      .maybeSingle();

    if (error) throw new Error(`Failed to find embedding: ${error.message}`);
    if (!data) return null;
    return parseVector(data.embedding);
  }

  async search(
    embedding: number[],
    options: EmbeddingSearchOptions
  ): Promise<ScoredEmbeddingRow[]> {
    const { data, error } = await this.db.rpc('match_intelligence_embeddings', {
      query_embedding: JSON.stringify(embedding),
      p_span: options.span,
      p_score_threshold: options.scoreThreshold,
      p_match_count: options.maxResults,
      p_exclude_uuid: options.excludeUuid ?? null,
    });

    if (error) throw new Error(`Failed to search embeddings: ${error.message}`);
    return (data ?? []) as ScoredEmbeddingRow[];
  }

  async listIndexed(span: EmbeddingSpan): Promise<string[]> {
    const pageSize = 1000;
    const uuids: string[] = [];

    for (let offset = 0; ; offset += pageSize) {
      const { data, error } = await this.db
        .from('intelligence_embeddings')
        .select('uuid')
        .eq('span', span)
        .order('uuid', { ascending: true })
        .range(offset, offset + pageSize - 1);

      if (error) throw new Error(`Failed to list embeddings: ${error.message}`);
      const page = (data ?? []).map((row: { uuid: string }) => row.uuid);
      uuids.push(...page);
      if (page.length < pageSize) break;
    }

    return uuids;
  }
}

/** pgvector values come back as '[0.1,0.2,...]' text. */
function parseVector(value: unknown): number[] | null {
  const parsed: unknown = typeof value === 'string' ? JSON.parse(value) : value;
  if (!Array.isArray(parsed)) return null;
  return parsed.filter((n): n is number => typeof n === 'number');
}
