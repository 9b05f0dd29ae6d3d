/**
 * Database row types — mirror the Supabase table schemas in supabase/migrations.
 * These rows are also the portable document format for bulk import/export.
 * Column names use snake_case to match PostgreSQL conventions.
 */

import type { EmbeddingSpan, IntelligenceState, RatingMap } from './models.js';

// ── Intelligence partitions ──

/** System-managed metadata stored as jsonb alongside every item. */
export interface AppendixRow {
  time_got?: string;
  time_published?: string | null;
  time_archived?: string;
  max_rate_class?: string;
  max_rate_score?: number;
  total_score?: number;
  ai_provider?: string;
  ai_model?: string;
  prompt_version?: string;
  score_threshold?: number;
  manual_rating?: RatingMap;
  manual_rating_updated_at?: string;
}

/**
 * One item in any of the three partitions
 * (intelligence_cached, intelligence_archived, intelligence_low_value).
 */
export interface IntelligenceRow {
  uuid: string;
  fingerprint: string;
  informant: string;
  pub_time: string | null;
  raw_title: string | null;
  raw_content: string;
  title: string | null;
  brief: string | null;
  text: string | null;
  times: string[];
  locations: string[];
  people: string[];
  organizations: string[];
  geography: string | null;
  impact: string | null;
  reason: string | null;
  tips: string | null;
  taxonomy: string | null;
  sub_category: string[];
  rate: RatingMap;
  state: IntelligenceState;
  attempts: number;
  lease_token: string | null;
  lease_expires_at: string | null;
  next_attempt_at: string | null;
  last_error: string | null;
  appendix: AppendixRow;
  created_at: string;
  updated_at: string;
}

export type NewIntelligenceRow = Omit<IntelligenceRow, 'created_at' | 'updated_at'>;

// ── Embeddings ──

export interface ScoredEmbeddingRow {
  uuid: string;
  span: EmbeddingSpan;
  archived_at: string;
  similarity: number;
}
