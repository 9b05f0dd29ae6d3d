/**
 * API types — shapes for request/response payloads.
 * Decoupled from domain models so the API can evolve independently.
 */

import type {
  EmbeddingSpan,
  IntelligenceState,
  Partition,
  RatingMap,
} from './models.js';

// ── Ingestion ──

export type IngestResult =
  | { status: 'queued'; uuid: string; fingerprint: string }
  | { status: 'duplicate'; fingerprint: string }
  | { status: 'rejected'; error: string };

export interface IngestBatchResponse {
  queued: number;
  duplicates: number;
  rejected: number;
  results: IngestResult[];
}

// ── Intelligence views ──

export interface AppendixResponse {
  timeGot: string | null;
  timePublished: string | null;
  timeArchived: string | null;
  maxRateClass: string | null;
  maxRateScore: number | null;
  totalScore: number | null;
  aiProvider: string | null;
  aiModel: string | null;
  promptVersion: string | null;
  scoreThreshold: number | null;
  manualRating: RatingMap;
  manualRatingUpdatedAt: string | null;
  /** Similarity to the query. Computed per search, never persisted. */
  vectorScore?: number;
}

export interface IntelligenceResponse {
  uuid: string;
  informant: string;
  pubTime: string | null;
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
  subCategories: string[];
  rate: RatingMap;
  state: IntelligenceState;
  partition: Partition;
  attempts: number;
  lastError: string | null;
  appendix: AppendixResponse;
  /** Only present on single-item lookups. */
  rawContent?: string;
}

// ── Query ──

export interface QueryResponse {
  results: IntelligenceResponse[];
  total: number;
}

// ── Manual rating ──

export interface ManualRatingResponse {
  uuid: string;
  manualRating: RatingMap;
  updatedAt: string;
}

// ── Portability ──

export type ExportFormat = 'jsonl' | 'json';

export interface ImportResponse {
  imported: number;
  duplicates: number;
  failed: number;
  errors: string[];
}

// ── Operations ──

export interface RebuildIndexResponse {
  items: number;
  vectors: number;
  spans: EmbeddingSpan[];
}

// ── Statistics ──

export interface StatisticsTimeRange {
  start: string;
  end: string;
}

export interface ScoreDistributionResponse {
  timeRange: StatisticsTimeRange;
  /** Item count per max rating, keyed by the rating as text. */
  distribution: Record<string, number>;
  chartData: Array<{ score: number; count: number }>;
  totalRecords: number;
}

export interface PeriodCountsResponse {
  period: 'hour' | 'day' | 'week' | 'month';
  timeRange: StatisticsTimeRange;
  /** One entry per period holding at least one item, oldest first. */
  buckets: Array<{ start: string; count: number }>;
  total: number;
}

export interface StatisticsSummaryResponse {
  totalCount: number;
  timeRange: StatisticsTimeRange;
  topInformants: Array<{ informant: string; count: number }>;
}

// ── Errors ──

export interface ApiErrorResponse {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}
