/**
 * Domain models — core entities as the pipeline understands them.
 * Decoupled from both API shapes and database row shapes.
 */

// ── Lifecycle ──

/** Per-item lifecycle state. `archived` and `low_value` are terminal. */
export type IntelligenceState =
  | 'pending'
  | 'analyzing'
  | 'failed'
  | 'archived'
  | 'low_value';

/** Named storage partitions. */
export type Partition = 'cached' | 'archived' | 'low_value';

export type TerminalPartition = Exclude<Partition, 'cached'>;

export const PARTITIONS: readonly Partition[] = ['cached', 'archived', 'low_value'];

/** Which text an embedding vector was computed from. */
export type EmbeddingSpan = 'summary' | 'fulltext';

/** Rating dimension → score in [0, 10]. */
export type RatingMap = Record<string, number>;

// ── Ingestion ──

/** A record as supplied by the feed ingestion gateway. */
export interface FeedRecord {
  sourceUrl: string;
  title?: string;
  /** ISO-8601 publish time. */
  publishedAt: string;
  rawContent: string;
}

// ── Classification ──

export interface ClassificationEntities {
  times: string[];
  locations: string[];
  people: string[];
  organizations: string[];
  geography: string | null;
}

/** Validated structured output of the AI classifier. */
export interface ClassificationResult {
  title: string;
  brief: string;
  text: string;
  entities: ClassificationEntities;
  taxonomy: string;
  subCategories: string[];
  rate: RatingMap;
  impact: string;
  reason: string;
  tips: string;
  /** True when the classifier judged the item to carry no intelligence value. */
  nonIntelligence: boolean;
}

export interface ClassificationProvenance {
  provider: string;
  model: string;
  promptVersion: string;
}

// ── Pipeline policy ──

/**
 * Settings captured when an item is claimed.
 * Immutable per claim: changing the pool's policy never affects in-flight items.
 */
export interface PipelinePolicy {
  readonly scoreThreshold: number;
  readonly maxAttempts: number;
  readonly leaseMs: number;
  readonly aiTimeoutMs: number;
  readonly retryBackoffMs: number;
}
