/**
 * Intelligence data access interface.
 * One state-tagged repository over the three partitions:
 *   cached    — pending / analyzing / failed
 *   archived  — classified, max rating >= threshold
 *   low_value — classified, max rating < threshold
 * Every state change goes through a conditional primitive below.
 */

import type {
  IntelligenceRow,
  NewIntelligenceRow,
} from '../types/database.js';
import type { Partition, TerminalPartition } from '../types/models.js';
import type { PaginationOptions, TimeRange } from '../types/common.js';

export interface ClaimOptions {
  leaseToken: string;
  /** ISO-8601 */
  leaseExpiresAt: string;
  /** ISO-8601 */
  now: string;
  maxAttempts: number;
}

export interface IntelligenceFilter {
  /** Publish-time range. */
  period?: TimeRange;
  /** Match any listed location. */
  locations?: string[];
  /** Match any listed person. */
  people?: string[];
  /** Match any listed organization. */
  organizations?: string[];
  /** Case-insensitive match on title, brief or text. */
  keywords?: string;
  /** Minimum appendix max_rate_score. */
  minScore?: number;
}

/** What archive statistics are grouped by. Periods are UTC; weeks start on Monday. */
export type StatisticsGrouping = 'score' | 'informant' | 'hour' | 'day' | 'week' | 'month';

export interface CountBucket {
  /**
   * The max rating as text for 'score', the informant for 'informant',
   * the period's ISO-8601 start otherwise.
   */
  key: string;
  count: number;
}

export interface LocatedIntelligence {
  partition: Partition;
  row: IntelligenceRow;
}

export interface IIntelligenceRepository {
  /** Create a new item in `cached` with state pending. */
  insertPending(row: NewIntelligenceRow): Promise<IntelligenceRow>;

  /** Look an item up across all partitions. */
  findByUuid(uuid: string): Promise<LocatedIntelligence | null>;

  findManyInPartition(partition: Partition, uuids: string[]): Promise<IntelligenceRow[]>;

  /**
   * Conditional pending/failed → analyzing.
   * Eligible: pending, or failed with attempts < maxAttempts and next_attempt_at <= now.
   * Increments attempts and records the lease. Returns null when the item is not eligible,
   * including when another caller claimed it first.
   */
  claim(uuid: string, options: ClaimOptions): Promise<IntelligenceRow | null>;

  /** Items a worker may try to claim, oldest first. */
  findClaimable(now: string, maxAttempts: number, limit: number): Promise<IntelligenceRow[]>;

  /**
   * Conditional analyzing → failed, for the lease holder only.
   * Throws StorageError when the lease is not held.
   */
  markFailed(
    uuid: string,
    leaseToken: string,
    error: string,
    nextAttemptAt: string
  ): Promise<IntelligenceRow>;

  /**
   * Atomically move a classified item out of `cached` into a terminal partition,
   * for the lease holder only. Throws StorageError when the lease is not held.
   */
  finalize(
    uuid: string,
    leaseToken: string,
    partition: TerminalPartition,
    row: IntelligenceRow
  ): Promise<IntelligenceRow>;

  /** Analyzing items whose lease expired go back to failed. Returns the count. */
  releaseExpiredLeases(now: string): Promise<number>;

  /** Operator retry: failed → pending with attempts reset. Null when not failed. */
  resetForRetry(uuid: string): Promise<IntelligenceRow | null>;

  /**
   * Merge manual ratings into an archived item's appendix, overwriting per dimension.
   * Null when the item is not archived.
   */
  mergeManualRating(
    uuid: string,
    ratings: Record<string, number>,
    updatedAt: string
  ): Promise<IntelligenceRow | null>;

  /** Filtered, paginated listing, newest publish time first. */
  query(
    partition: Partition,
    filter: IntelligenceFilter,
    pagination: PaginationOptions
  ): Promise<{ rows: IntelligenceRow[]; total: number }>;

  /**
   * All rows of a partition in time order, for export and re-indexing.
   * The range applies to publish time for `cached` and archive time otherwise.
   */
  listAll(partition: Partition, range?: TimeRange): Promise<IntelligenceRow[]>;

  /** Write an imported row as-is. Fingerprint registration is the caller's job. */
  importRow(partition: Partition, row: IntelligenceRow): Promise<void>;

  count(partition: Partition): Promise<number>;

  /** Archived items counted by one grouping, over archive time, in key order. */
  countArchived(range: TimeRange, groupBy: StatisticsGrouping): Promise<CountBucket[]>;
}
