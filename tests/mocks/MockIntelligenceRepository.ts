/**
 * In-memory mock for IIntelligenceRepository.
 * One Map per partition. Each conditional write checks and updates without
 * an await in between, mirroring the single-statement updates in SQL.
 */

import type {
  ClaimOptions,
  CountBucket,
  IIntelligenceRepository,
  IntelligenceFilter,
  LocatedIntelligence,
  StatisticsGrouping,
} from '../../src/repositories/IIntelligenceRepository.js';
import type {
  IntelligenceRow,
  NewIntelligenceRow,
} from '../../src/types/database.js';
import {
  PARTITIONS,
  type Partition,
  type TerminalPartition,
} from '../../src/types/models.js';
import type { PaginationOptions, TimeRange } from '../../src/types/common.js';
import { StorageError } from '../../src/errors.js';

export class MockIntelligenceRepository implements IIntelligenceRepository {
  private partitions: Record<Partition, Map<string, IntelligenceRow>> = {
    cached: new Map(),
    archived: new Map(),
    low_value: new Map(),
  };

  /** When set, the next insertPending rejects with this error. */
  public failNextInsert: Error | null = null;
  public claimCalls = 0;

  async insertPending(row: NewIntelligenceRow): Promise<IntelligenceRow> {
    if (this.failNextInsert) {
      const err = this.failNextInsert;
      this.failNextInsert = null;
      throw err;
    }
    const now = new Date().toISOString();
    const full: IntelligenceRow = { ...row, created_at: now, updated_at: now };
    this.partitions.cached.set(row.uuid, structuredClone(full));
    return full;
  }

  async findByUuid(uuid: string): Promise<LocatedIntelligence | null> {
    for (const partition of PARTITIONS) {
      const row = this.partitions[partition].get(uuid);
      if (row) return { partition, row: structuredClone(row) };
    }
    return null;
  }

  async findManyInPartition(partition: Partition, uuids: string[]): Promise<IntelligenceRow[]> {
    return uuids.flatMap((uuid) => {
      const row = this.partitions[partition].get(uuid);
      return row ? [structuredClone(row)] : [];
    });
  }

  async claim(uuid: string, options: ClaimOptions): Promise<IntelligenceRow | null> {
    this.claimCalls++;
    await Promise.resolve();

    const row = this.partitions.cached.get(uuid);
    if (!row || !isClaimable(row, options.now, options.maxAttempts)) return null;

    row.state = 'analyzing';
    row.attempts += 1;
    row.lease_token = options.leaseToken;
    row.lease_expires_at = options.leaseExpiresAt;
    row.updated_at = options.now;
    return structuredClone(row);
  }

  async findClaimable(now: string, maxAttempts: number, limit: number): Promise<IntelligenceRow[]> {
    return [...this.partitions.cached.values()]
      .filter((row) => isClaimable(row, now, maxAttempts))
      .sort((a, b) => a.created_at.localeCompare(b.created_at))
      .slice(0, limit)
      .map((row) => structuredClone(row));
  }

  async markFailed(
    uuid: string,
    leaseToken: string,
    error: string,
    nextAttemptAt: string
  ): Promise<IntelligenceRow> {
    const row = this.partitions.cached.get(uuid);
    if (!row || row.state !== 'analyzing' || row.lease_token !== leaseToken) {
      throw new StorageError(`Lease on ${uuid} is no longer held`, { uuid });
    }
    row.state = 'failed';
    row.lease_token = null;
    row.lease_expires_at = null;
    row.last_error = error;
    row.next_attempt_at = nextAttemptAt;
    return structuredClone(row);
  }

  async finalize(
    uuid: string,
    leaseToken: string,
    partition: TerminalPartition,
    row: IntelligenceRow
  ): Promise<IntelligenceRow> {
    const current = this.partitions.cached.get(uuid);
    if (!current || current.state !== 'analyzing' || current.lease_token !== leaseToken) {
      throw new StorageError(`Lease on ${uuid} is no longer held`, { uuid });
    }
    this.partitions.cached.delete(uuid);
    this.partitions[partition].set(uuid, structuredClone(row));
    return structuredClone(row);
  }

  async releaseExpiredLeases(now: string): Promise<number> {
    let released = 0;
    for (const row of this.partitions.cached.values()) {
      if (row.state === 'analyzing' && row.lease_expires_at !== null && row.lease_expires_at < now) {
        row.state = 'failed';
        row.lease_token = null;
        row.lease_expires_at = null;
        row.last_error = 'lease expired';
        row.next_attempt_at = now;
        released++;
      }
    }
    return released;
  }

  async resetForRetry(uuid: string): Promise<IntelligenceRow | null> {
    const row = this.partitions.cached.get(uuid);
    if (!row || row.state !== 'failed') return null;
    row.state = 'pending';
    row.attempts = 0;
    row.next_attempt_at = null;
    return structuredClone(row);
  }

  async mergeManualRating(
    uuid: string,
    ratings: Record<string, number>,
    updatedAt: string
  ): Promise<IntelligenceRow | null> {
    const row = this.partitions.archived.get(uuid);
    if (!row) return null;
    row.appendix = {
      ...row.appendix,
      manual_rating: { ...row.appendix.manual_rating, ...ratings },
      manual_rating_updated_at: updatedAt,
    };
    return structuredClone(row);
  }

  async query(
    partition: Partition,
    filter: IntelligenceFilter,
    pagination: PaginationOptions
  ): Promise<{ rows: IntelligenceRow[]; total: number }> {
    const matches = [...this.partitions[partition].values()]
      .filter((row) => matchesFilter(row, filter))
      .sort((a, b) => (b.pub_time ?? '').localeCompare(a.pub_time ?? ''));

    return {
      rows: matches
        .slice(pagination.offset, pagination.offset + pagination.limit)
        .map((row) => structuredClone(row)),
      total: matches.length,
    };
  }

  async listAll(partition: Partition, range?: TimeRange): Promise<IntelligenceRow[]> {
    const timeOf = (row: IntelligenceRow) =>
      (partition === 'cached' ? row.pub_time : row.appendix.time_archived) ?? '';

    return [...this.partitions[partition].values()]
      .filter((row) => inRange(timeOf(row), range))
      .sort((a, b) => timeOf(a).localeCompare(timeOf(b)) || a.uuid.localeCompare(b.uuid))
      .map((row) => structuredClone(row));
  }

  async importRow(partition: Partition, row: IntelligenceRow): Promise<void> {
    for (const p of PARTITIONS) {
      if (this.partitions[p].has(row.uuid)) {
        throw new Error(`Failed to import intelligence: duplicate key ${row.uuid}`);
      }
    }
    this.partitions[partition].set(row.uuid, structuredClone(row));
  }

  async count(partition: Partition): Promise<number> {
    return this.partitions[partition].size;
  }

  async countArchived(range: TimeRange, groupBy: StatisticsGrouping): Promise<CountBucket[]> {
    const counts = new Map<string, number>();
    for (const row of this.partitions.archived.values()) {
      const archivedAt = row.appendix.time_archived;
      if (!archivedAt || !inRange(archivedAt, range)) continue;
      const key = bucketOf(row, archivedAt, groupBy);
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }
    return [...counts.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, count]) => ({ key, count }));
  }

  // ── Test Helpers ──

  seed(partition: Partition, row: IntelligenceRow): void {
    this.partitions[partition].set(row.uuid, structuredClone(row));
  }

  get(uuid: string): LocatedIntelligence | null {
    for (const partition of PARTITIONS) {
      const row = this.partitions[partition].get(uuid);
      if (row) return { partition, row };
    }
    return null;
  }

  all(partition: Partition): IntelligenceRow[] {
    return [...this.partitions[partition].values()];
  }
}

function isClaimable(row: IntelligenceRow, now: string, maxAttempts: number): boolean {
  if (row.state === 'pending') return true;
  return (
    row.state === 'failed' &&
    row.attempts < maxAttempts &&
    (row.next_attempt_at === null || row.next_attempt_at <= now)
  );
}

/** In-memory counterpart of the SQL grouping: UTC periods, Monday weeks. */
function bucketOf(row: IntelligenceRow, archivedAt: string, groupBy: StatisticsGrouping): string {
  if (groupBy === 'score') return String(row.appendix.max_rate_score ?? 0);
  if (groupBy === 'informant') return row.informant;

  const start = new Date(archivedAt);
  if (groupBy === 'hour') {
    start.setUTCMinutes(0, 0, 0);
  } else {
    start.setUTCHours(0, 0, 0, 0);
    if (groupBy === 'week') start.setUTCDate(start.getUTCDate() - ((start.getUTCDay() + 6) % 7));
    if (groupBy === 'month') start.setUTCDate(1);
  }
  return start.toISOString();
}

function inRange(value: string, range?: TimeRange): boolean {
  if (range?.start && value < range.start) return false;
  if (range?.end && value > range.end) return false;
  return true;
}

function overlaps(values: string[], wanted?: string[]): boolean {
  return !wanted || wanted.some((w) => values.includes(w));
}

function matchesFilter(row: IntelligenceRow, filter: IntelligenceFilter): boolean {
  if (filter.period && !inRange(row.pub_time ?? '', filter.period)) return false;
  if (!overlaps(row.locations, filter.locations)) return false;
  if (!overlaps(row.people, filter.people)) return false;
  if (!overlaps(row.organizations, filter.organizations)) return false;
  if (filter.keywords) {
    const needle = filter.keywords.toLowerCase();
    const haystack = [row.title, row.brief, row.text].map((s) => (s ?? '').toLowerCase());
    if (!haystack.some((s) => s.includes(needle))) return false;
  }
  if (filter.minScore !== undefined && (row.appendix.max_rate_score ?? 0) < filter.minScore) {
    return false;
  }
  return true;
}
