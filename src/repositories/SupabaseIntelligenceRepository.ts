/**
 * Supabase implementation of IIntelligenceRepository.
 * Reads go through the query builder; every state transition is a
 * conditional update inside a database function (see supabase/migrations).
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type {
  ClaimOptions,
  CountBucket,
  IIntelligenceRepository,
  IntelligenceFilter,
  LocatedIntelligence,
  StatisticsGrouping,
} from './IIntelligenceRepository.js';
import type {
  IntelligenceRow,
  NewIntelligenceRow,
} from '../types/database.js';
import {
  PARTITIONS,
  type Partition,
  type TerminalPartition,
} from '../types/models.js';
import type { PaginationOptions, TimeRange } from '../types/common.js';
import { StorageError } from '../errors.js';

const TABLES: Record<Partition, string> = {
  cached: 'intelligence_cached',
  archived: 'intelligence_archived',
  low_value: 'intelligence_low_value',
};

/** PostgREST reserves these inside or() filter strings. */
const FILTER_RESERVED = /[,()%*\\]/g;

export class SupabaseIntelligenceRepository implements IIntelligenceRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insertPending(row: NewIntelligenceRow): Promise<IntelligenceRow> {
    const { data, error } = await this.db
      .from(TABLES.cached)
      .insert(row)
      .select()
      .single();

    if (error) throw new Error(`Failed to insert intelligence: ${error.message}`);
    return data as IntelligenceRow;
  }

  async findByUuid(uuid: string): Promise<LocatedIntelligence | null> {
    for (const partition of PARTITIONS) {
      const { data, error } = await this.db
        .from(TABLES[partition])
        .select('*')
        .eq('uuid', uuid)
        .maybeSingle();

      if (error) throw new Error(`Failed to find intelligence: ${error.message}`);
      if (data) return { partition, row: data as IntelligenceRow };
    }
    return null;
  }

  async findManyInPartition(
    partition: Partition,
    uuids: string[]
  ): Promise<IntelligenceRow[]> {
    if (uuids.length === 0) return [];

    const { data, error } = await this.db
      .from(TABLES[partition])
      .select('*')
      .in('uuid', uuids);

    if (error) throw new Error(`Failed to find intelligences: ${error.message}`);
    return (data ?? []) as IntelligenceRow[];
  }

  async claim(
    uuid: string,
    options: ClaimOptions
  ): Promise<IntelligenceRow | null> {
    const { data, error } = await this.db.rpc('claim_intelligence', {
      p_uuid: uuid,
      p_lease_token: options.leaseToken,
      p_lease_expires_at: options.leaseExpiresAt,
      p_now: options.now,
      p_max_attempts: options.maxAttempts,
    });

    if (error) throw new Error(`Failed to claim intelligence: ${error.message}`);
    const rows = (data ?? []) as IntelligenceRow[];
    return rows[0] ?? null;
  }

  async findClaimable(
    now: string,
    maxAttempts: number,
    limit: number
  ): Promise<IntelligenceRow[]> {
    const { data, error } = await this.db
      .from(TABLES.cached)
      .select('*')
      .or(
        `state.eq.pending,and(state.eq.failed,attempts.lt.${maxAttempts},or(next_attempt_at.is.null,next_attempt_at.lte.${now}))`
      )
      .order('created_at', { ascending: true })
      .limit(limit);

    if (error) throw new Error(`Failed to find claimable intelligences: ${error.message}`);
    return (data ?? []) as IntelligenceRow[];
  }

  async markFailed(
    uuid: string,
    leaseToken: string,
    error: string,
    nextAttemptAt: string
  ): Promise<IntelligenceRow> {
    const { data, error: rpcError } = await this.db.rpc('mark_intelligence_failed', {
      p_uuid: uuid,
      p_lease_token: leaseToken,
      p_error: error,
      p_next_attempt_at: nextAttemptAt,
    });

    if (rpcError) throw new Error(`Failed to mark intelligence failed: ${rpcError.message}`);
    const rows = (data ?? []) as IntelligenceRow[];
    const row = rows[0];
    if (!row) throw new StorageError(`Lease on ${uuid} is no longer held`, { uuid });
    return row;
  }

  async finalize(
    uuid: string,
    leaseToken: string,
    partition: TerminalPartition,
    row: IntelligenceRow
  ): Promise<IntelligenceRow> {
    const { data, error } = await this.db.rpc('finalize_intelligence', {
      p_uuid: uuid,
      p_lease_token: leaseToken,
      p_partition: partition,
      p_row: row,
    });

    if (error) throw new Error(`Failed to finalize intelligence: ${error.message}`);
    if (!data) throw new StorageError(`Lease on ${uuid} is no longer held`, { uuid });
    return data as IntelligenceRow;
  }

  async releaseExpiredLeases(now: string): Promise<number> {
    const { data, error } = await this.db.rpc('release_expired_intelligence_leases', {
      p_now: now,
    });

    if (error) throw new Error(`Failed to release expired leases: ${error.message}`);
    return typeof data === 'number' ? data : 0;
  }

  async resetForRetry(uuid: string): Promise<IntelligenceRow | null> {
    const { data, error } = await this.db.rpc('reset_intelligence_for_retry', {
      p_uuid: uuid,
    });

    if (error) throw new Error(`Failed to reset intelligence: ${error.message}`);
    const rows = (data ?? []) as IntelligenceRow[];
    return rows[0] ?? null;
  }

  async mergeManualRating(
    uuid: string,
    ratings: Record<string, number>,
    updatedAt: string
  ): Promise<IntelligenceRow | null> {
    const { data, error } = await this.db.rpc('merge_manual_rating', {
      p_uuid: uuid,
      p_ratings: ratings,
      p_updated_at: updatedAt,
    });

    if (error) throw new Error(`Failed to merge manual rating: ${error.message}`);
    const rows = (data ?? []) as IntelligenceRow[];
    return rows[0] ?? null;
  }

  async query(
    partition: Partition,
    filter: IntelligenceFilter,
    pagination: PaginationOptions
  ): Promise<{ rows: IntelligenceRow[]; total: number }> {
    let q = this.db.from(TABLES[partition]).select('*', { count: 'exact' });

    if (filter.period?.start) q = q.gte('pub_time', filter.period.start);
    if (filter.period?.end) q = q.lte('pub_time', filter.period.end);
    if (filter.locations?.length) q = q.overlaps('locations', filter.locations);
    if (filter.people?.length) q = q.overlaps('people', filter.people);
    if (filter.organizations?.length) {
      q = q.overlaps('organizations', filter.organizations);
    }
    if (filter.keywords) {
      const term = filter.keywords.replace(FILTER_RESERVED, ' ').trim();
      if (term) {
        q = q.or(`title.ilike.*${term}*,brief.ilike.*${term}*,text.ilike.*${term}*`);
      }
    }
    if (filter.minScore !== undefined) {
      q = q.gte('appendix->max_rate_score', filter.minScore);
    }

    const { data, error, count } = await q
      .order('pub_time', { ascending: false, nullsFirst: false })
      .range(pagination.offset, pagination.offset + pagination.limit - 1);

    if (error) throw new Error(`Failed to query intelligences: ${error.message}`);
    return { rows: (data ?? []) as IntelligenceRow[], total: count ?? 0 };
  }

  async listAll(partition: Partition, range?: TimeRange): Promise<IntelligenceRow[]> {
    const timeColumn = partition === 'cached' ? 'pub_time' : 'appendix->>time_archived';
    const pageSize = 1000;
    const rows: IntelligenceRow[] = [];

    for (let offset = 0; ; offset += pageSize) {
      let q = this.db.from(TABLES[partition]).select('*');
      if (range?.start) q = q.gte(timeColumn, range.start);
      if (range?.end) q = q.lte(timeColumn, range.end);

      const { data, error } = await q
        .order(timeColumn, { ascending: true })
        .order('uuid', { ascending: true })
        .range(offset, offset + pageSize - 1);

      if (error) throw new Error(`Failed to list intelligences: ${error.message}`);
      const page = (data ?? []) as IntelligenceRow[];
      rows.push(...page);
      if (page.length < pageSize) break;
    }

    return rows;
  }

  async importRow(partition: Partition, row: IntelligenceRow): Promise<void> {
    const { error } = await this.db.from(TABLES[partition]).insert(row);
    if (error) throw new Error(`Failed to import intelligence: ${error.message}`);
  }

  async count(partition: Partition): Promise<number> {
    const { count, error } = await this.db
      .from(TABLES[partition])
      .select('*', { count: 'exact', head: true });

    if (error) throw new Error(`Failed to count intelligences: ${error.message}`);
    return count ?? 0;
  }

  async countArchived(range: TimeRange, groupBy: StatisticsGrouping): Promise<CountBucket[]> {
    const { data, error } = await this.db.rpc('count_archived_intelligences', {
      p_start: range.start ?? null,
      p_end: range.end ?? null,
      p_group: groupBy,
    });

    if (error) throw new Error(`Failed to count archived intelligences: ${error.message}`);

    return ((data ?? []) as Array<{ bucket: string; item_count: number | string }>).map((row) => ({
      key: row.bucket,
      count: Number(row.item_count),
    }));
  }
}
