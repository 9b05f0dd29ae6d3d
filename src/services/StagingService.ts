/**
 * Staging state machine.
 *
 *   pending ──claim──▶ analyzing ──finalize──▶ archived | low_value
 *                          │
 *                          └──fail──▶ failed ──claim (attempts < max, backoff elapsed)──▶ analyzing
 *
 * Every transition is a conditional write in the repository; this service
 * owns lease tokens, the per-claim policy snapshot and backoff timing.
 */

import { randomUUID } from 'node:crypto';
import type { IIntelligenceRepository } from '../repositories/IIntelligenceRepository.js';
import type { IntelligenceRow } from '../types/database.js';
import type { PipelinePolicy, TerminalPartition } from '../types/models.js';
import { ConflictError, NotFoundError } from '../errors.js';

/** An item held under lease, with the policy it was claimed under. */
export interface ClaimedItem {
  readonly row: IntelligenceRow;
  readonly leaseToken: string;
  readonly policy: PipelinePolicy;
}

export interface StagingServiceOptions {
  now?: () => Date;
  newToken?: () => string;
}

const CLAIM_CANDIDATES = 10;

export class StagingService {
  private readonly now: () => Date;
  private readonly newToken: () => string;

  constructor(
    private readonly repo: IIntelligenceRepository,
    options?: StagingServiceOptions
  ) {
    this.now = options?.now ?? (() => new Date());
    this.newToken = options?.newToken ?? randomUUID;
  }

  /** Claim a specific item. Null when it is not eligible or another worker won. */
  async claim(uuid: string, policy: PipelinePolicy): Promise<ClaimedItem | null> {
    const now = this.now();
    const leaseToken = this.newToken();
    const row = await this.repo.claim(uuid, {
      leaseToken,
      leaseExpiresAt: new Date(now.getTime() + policy.leaseMs).toISOString(),
      now: now.toISOString(),
      maxAttempts: policy.maxAttempts,
    });
    return row ? { row, leaseToken, policy: { ...policy } } : null;
  }

  /** Claim the oldest eligible item, skipping any another worker takes first. */
  async claimNext(policy: PipelinePolicy): Promise<ClaimedItem | null> {
    const candidates = await this.repo.findClaimable(
      this.now().toISOString(),
      policy.maxAttempts,
      CLAIM_CANDIDATES
    );
    for (const candidate of candidates) {
      const claimed = await this.claim(candidate.uuid, policy);
      if (claimed) return claimed;
    }
    return null;
  }

  /**
   * analyzing → failed. The next attempt waits retryBackoffMs * 2^(attempts-1).
   * Returns the failed row.
   */
  async fail(item: ClaimedItem, error: string): Promise<IntelligenceRow> {
    const delay = backoffDelay(item.policy.retryBackoffMs, item.row.attempts);
    const nextAttemptAt = new Date(this.now().getTime() + delay).toISOString();
    return this.repo.markFailed(item.row.uuid, item.leaseToken, error, nextAttemptAt);
  }

  /** analyzing → archived | low_value, moving the item out of staging. */
  async finalize(
    item: ClaimedItem,
    partition: TerminalPartition,
    row: IntelligenceRow
  ): Promise<IntelligenceRow> {
    return this.repo.finalize(item.row.uuid, item.leaseToken, partition, row);
  }

  /** Expired leases go back to failed, eligible at once. Returns the count. */
  async releaseExpired(): Promise<number> {
    return this.repo.releaseExpiredLeases(this.now().toISOString());
  }

  /** Operator retry: failed → pending with the attempt count reset. */
  async retry(uuid: string): Promise<IntelligenceRow> {
    const located = await this.repo.findByUuid(uuid);
    if (!located) {
      throw new NotFoundError(`Intelligence "${uuid}" not found`);
    }
    if (located.partition !== 'cached' || located.row.state !== 'failed') {
      throw new ConflictError(
        'NOT_RETRYABLE',
        'Only failed items can be retried',
        { uuid, state: located.row.state }
      );
    }

    const row = await this.repo.resetForRetry(uuid);
    if (!row) {
      throw new ConflictError(
        'NOT_RETRYABLE',
        'Item changed state before it could be retried',
        { uuid }
      );
    }
    return row;
  }
}

export function backoffDelay(baseMs: number, attempts: number): number {
  return baseMs * 2 ** Math.max(0, attempts - 1);
}
