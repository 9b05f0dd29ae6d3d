/**
 * Bounded pool of classification workers.
 * Each slot claims and processes one item at a time, so a stalled AI call only
 * occupies its own slot. A StorageError is fatal: it is logged and stops the pool.
 */

import type { ILogProvider } from '../providers/ILogProvider.js';
import type { PipelinePolicy } from '../types/models.js';
import { StorageError, ValidationError } from '../errors.js';
import type { ClassificationPipeline, ProcessOutcome } from './ClassificationPipeline.js';
import type { StagingService } from './StagingService.js';

export interface WorkerPoolOptions {
  concurrency: number;
  /** Idle wait between polls when nothing is claimable. */
  pollIntervalMs: number;
  /** How often expired leases are released. Default: pollIntervalMs. */
  leaseCheckIntervalMs?: number;
  policy: PipelinePolicy;
}

export interface DrainSummary {
  processed: number;
  archived: number;
  lowValue: number;
  failed: number;
}

export class WorkerPool {
  private policy: PipelinePolicy;
  private running = false;
  private slots: Promise<void>[] = [];
  private controller: AbortController | null = null;
  private leaseTimer: ReturnType<typeof setInterval> | null = null;
  private fatal: unknown = null;
  private readonly sleepers = new Set<() => void>();

  constructor(
    private readonly pipeline: ClassificationPipeline,
    private readonly staging: StagingService,
    private readonly logger: ILogProvider,
    private readonly options: WorkerPoolOptions
  ) {
    if (options.concurrency < 1) {
      throw new ValidationError('concurrency must be at least 1');
    }
    this.policy = checkPolicy(options.policy);
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Policy applied to the next claim. */
  get currentPolicy(): PipelinePolicy {
    return this.policy;
  }

  /** Items already claimed keep the policy they were claimed under. */
  updatePolicy(patch: Partial<PipelinePolicy>): PipelinePolicy {
    this.policy = checkPolicy({ ...this.policy, ...patch });
    this.logger.info('Pipeline policy updated', { ...this.policy });
    return this.policy;
  }

  /**
   * Process until nothing is claimable, then resolve.
   * Rejects with the first error any slot hit, after every slot has stopped.
   */
  async drain(): Promise<DrainSummary> {
    const summary: DrainSummary = { processed: 0, archived: 0, lowValue: 0, failed: 0 };
    let stop = false;

    await this.releaseExpired();

    const slot = async (): Promise<void> => {
      while (!stop) {
        let outcome: ProcessOutcome | null;
        try {
          outcome = await this.pipeline.runOnce(this.policy);
        } catch (err) {
          stop = true;
          throw err;
        }
        if (!outcome) return;
        tally(summary, outcome);
      }
    };

    const results = await Promise.allSettled(
      Array.from({ length: this.options.concurrency }, () => slot())
    );
    const rejected = results.find(
      (r): r is PromiseRejectedResult => r.status === 'rejected'
    );
    if (rejected) {
      this.logFailure(rejected.reason);
      throw rejected.reason;
    }

    this.logger.info('Pipeline drained', { ...summary });
    return summary;
  }

  /** Run slots until stop() or a fatal error. */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.fatal = null;
    this.controller = new AbortController();

    this.leaseTimer = setInterval(() => {
      void this.releaseExpired();
    }, this.options.leaseCheckIntervalMs ?? this.options.pollIntervalMs);

    this.slots = Array.from({ length: this.options.concurrency }, (_, i) =>
      this.runSlot(i)
    );
    this.logger.info('Worker pool started', {
      concurrency: this.options.concurrency,
      ...this.policy,
    });
  }

  /**
   * Stop claiming and wait for in-flight items.
   * With `abort`, in-flight AI calls are cancelled and those items fail with backoff.
   */
  async stop(opts?: { abort?: boolean }): Promise<void> {
    this.running = false;
    if (this.leaseTimer) {
      clearInterval(this.leaseTimer);
      this.leaseTimer = null;
    }
    if (opts?.abort) this.controller?.abort();
    this.wakeAll();

    await Promise.allSettled(this.slots);
    this.slots = [];
    this.controller = null;
    this.logger.info('Worker pool stopped');
    await this.logger.flush();
  }

  /** Resolves when every slot has exited; rejects with the fatal error, if any. */
  async wait(): Promise<void> {
    await Promise.allSettled(this.slots);
    if (this.fatal) throw this.fatal;
  }

  // ── Private ──

  private async runSlot(slot: number): Promise<void> {
    while (this.running) {
      try {
        const outcome = await this.pipeline.runOnce(this.policy, this.controller?.signal);
        if (!outcome) await this.idle();
      } catch (err) {
        this.logFailure(err, { slot });
        if (err instanceof StorageError) {
          this.fatal = err;
          this.running = false;
          this.controller?.abort();
          this.wakeAll();
          return;
        }
        await this.idle();
      }
    }
  }

  /** Sleep for one poll interval, or until stop() wakes every slot. */
  private idle(): Promise<void> {
    return new Promise((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const finish = () => {
        clearTimeout(timer);
        this.sleepers.delete(finish);
        resolve();
      };
      this.sleepers.add(finish);
      timer = setTimeout(finish, this.options.pollIntervalMs);
    });
  }

  private wakeAll(): void {
    for (const finish of [...this.sleepers]) finish();
  }

  private async releaseExpired(): Promise<void> {
    try {
      const released = await this.staging.releaseExpired();
      if (released > 0) this.logger.warn('Expired leases released', { released });
    } catch (err) {
      this.logger.error('Lease release failed', {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private logFailure(err: unknown, fields?: Record<string, unknown>): void {
    const fatal = err instanceof StorageError;
    this.logger.error(fatal ? 'Storage conflict, stopping pipeline' : 'Worker error', {
      ...fields,
      error: err instanceof Error ? err.message : String(err),
      ...(err instanceof StorageError && { code: err.code, details: err.details }),
    });
  }
}

function tally(summary: DrainSummary, outcome: ProcessOutcome): void {
  summary.processed += 1;
  if (outcome.status === 'archived') summary.archived += 1;
  else if (outcome.status === 'low_value') summary.lowValue += 1;
  else summary.failed += 1;
}

function checkPolicy(policy: PipelinePolicy): PipelinePolicy {
  if (policy.scoreThreshold < 0 || policy.scoreThreshold > 10) {
    throw new ValidationError('scoreThreshold must be between 0 and 10');
  }
  if (policy.maxAttempts < 1) {
    throw new ValidationError('maxAttempts must be at least 1');
  }
  if (policy.leaseMs <= policy.aiTimeoutMs) {
    throw new ValidationError('leaseMs must be greater than aiTimeoutMs');
  }
  return Object.freeze({ ...policy });
}
