/**
 * One classification step: claimed item → AI adapter → routed terminal row.
 * Retryable AI failures send the item back to failed with backoff;
 * archived items are embedded after they are finalized.
 */

import type { ILogProvider } from '../providers/ILogProvider.js';
import type { IntelligenceRow } from '../types/database.js';
import type {
  ClassificationProvenance,
  ClassificationResult,
  PipelinePolicy,
  TerminalPartition,
} from '../types/models.js';
import type { ClassificationService } from './ClassificationService.js';
import type { EmbeddingIndexer } from './EmbeddingIndexer.js';
import type { ClaimedItem, StagingService } from './StagingService.js';
import type { ScoringEngine } from './ScoringEngine.js';
import { route, type RouteDecision } from './ArchiveRouter.js';

export type ProcessOutcome =
  | {
      status: TerminalPartition;
      uuid: string;
      maxRateScore: number;
      totalScore: number;
      vectors: number;
    }
  | {
      status: 'failed';
      uuid: string;
      error: string;
      attempts: number;
      /** No automatic retry remains; only an operator retry revives the item. */
      exhausted: boolean;
    };

export class ClassificationPipeline {
  private readonly now: () => Date;

  constructor(
    private readonly staging: StagingService,
    private readonly classifier: ClassificationService,
    private readonly indexer: EmbeddingIndexer,
    private readonly scoring: ScoringEngine,
    private readonly logger: ILogProvider,
    options?: { now?: () => Date }
  ) {
    this.now = options?.now ?? (() => new Date());
  }

  /** Claim and process the next eligible item. Null when nothing is claimable. */
  async runOnce(policy: PipelinePolicy, signal?: AbortSignal): Promise<ProcessOutcome | null> {
    const item = await this.staging.claimNext(policy);
    if (!item) return null;
    return this.processItem(item, signal);
  }

  async processItem(item: ClaimedItem, signal?: AbortSignal): Promise<ProcessOutcome> {
    const { uuid } = item.row;
    this.logger.debug('Item claimed', { uuid, attempt: item.row.attempts });

    let outcome: Awaited<ReturnType<ClassificationService['classify']>>;
    try {
      outcome = await this.classifier.classify(classificationText(item.row), {
        timeoutMs: item.policy.aiTimeoutMs,
        signal,
      });
    } catch (err) {
      // Non-retryable: record it and let the caller decide.
      await this.fail(item, err instanceof Error ? err.message : String(err));
      throw err;
    }

    if (!outcome.ok) {
      return this.fail(item, outcome.error.message, outcome.error.code);
    }

    const decision = route(outcome.result.rate, item.policy.scoreThreshold);
    const totalScore = this.scoring.score(outcome.result.rate, outcome.result.taxonomy);
    const row = this.buildTerminalRow(item, outcome.result, outcome.provenance, decision, totalScore);

    const finalized = await this.staging.finalize(item, decision.partition, row);
    this.logger.info('Item routed', {
      uuid,
      partition: decision.partition,
      maxRateScore: decision.maxRateScore,
      maxRateClass: decision.maxRateClass,
      threshold: item.policy.scoreThreshold,
      totalScore,
    });

    const vectors =
      decision.partition === 'archived' ? await this.indexer.index(finalized) : 0;

    return {
      status: decision.partition,
      uuid,
      maxRateScore: decision.maxRateScore,
      totalScore,
      vectors,
    };
  }

  // ── Private ──

  private async fail(
    item: ClaimedItem,
    message: string,
    code?: string
  ): Promise<ProcessOutcome> {
    const failed = await this.staging.fail(item, message);
    const exhausted = failed.attempts >= item.policy.maxAttempts;

    this.logger.warn('Classification failed', {
      uuid: failed.uuid,
      code,
      error: message,
      attempts: failed.attempts,
      nextAttemptAt: failed.next_attempt_at,
      exhausted,
    });

    return {
      status: 'failed',
      uuid: failed.uuid,
      error: message,
      attempts: failed.attempts,
      exhausted,
    };
  }

  private buildTerminalRow(
    item: ClaimedItem,
    result: ClassificationResult,
    provenance: ClassificationProvenance,
    decision: RouteDecision,
    totalScore: number
  ): IntelligenceRow {
    const now = this.now().toISOString();
    return {
      ...item.row,
      title: result.title || null,
      brief: result.brief || null,
      text: result.text || null,
      times: result.entities.times,
      locations: result.entities.locations,
      people: result.entities.people,
      organizations: result.entities.organizations,
      geography: result.entities.geography,
      impact: result.impact,
      reason: result.reason,
      tips: result.tips,
      taxonomy: result.taxonomy,
      sub_category: result.subCategories,
      rate: result.rate,
      state: decision.partition,
      lease_token: null,
      lease_expires_at: null,
      next_attempt_at: null,
      last_error: null,
      appendix: {
        ...item.row.appendix,
        time_archived: now,
        max_rate_class: decision.maxRateClass,
        max_rate_score: decision.maxRateScore,
        total_score: totalScore,
        ai_provider: provenance.provider,
        ai_model: provenance.model,
        prompt_version: provenance.promptVersion,
        score_threshold: item.policy.scoreThreshold,
      },
      updated_at: now,
    };
  }
}

/** Text handed to the classifier: the raw title, if any, above the raw content. */
export function classificationText(row: IntelligenceRow): string {
  return row.raw_title ? `${row.raw_title}\n\n${row.raw_content}` : row.raw_content;
}
