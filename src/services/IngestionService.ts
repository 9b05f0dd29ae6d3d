/**
 * Feed record ingestion.
 * Validates a record, registers its fingerprint and stages it as pending.
 * The fingerprint registration is the dedup decision; the staging insert follows it.
 */

import { randomUUID } from 'node:crypto';
import type { IFingerprintRepository } from '../repositories/IFingerprintRepository.js';
import type { IIntelligenceRepository } from '../repositories/IIntelligenceRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { IngestBatchResponse, IngestResult } from '../types/api.js';
import type { NewIntelligenceRow } from '../types/database.js';
import type { FeedRecord } from '../types/models.js';
import { DuplicateError, IngestionError } from '../errors.js';
import { describeIssues, feedRecordSchema } from '../schemas.js';
import { Fingerprinter } from './Fingerprinter.js';

export interface IngestionServiceOptions {
  now?: () => Date;
  newId?: () => string;
}

export class IngestionService {
  private readonly fingerprinter = new Fingerprinter();
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(
    private readonly fingerprintRepo: IFingerprintRepository,
    private readonly intelligenceRepo: IIntelligenceRepository,
    private readonly logger: ILogProvider,
    options?: IngestionServiceOptions
  ) {
    this.now = options?.now ?? (() => new Date());
    this.newId = options?.newId ?? randomUUID;
  }

  /**
   * Stage one record.
   * Throws IngestionError for a malformed record and DuplicateError for a known one.
   */
  async ingest(input: unknown): Promise<{ uuid: string; fingerprint: string }> {
    const record = this.validate(input);
    const fingerprint = this.fingerprinter.compute(record);
    const uuid = this.newId();

    const outcome = await this.fingerprintRepo.registerIfAbsent(fingerprint, uuid);
    if (outcome === 'duplicate') {
      this.logger.debug('Duplicate item skipped', {
        fingerprint,
        sourceUrl: record.sourceUrl,
      });
      throw new DuplicateError(fingerprint);
    }

    try {
      await this.intelligenceRepo.insertPending(this.toPendingRow(record, uuid, fingerprint));
    } catch (err) {
      await this.releaseFingerprint(fingerprint, uuid);
      throw err;
    }

    this.logger.info('Item queued', { uuid, fingerprint, sourceUrl: record.sourceUrl });
    return { uuid, fingerprint };
  }

  /**
   * Stage many records. Malformed and duplicate records are reported per item
   * and never abort the batch; storage failures propagate.
   */
  async ingestBatch(inputs: unknown[]): Promise<IngestBatchResponse> {
    const results: IngestResult[] = [];

    for (const input of inputs) {
      try {
        const { uuid, fingerprint } = await this.ingest(input);
        results.push({ status: 'queued', uuid, fingerprint });
      } catch (err) {
        if (err instanceof DuplicateError) {
          results.push({ status: 'duplicate', fingerprint: err.fingerprint });
        } else if (err instanceof IngestionError) {
          this.logger.warn('Feed record rejected', {
            error: err.message,
            ...err.details,
          });
          results.push({ status: 'rejected', error: err.message });
        } else {
          throw err;
        }
      }
    }

    return {
      queued: results.filter((r) => r.status === 'queued').length,
      duplicates: results.filter((r) => r.status === 'duplicate').length,
      rejected: results.filter((r) => r.status === 'rejected').length,
      results,
    };
  }

  // ── Private helpers ──

  private validate(input: unknown): FeedRecord {
    const parsed = feedRecordSchema.safeParse(input);
    if (!parsed.success) {
      const issues = describeIssues(parsed.error);
      throw new IngestionError(`Malformed feed record: ${issues.join('; ')}`, { issues });
    }
    return parsed.data;
  }

  private toPendingRow(
    record: FeedRecord,
    uuid: string,
    fingerprint: string
  ): NewIntelligenceRow {
    const publishedAt = new Date(record.publishedAt).toISOString();
    return {
      uuid,
      fingerprint,
      informant: record.sourceUrl,
      pub_time: publishedAt,
      raw_title: record.title || null,
      raw_content: record.rawContent,
      title: null,
      brief: null,
      text: null,
      times: [],
      locations: [],
      people: [],
      organizations: [],
      geography: null,
      impact: null,
      reason: null,
      tips: null,
      taxonomy: null,
      sub_category: [],
      rate: {},
      state: 'pending',
      attempts: 0,
      lease_token: null,
      lease_expires_at: null,
      next_attempt_at: null,
      last_error: null,
      appendix: {
        time_got: this.now().toISOString(),
        time_published: publishedAt,
      },
    };
  }

  private async releaseFingerprint(fingerprint: string, uuid: string): Promise<void> {
    try {
      await this.fingerprintRepo.release(fingerprint, uuid);
    } catch (err) {
      this.logger.error('Failed to release fingerprint after staging error', {
        fingerprint,
        uuid,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
