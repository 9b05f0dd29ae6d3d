/**
 * Bulk export and import of one collection, as JSON Lines or a JSON array.
 * Import goes through the fingerprint index, so re-importing an export is a no-op.
 */

import type { IFingerprintRepository } from '../repositories/IFingerprintRepository.js';
import type { IIntelligenceRepository } from '../repositories/IIntelligenceRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ExportFormat, ImportResponse } from '../types/api.js';
import type { IntelligenceRow } from '../types/database.js';
import type { Partition } from '../types/models.js';
import { ValidationError } from '../errors.js';
import {
  describeIssues,
  intelligenceDocumentSchema,
  portabilityParamsSchema,
  type IntelligenceDocument,
  type PortabilityParams,
} from '../schemas.js';
import { route, summarizeRating } from './ArchiveRouter.js';
import type { EmbeddingIndexer } from './EmbeddingIndexer.js';

const MAX_REPORTED_ERRORS = 100;

export interface ExportResult {
  body: string;
  contentType: string;
  count: number;
}

export class PortabilityService {
  private readonly now: () => Date;

  constructor(
    private readonly intelligenceRepo: IIntelligenceRepository,
    private readonly fingerprintRepo: IFingerprintRepository,
    private readonly indexer: EmbeddingIndexer,
    private readonly logger: ILogProvider,
    options?: { now?: () => Date }
  ) {
    this.now = options?.now ?? (() => new Date());
  }

  /**
   * Export a collection in time order. The range applies to publish time
   * for `cached` and to archive time otherwise.
   */
  async export(params: unknown): Promise<ExportResult> {
    const { collection, format, start, end } = parseParams(params);
    const rows = await this.intelligenceRepo.listAll(collection, { start, end });

    this.logger.info('Collection exported', { collection, format, count: rows.length });
    return {
      body: serialize(rows, format),
      contentType: format === 'jsonl' ? 'application/x-ndjson' : 'application/json',
      count: rows.length,
    };
  }

  /**
   * Import documents into a collection. Duplicates (by fingerprint) are skipped;
   * malformed documents and unreadable JSONL lines are reported and never abort
   * the import. A `json` body that is not an array is rejected whole.
   * Imported archived items are embedded.
   */
  async import(params: unknown, body: string): Promise<ImportResponse> {
    const { collection, format } = parseParams(params);
    const documents = parseDocuments(body, format);
    const result: ImportResponse = { imported: 0, duplicates: 0, failed: 0, errors: [] };

    const report = (index: number, message: string) => {
      result.failed += 1;
      if (result.errors.length < MAX_REPORTED_ERRORS) {
        result.errors.push(`#${index + 1}: ${message}`);
      }
    };

    for (const [index, document] of documents.entries()) {
      if (!document.ok) {
        report(index, document.error);
        continue;
      }
      const parsed = intelligenceDocumentSchema.safeParse(document.value);
      if (!parsed.success) {
        report(index, describeIssues(parsed.error).join('; '));
        continue;
      }

      const row = this.normalize(parsed.data, collection);
      if (typeof row === 'string') {
        report(index, row);
        continue;
      }

      const outcome = await this.fingerprintRepo.registerIfAbsent(row.fingerprint, row.uuid);
      if (outcome === 'duplicate') {
        result.duplicates += 1;
        continue;
      }

      try {
        await this.intelligenceRepo.importRow(collection, row);
      } catch (err) {
        await this.releaseFingerprint(row.fingerprint, row.uuid);
        report(index, err instanceof Error ? err.message : String(err));
        continue;
      }

      result.imported += 1;
      if (collection === 'archived') await this.indexer.index(row);
    }

    this.logger.info('Collection imported', {
      collection,
      format,
      imported: result.imported,
      duplicates: result.duplicates,
      failed: result.failed,
    });
    return result;
  }

  // ── Private ──

  /** Fit a document to the collection's states. Returns an error message when it cannot. */
  private normalize(doc: IntelligenceDocument, collection: Partition): IntelligenceRow | string {
    const now = this.now().toISOString();
    const row: IntelligenceRow = {
      ...doc,
      created_at: doc.created_at ?? now,
      updated_at: doc.updated_at ?? now,
    };

    if (collection !== 'cached') {
      if (row.state !== collection) {
        return `state "${row.state}" does not belong in ${collection}`;
      }
      // The max score is always derived from the rating, never taken from the document.
      const { maxRateScore, maxRateClass } = summarizeRating(row.rate);
      const threshold = row.appendix.score_threshold;
      if (threshold !== undefined && route(row.rate, threshold).partition !== collection) {
        return `max rating ${maxRateScore} at threshold ${threshold} does not belong in ${collection}`;
      }
      return {
        ...row,
        lease_token: null,
        lease_expires_at: null,
        appendix: { ...row.appendix, max_rate_score: maxRateScore, max_rate_class: maxRateClass },
      };
    }

    switch (row.state) {
      case 'pending':
      case 'failed':
        return { ...row, lease_token: null, lease_expires_at: null };
      case 'analyzing':
        // The lease died with the exporting process; the attempt stays counted.
        return {
          ...row,
          state: 'failed',
          lease_token: null,
          lease_expires_at: null,
          next_attempt_at: now,
          last_error: row.last_error ?? 'lease lost in export',
        };
      default:
        return `state "${row.state}" does not belong in cached`;
    }
  }

  private async releaseFingerprint(fingerprint: string, uuid: string): Promise<void> {
    try {
      await this.fingerprintRepo.release(fingerprint, uuid);
    } catch (err) {
      this.logger.error('Failed to release fingerprint after import error', {
        fingerprint,
        uuid,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

function parseParams(params: unknown): PortabilityParams {
  const parsed = portabilityParamsSchema.safeParse(params);
  if (!parsed.success) {
    throw new ValidationError('Invalid collection parameters', {
      issues: describeIssues(parsed.error),
    });
  }
  return parsed.data;
}

function serialize(rows: IntelligenceRow[], format: ExportFormat): string {
  if (format === 'json') return JSON.stringify(rows);
  return rows.map((row) => JSON.stringify(row) + '\n').join('');
}

type ParsedDocument = { ok: true; value: unknown } | { ok: false; error: string };

/** A `json` body is all or nothing; JSONL is judged line by line, blank lines skipped. */
function parseDocuments(body: string, format: ExportFormat): ParsedDocument[] {
  if (format === 'json') {
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (err) {
      throw new ValidationError('Invalid JSON body', {
        cause: err instanceof Error ? err.message : String(err),
      });
    }
    if (!Array.isArray(parsed)) {
      throw new ValidationError('JSON import body must be an array');
    }
    return parsed.map((value: unknown) => ({ ok: true, value }));
  }

  return body
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line): ParsedDocument => {
      try {
        return { ok: true, value: JSON.parse(line) };
      } catch (err) {
        return {
          ok: false,
          error: `invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
        };
      }
    });
}
