/**
 * Read side of the pipeline: single-item lookup and the query interface.
 * Filter queries run against one collection; vector modes delegate to
 * SimilaritySearchService. Every mode returns { results, total }.
 */

import type { IIntelligenceRepository } from '../repositories/IIntelligenceRepository.js';
import type { IntelligenceResponse, QueryResponse } from '../types/api.js';
import { NotFoundError, ValidationError } from '../errors.js';
import { describeIssues, filterQuerySchema, searchModeSchema } from '../schemas.js';
import type { SimilaritySearchService } from './SimilaritySearchService.js';
import { toIntelligenceResponse } from './intelligence-mapper.js';

export class IntelligenceQueryService {
  constructor(
    private readonly intelligenceRepo: IIntelligenceRepository,
    private readonly similarity: SimilaritySearchService
  ) {}

  async getByUuid(uuid: string): Promise<IntelligenceResponse> {
    const located = await this.intelligenceRepo.findByUuid(uuid);
    if (!located) {
      throw new NotFoundError(`Intelligence "${uuid}" not found`);
    }
    return toIntelligenceResponse(located.row, located.partition, {
      includeRawContent: true,
    });
  }

  async query(input: unknown): Promise<QueryResponse> {
    const mode = searchModeSchema.safeParse(
      typeof input === 'object' && input !== null && 'searchMode' in input
        ? input.searchMode
        : undefined
    );
    if (!mode.success) {
      throw new ValidationError('Invalid searchMode', { issues: describeIssues(mode.error) });
    }

    switch (mode.data) {
      case 'vector_text':
        return this.similarity.searchByText(input);
      case 'vector_similar':
        return this.similarity.searchByReference(input);
      case 'filter':
        return this.filter(input);
    }
  }

  /**
   * Filter query. OR within a list field, AND across fields;
   * newest publish time first.
   */
  async filter(input: unknown): Promise<QueryResponse> {
    const parsed = filterQuerySchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError('Invalid query', { issues: describeIssues(parsed.error) });
    }
    const q = parsed.data;

    const { rows, total } = await this.intelligenceRepo.query(
      q.collection,
      {
        period: { start: q.startTime, end: q.endTime },
        locations: nonEmpty(q.locations),
        people: nonEmpty(q.people),
        organizations: nonEmpty(q.organizations),
        keywords: q.keywords || undefined,
        minScore: q.threshold,
      },
      { limit: q.perPage, offset: (q.page - 1) * q.perPage }
    );

    return {
      results: rows.map((row) => toIntelligenceResponse(row, q.collection)),
      total,
    };
  }
}

function nonEmpty(values: string[] | undefined): string[] | undefined {
  const cleaned = values?.map((v) => v.trim()).filter(Boolean);
  return cleaned && cleaned.length > 0 ? cleaned : undefined;
}
