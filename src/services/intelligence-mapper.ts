/**
 * Row → API response mapping shared by the read services.
 */

import type { AppendixResponse, IntelligenceResponse } from '../types/api.js';
import type { AppendixRow, IntelligenceRow } from '../types/database.js';
import type { Partition } from '../types/models.js';

export function toAppendixResponse(
  appendix: AppendixRow,
  vectorScore?: number
): AppendixResponse {
  const response: AppendixResponse = {
    timeGot: appendix.time_got ?? null,
    timePublished: appendix.time_published ?? null,
    timeArchived: appendix.time_archived ?? null,
    maxRateClass: appendix.max_rate_class ?? null,
    maxRateScore: appendix.max_rate_score ?? null,
    totalScore: appendix.total_score ?? null,
    aiProvider: appendix.ai_provider ?? null,
    aiModel: appendix.ai_model ?? null,
    promptVersion: appendix.prompt_version ?? null,
    scoreThreshold: appendix.score_threshold ?? null,
    manualRating: appendix.manual_rating ?? {},
    manualRatingUpdatedAt: appendix.manual_rating_updated_at ?? null,
  };
  if (vectorScore !== undefined) response.vectorScore = vectorScore;
  return response;
}

export function toIntelligenceResponse(
  row: IntelligenceRow,
  partition: Partition,
  opts?: { includeRawContent?: boolean; vectorScore?: number }
): IntelligenceResponse {
  const response: IntelligenceResponse = {
    uuid: row.uuid,
    informant: row.informant,
    pubTime: row.pub_time,
    title: row.title,
    brief: row.brief,
    text: row.text,
    times: row.times,
    locations: row.locations,
    people: row.people,
    organizations: row.organizations,
    geography: row.geography,
    impact: row.impact,
    reason: row.reason,
    tips: row.tips,
    taxonomy: row.taxonomy,
    subCategories: row.sub_category,
    rate: row.rate,
    state: row.state,
    partition,
    attempts: row.attempts,
    lastError: row.last_error,
    appendix: toAppendixResponse(row.appendix, opts?.vectorScore),
  };
  if (opts?.includeRawContent) response.rawContent = row.raw_content;
  return response;
}
