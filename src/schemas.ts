/**
 * Zod schemas for pipeline input and for the classifier's structured reply.
 * A reply is either a full analysis or the short non-intelligence form.
 */

import { z } from 'zod';
import { ParseError } from './errors.js';
import type { ClassificationResult } from './types/models.js';

// ── Feed records ──

export const feedRecordSchema = z.object({
  sourceUrl: z.string().trim().min(1, 'sourceUrl is required'),
  title: z.string().trim().optional(),
  publishedAt: z
    .string()
    .refine((v) => !Number.isNaN(Date.parse(v)), 'publishedAt must be an ISO-8601 date'),
  rawContent: z.string().trim().min(1, 'rawContent must not be empty'),
});

// ── Classifier reply ──

export const NON_INTELLIGENCE_TAXONOMY = 'non_intelligence';

const stringList = z.array(z.string()).default([]);
const narrative = (field: string) =>
  z.string({ required_error: `${field} is required` }).trim().min(1, `${field} must not be empty`);

export const ratingSchema = z.record(
  z.string().min(1),
  z.number().finite().min(0, 'rating must be >= 0').max(10, 'rating must be <= 10')
);

export const valuableReplySchema = z.object({
  time: stringList,
  location: stringList,
  geography: z.string().nullish(),
  people: stringList,
  organization: stringList,
  event_title: narrative('event_title'),
  event_brief: narrative('event_brief'),
  event_text: narrative('event_text'),
  taxonomy: z.string().trim().min(1),
  sub_category: stringList,
  impact: z.string().default(''),
  reason: z.string().default(''),
  rate: ratingSchema,
  tips: z.string().default(''),
});

export const nonIntelligenceReplySchema = z.object({
  taxonomy: z.literal(NON_INTELLIGENCE_TAXONOMY),
  reason: z.string().default(''),
});

export type ValuableReply = z.infer<typeof valuableReplySchema>;
export type NonIntelligenceReply = z.infer<typeof nonIntelligenceReplySchema>;

const FENCE = /^```[\w-]*\s*\n?([\s\S]*?)\n?\s*```$/;

export function stripCodeFences(reply: string): string {
  const trimmed = reply.trim();
  const match = FENCE.exec(trimmed);
  return match?.[1] !== undefined ? match[1].trim() : trimmed;
}

/**
 * Parse and validate a raw model reply.
 * Throws ParseError on malformed JSON or a schema violation.
 */
export function parseClassificationReply(reply: string): ClassificationResult {
  let json: unknown;
  try {
    json = JSON.parse(stripCodeFences(reply));
  } catch (err) {
    throw new ParseError('AI reply is not valid JSON', {
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  if (
    typeof json === 'object' &&
    json !== null &&
    'taxonomy' in json &&
    json.taxonomy === NON_INTELLIGENCE_TAXONOMY
  ) {
    const parsed = nonIntelligenceReplySchema.safeParse(json);
    if (!parsed.success) throw schemaError(parsed.error);
    return {
      title: '',
      brief: '',
      text: '',
      entities: { times: [], locations: [], people: [], organizations: [], geography: null },
      taxonomy: NON_INTELLIGENCE_TAXONOMY,
      subCategories: [],
      rate: {},
      impact: '',
      reason: parsed.data.reason,
      tips: '',
      nonIntelligence: true,
    };
  }

  const parsed = valuableReplySchema.safeParse(json);
  if (!parsed.success) throw schemaError(parsed.error);
  const r = parsed.data;

  return {
    title: r.event_title,
    brief: r.event_brief,
    text: r.event_text,
    entities: {
      times: r.time,
      locations: r.location,
      people: r.people,
      organizations: r.organization,
      geography: r.geography ?? null,
    },
    taxonomy: r.taxonomy,
    subCategories: r.sub_category,
    rate: r.rate,
    impact: r.impact,
    reason: r.reason,
    tips: r.tips,
    nonIntelligence: false,
  };
}

function schemaError(error: z.ZodError): ParseError {
  const issues = error.issues.map((i) => ({
    path: i.path.join('.'),
    message: i.message,
  }));
  return new ParseError(
    `AI reply failed validation: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`,
    { issues }
  );
}

// ── Query requests ──

export const MAX_PER_PAGE = 100;
export const DEFAULT_PER_PAGE = 10;

const isoDate = z
  .string()
  .refine((v) => !Number.isNaN(Date.parse(v)), 'must be an ISO-8601 date');

const pagingSchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  perPage: z.coerce
    .number()
    .int()
    .min(1)
    .default(DEFAULT_PER_PAGE)
    .transform((n) => Math.min(n, MAX_PER_PAGE)),
});

export const filterQuerySchema = pagingSchema.extend({
  collection: z.enum(['cached', 'archived', 'low_value']).default('archived'),
  startTime: isoDate.optional(),
  endTime: isoDate.optional(),
  keywords: z.string().trim().optional(),
  threshold: z.coerce.number().min(0).max(10).optional(),
  locations: z.array(z.string()).optional(),
  people: z.array(z.string()).optional(),
  organizations: z.array(z.string()).optional(),
});

export const similarityOptionsSchema = pagingSchema.extend({
  inSummary: z.boolean().default(true),
  inFulltext: z.boolean().default(false),
  scoreThreshold: z.coerce.number().min(0).max(1).default(0.5),
});

export const textSimilaritySchema = similarityOptionsSchema.extend({
  text: z.string().trim().min(1, 'text is required'),
});

export const referenceSimilaritySchema = similarityOptionsSchema.extend({
  reference: z.string().trim().min(1, 'reference is required'),
});

export type FilterQuery = z.infer<typeof filterQuerySchema>;
export type SimilarityOptions = z.infer<typeof similarityOptionsSchema>;
export type TextSimilarityQuery = z.infer<typeof textSimilaritySchema>;
export type ReferenceSimilarityQuery = z.infer<typeof referenceSimilaritySchema>;

export const searchModeSchema = z.enum(['filter', 'vector_text', 'vector_similar']).default('filter');

// ── Manual ratings ──

export const manualRatingSchema = z.object({
  uuid: z.string().trim().min(1, 'uuid is required'),
  ratings: z
    .record(
      z.string().trim().min(1),
      z
        .number({ invalid_type_error: 'rating must be a number' })
        .finite()
        .min(0, 'rating must be >= 0')
        .max(10, 'rating must be <= 10')
        .refine((n) => Number.isInteger(n * 2), 'rating must be a multiple of 0.5')
    )
    .refine((r) => Object.keys(r).length > 0, 'ratings must not be empty'),
  timestamp: isoDate.optional(),
});

export type ManualRatingSubmission = z.infer<typeof manualRatingSchema>;

/** Flatten zod issues into "path: message" strings. */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`);
}

// ── Portable documents ──

const nullableString = z.string().nullable().default(null);

export const appendixSchema = z.object({
  time_got: z.string().optional(),
  time_published: z.string().nullable().optional(),
  time_archived: z.string().optional(),
  max_rate_class: z.string().optional(),
  max_rate_score: z.number().optional(),
  total_score: z.number().optional(),
  ai_provider: z.string().optional(),
  ai_model: z.string().optional(),
  prompt_version: z.string().optional(),
  score_threshold: z.number().optional(),
  manual_rating: ratingSchema.optional(),
  manual_rating_updated_at: z.string().optional(),
});

/** One exported row, as read back by bulk import. */
export const intelligenceDocumentSchema = z.object({
  uuid: z.string().uuid(),
  fingerprint: z.string().min(1),
  informant: z.string(),
  pub_time: nullableString,
  raw_title: nullableString,
  raw_content: z.string(),
  title: nullableString,
  brief: nullableString,
  text: nullableString,
  times: z.array(z.string()).default([]),
  locations: z.array(z.string()).default([]),
  people: z.array(z.string()).default([]),
  organizations: z.array(z.string()).default([]),
  geography: nullableString,
  impact: nullableString,
  reason: nullableString,
  tips: nullableString,
  taxonomy: nullableString,
  sub_category: z.array(z.string()).default([]),
  rate: ratingSchema.default({}),
  state: z.enum(['pending', 'analyzing', 'failed', 'archived', 'low_value']),
  attempts: z.number().int().min(0).default(0),
  lease_token: nullableString,
  lease_expires_at: nullableString,
  next_attempt_at: nullableString,
  last_error: nullableString,
  appendix: appendixSchema.default({}),
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
});

export type IntelligenceDocument = z.infer<typeof intelligenceDocumentSchema>;

export const portabilityParamsSchema = z.object({
  collection: z.enum(['cached', 'archived', 'low_value']),
  format: z.enum(['jsonl', 'json']).default('jsonl'),
  start: isoDate.optional(),
  end: isoDate.optional(),
});

export type PortabilityParams = z.infer<typeof portabilityParamsSchema>;

// ── Pipeline policy ──

export const policyPatchSchema = z
  .object({
    scoreThreshold: z.number().min(0).max(10),
    maxAttempts: z.number().int().min(1),
    leaseMs: z.number().int().min(1),
    aiTimeoutMs: z.number().int().min(1),
    retryBackoffMs: z.number().int().min(0),
  })
  .partial()
  .strict();

// ── Statistics ──

/** Any parseable date, normalized to UTC ISO-8601 so ranges compare as text. */
const isoInstant = isoDate.transform((v) => new Date(v).toISOString());

export const statisticsRangeSchema = z.object({
  start: isoInstant.optional(),
  end: isoInstant.optional(),
});

export const scoreDistributionParamsSchema = z.object({
  start: isoInstant,
  end: isoInstant,
});

export const statisticsPeriodSchema = z.enum(['hour', 'day', 'week', 'month']);

export type StatisticsPeriod = z.infer<typeof statisticsPeriodSchema>;
