/**
 * Environment configuration with validation.
 * Required variables throw on missing; optional ones fall back to documented defaults.
 */

import { z } from 'zod';
import type { PipelinePolicy } from './types/models.js';
import { LOG_LEVELS } from './providers/ILogProvider.js';

const booleanFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback ? 'true' : 'false')
    .transform((v) => v === 'true' || v === '1');

// ── Schema ──

const configSchema = z
  .object({
    // Required
    SUPABASE_URL: z.string().url('SUPABASE_URL must be a URL'),
    SUPABASE_SERVICE_ROLE_KEY: z.string().min(1, 'SUPABASE_SERVICE_ROLE_KEY is required'),
    OPENAI_API_KEY: z.string().min(1, 'OPENAI_API_KEY is required'),

    // AI classification
    AI_MODEL: z.string().default('gpt-4o-mini'),
    AI_BASE_URL: z.string().url().optional(),
    PROMPT_VERSION: z.string().regex(/^[\w.-]+$/).default('v22'),
    OUTPUT_LANGUAGE: z.string().default('English'),

    // Pipeline
    SCORE_THRESHOLD: z.coerce.number().min(0).max(10).default(6),
    WORKER_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),
    AI_TIMEOUT_MS: z.coerce.number().int().min(1000).default(120_000),
    LEASE_MS: z.coerce.number().int().min(1000).default(300_000),
    MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
    RETRY_BACKOFF_MS: z.coerce.number().int().min(0).default(30_000),
    POLL_INTERVAL_MS: z.coerce.number().int().min(100).default(5_000),

    // Embeddings
    EMBED_SUMMARY: booleanFlag(true),
    EMBED_FULLTEXT: booleanFlag(false),
    EMBEDDING_PROVIDER: z.enum(['openai', 'voyage']).default('openai'),
    EMBEDDING_DIMENSIONS: z.coerce.number().int().min(1).optional(),
    VOYAGE_API_KEY: z.string().optional(),

    // Logging
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
    AXIOM_API_KEY: z.string().optional(),
    AXIOM_DATASET: z.string().optional(),

    // HTTP
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  })
  .refine((c) => c.LEASE_MS > c.AI_TIMEOUT_MS, {
    message: 'LEASE_MS must be greater than AI_TIMEOUT_MS',
    path: ['LEASE_MS'],
  })
  .refine((c) => c.EMBEDDING_PROVIDER !== 'voyage' || Boolean(c.VOYAGE_API_KEY), {
    message: 'VOYAGE_API_KEY is required when EMBEDDING_PROVIDER=voyage',
    path: ['VOYAGE_API_KEY'],
  });

// ── Exported type ──

export type Config = z.infer<typeof configSchema>;

// ── Loader ──

/**
 * Load and validate configuration from environment variables.
 *
 * Throws a ZodError with detailed messages if any required variable is
 * missing or any value fails validation.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): Config {
  return configSchema.parse(env);
}

/** The pipeline policy a worker pool starts with. */
export function policyFromConfig(config: Config): PipelinePolicy {
  return {
    scoreThreshold: config.SCORE_THRESHOLD,
    maxAttempts: config.MAX_ATTEMPTS,
    leaseMs: config.LEASE_MS,
    aiTimeoutMs: config.AI_TIMEOUT_MS,
    retryBackoffMs: config.RETRY_BACKOFF_MS,
  };
}
