/**
 * Production container — Supabase repositories, OpenAI classification,
 * OpenAI or Voyage embeddings, Axiom or console logging.
 */

import { createContainer, type Container } from './container.js';
import { loadConfig, policyFromConfig, type Config } from './config.js';
import { getSupabaseClient } from './db.js';
import { SupabaseFingerprintRepository } from './repositories/SupabaseFingerprintRepository.js';
import { SupabaseIntelligenceRepository } from './repositories/SupabaseIntelligenceRepository.js';
import { SupabaseEmbeddingRepository } from './repositories/SupabaseEmbeddingRepository.js';
import { OpenAIClassificationProvider } from './providers/OpenAIClassificationProvider.js';
import { OpenAIEmbeddingProvider } from './providers/OpenAIEmbeddingProvider.js';
import { VoyageEmbeddingProvider } from './providers/VoyageEmbeddingProvider.js';
import { AxiomLogProvider } from './providers/AxiomLogProvider.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import type { IEmbeddingProvider } from './providers/IEmbeddingProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';

let cached: Container | null = null;

export function getProductionContainer(config: Config = loadConfig()): Container {
  if (cached) return cached;

  const db = getSupabaseClient({
    url: config.SUPABASE_URL,
    serviceRoleKey: config.SUPABASE_SERVICE_ROLE_KEY,
  });

  cached = createContainer({
    fingerprintRepo: new SupabaseFingerprintRepository(db),
    intelligenceRepo: new SupabaseIntelligenceRepository(db),
    embeddingRepo: new SupabaseEmbeddingRepository(db),
    embeddingProvider: createEmbeddingProvider(config),
    classificationProvider: new OpenAIClassificationProvider({
      apiKey: config.OPENAI_API_KEY,
      baseURL: config.AI_BASE_URL,
      model: config.AI_MODEL,
    }),
    logProvider: createLogProvider(config),
    settings: {
      policy: policyFromConfig(config),
      concurrency: config.WORKER_CONCURRENCY,
      pollIntervalMs: config.POLL_INTERVAL_MS,
      promptVersion: config.PROMPT_VERSION,
      language: config.OUTPUT_LANGUAGE,
      embedSpans: {
        inSummary: config.EMBED_SUMMARY,
        inFulltext: config.EMBED_FULLTEXT,
      },
    },
  });

  return cached;
}

function createEmbeddingProvider(config: Config): IEmbeddingProvider {
  if (config.EMBEDDING_PROVIDER === 'voyage') {
    return new VoyageEmbeddingProvider({
      apiKey: config.VOYAGE_API_KEY,
      dimensions: config.EMBEDDING_DIMENSIONS,
    });
  }
  return new OpenAIEmbeddingProvider({
    apiKey: config.OPENAI_API_KEY,
    baseURL: config.AI_BASE_URL,
    dimensions: config.EMBEDDING_DIMENSIONS,
  });
}

// Axiom logging when configured, console otherwise.
function createLogProvider(config: Config): ILogProvider {
  if (config.AXIOM_API_KEY && config.AXIOM_DATASET) {
    return new AxiomLogProvider({
      apiToken: config.AXIOM_API_KEY,
      dataset: config.AXIOM_DATASET,
      service: 'intelligence-pipeline',
      minLevel: config.LOG_LEVEL,
    });
  }
  return new ConsoleLogProvider({ outputToConsole: true, minLevel: config.LOG_LEVEL, retain: 0 });
}
