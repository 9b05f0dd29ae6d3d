/**
 * Dependency wiring.
 * Constructs all services with their dependencies.
 * Production passes Supabase repositories and real providers (container.production.ts);
 * tests pass in-memory mocks.
 */

import type { IFingerprintRepository } from './repositories/IFingerprintRepository.js';
import type { IIntelligenceRepository } from './repositories/IIntelligenceRepository.js';
import type { IEmbeddingRepository } from './repositories/IEmbeddingRepository.js';
import type { IEmbeddingProvider } from './providers/IEmbeddingProvider.js';
import type { IClassificationProvider } from './providers/IClassificationProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { Middleware } from './middleware/pipeline.js';
import type { PipelinePolicy } from './types/models.js';
import { IngestionService } from './services/IngestionService.js';
import { StagingService } from './services/StagingService.js';
import { ClassificationService } from './services/ClassificationService.js';
import { ClassificationPipeline } from './services/ClassificationPipeline.js';
import { WorkerPool } from './services/WorkerPool.js';
import { EmbeddingIndexer, type IndexedSpans } from './services/EmbeddingIndexer.js';
import { SimilaritySearchService } from './services/SimilaritySearchService.js';
import { IntelligenceQueryService } from './services/IntelligenceQueryService.js';
import { ManualRatingService } from './services/ManualRatingService.js';
import { PortabilityService } from './services/PortabilityService.js';
import { StatisticsService } from './services/StatisticsService.js';
import { ScoringEngine, type ScoringConfig } from './services/ScoringEngine.js';
import { createLoggingMiddleware } from './middleware/logging.js';
import { createErrorHandler } from './middleware/error-handler.js';

export interface PipelineSettings {
  policy: PipelinePolicy;
  concurrency: number;
  pollIntervalMs: number;
  promptVersion: string;
  language: string;
  embedSpans: IndexedSpans;
  scoring?: ScoringConfig;
}

export interface Container {
  ingestionService: IngestionService;
  stagingService: StagingService;
  classificationService: ClassificationService;
  classificationPipeline: ClassificationPipeline;
  workerPool: WorkerPool;
  embeddingIndexer: EmbeddingIndexer;
  similarityService: SimilaritySearchService;
  queryService: IntelligenceQueryService;
  manualRatingService: ManualRatingService;
  portabilityService: PortabilityService;
  statisticsService: StatisticsService;
  logProvider: ILogProvider;
  logging: Middleware;
  errors: Middleware;
}

export function createContainer(deps: {
  fingerprintRepo: IFingerprintRepository;
  intelligenceRepo: IIntelligenceRepository;
  embeddingRepo: IEmbeddingRepository;
  embeddingProvider: IEmbeddingProvider;
  classificationProvider: IClassificationProvider;
  logProvider: ILogProvider;
  settings: PipelineSettings;
  /** Clock override for tests. */
  now?: () => Date;
}): Container {
  const { settings, now } = deps;

  const ingestionService = new IngestionService(
    deps.fingerprintRepo,
    deps.intelligenceRepo,
    deps.logProvider,
    { now }
  );
  const stagingService = new StagingService(deps.intelligenceRepo, { now });
  const classificationService = new ClassificationService(deps.classificationProvider, {
    promptVersion: settings.promptVersion,
    language: settings.language,
    now,
  });
  const embeddingIndexer = new EmbeddingIndexer(
    deps.embeddingProvider,
    deps.embeddingRepo,
    deps.intelligenceRepo,
    deps.logProvider,
    settings.embedSpans
  );
  const classificationPipeline = new ClassificationPipeline(
    stagingService,
    classificationService,
    embeddingIndexer,
    new ScoringEngine(settings.scoring),
    deps.logProvider,
    { now }
  );
  const workerPool = new WorkerPool(classificationPipeline, stagingService, deps.logProvider, {
    concurrency: settings.concurrency,
    pollIntervalMs: settings.pollIntervalMs,
    policy: settings.policy,
  });
  const similarityService = new SimilaritySearchService(
    deps.intelligenceRepo,
    deps.embeddingRepo,
    deps.embeddingProvider
  );
  const queryService = new IntelligenceQueryService(deps.intelligenceRepo, similarityService);
  const manualRatingService = new ManualRatingService(deps.intelligenceRepo, deps.logProvider, {
    now,
  });
  const portabilityService = new PortabilityService(
    deps.intelligenceRepo,
    deps.fingerprintRepo,
    embeddingIndexer,
    deps.logProvider,
    { now }
  );
  const statisticsService = new StatisticsService(deps.intelligenceRepo, { now });

  return {
    ingestionService,
    stagingService,
    classificationService,
    classificationPipeline,
    workerPool,
    embeddingIndexer,
    similarityService,
    queryService,
    manualRatingService,
    portabilityService,
    statisticsService,
    logProvider: deps.logProvider,
    logging: createLoggingMiddleware(deps.logProvider),
    errors: createErrorHandler(deps.logProvider),
  };
}
