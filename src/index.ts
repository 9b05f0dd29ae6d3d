/**
 * Library entry point.
 */

export { createContainer } from './container.js';
export type { Container, PipelineSettings } from './container.js';
export { getProductionContainer } from './container.production.js';
export { loadConfig, policyFromConfig } from './config.js';
export type { Config } from './config.js';
export { createRouter } from './api/router.js';
export { createApp } from './server.js';
export * from './errors.js';
export * from './providers/index.js';

export type { IFingerprintRepository, RegisterOutcome } from './repositories/IFingerprintRepository.js';
export type {
  IIntelligenceRepository,
  ClaimOptions,
  CountBucket,
  IntelligenceFilter,
  LocatedIntelligence,
  StatisticsGrouping,
} from './repositories/IIntelligenceRepository.js';
export type { IEmbeddingRepository, EmbeddingSearchOptions } from './repositories/IEmbeddingRepository.js';
export { SupabaseFingerprintRepository } from './repositories/SupabaseFingerprintRepository.js';
export { SupabaseIntelligenceRepository } from './repositories/SupabaseIntelligenceRepository.js';
export { SupabaseEmbeddingRepository } from './repositories/SupabaseEmbeddingRepository.js';

export { Fingerprinter } from './services/Fingerprinter.js';
export { IngestionService } from './services/IngestionService.js';
export { StagingService, backoffDelay } from './services/StagingService.js';
export type { ClaimedItem } from './services/StagingService.js';
export { ClassificationService } from './services/ClassificationService.js';
export type { ClassificationOutcome } from './services/ClassificationService.js';
export { ClassificationPipeline } from './services/ClassificationPipeline.js';
export type { ProcessOutcome } from './services/ClassificationPipeline.js';
export { WorkerPool } from './services/WorkerPool.js';
export type { DrainSummary } from './services/WorkerPool.js';
export { route, summarizeRating } from './services/ArchiveRouter.js';
export { ScoringEngine, DEFAULT_SCORING } from './services/ScoringEngine.js';
export { EmbeddingIndexer } from './services/EmbeddingIndexer.js';
export { SimilaritySearchService } from './services/SimilaritySearchService.js';
export { IntelligenceQueryService } from './services/IntelligenceQueryService.js';
export { ManualRatingService } from './services/ManualRatingService.js';
export { PortabilityService } from './services/PortabilityService.js';
export { StatisticsService } from './services/StatisticsService.js';

export type * from './types/models.js';
export type * from './types/api.js';
export type * from './types/database.js';
