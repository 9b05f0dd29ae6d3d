export type { IEmbeddingProvider, EmbeddingPurpose } from './IEmbeddingProvider.js';
export { OpenAIEmbeddingProvider } from './OpenAIEmbeddingProvider.js';
export { VoyageEmbeddingProvider } from './VoyageEmbeddingProvider.js';
export type { IClassificationProvider, CompletionRequest } from './IClassificationProvider.js';
export { OpenAIClassificationProvider } from './OpenAIClassificationProvider.js';
export type { ILogProvider, LogEvent, LogFields, LogLevel } from './ILogProvider.js';
export { LOG_LEVELS } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
export { AxiomLogProvider } from './AxiomLogProvider.js';
