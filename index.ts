export * from './shared/types';
export type {
  IEmbeddingProvider,
  IEmbeddingProviderCapabilities,
  IGenerationProvider,
  IGenerationRequest,
  ILLMContext,
} from './shared/llm-types';

export * from './services/base/ServiceError';
export { ChunkExtractor, deriveSourceId, detectFormat, type PdfTextParser } from './services/ingestion/ChunkExtractor';
export { splitText } from './services/ingestion/SentenceSplitter';
export { EmbeddingService, type EmbeddingServiceConfig } from './services/EmbeddingService';
export { IngestPipeline, recordIdFor, type IngestPipelineConfig } from './services/ingestion/IngestPipeline';
export { QueryPipeline, buildContextBlock, buildUserContent, type QueryPipelineConfig } from './services/QueryPipeline';
export { JobCoordinator, type CancelOutcome, type JobCoordinatorConfig, type JobCoordinatorEvents } from './services/jobs/JobCoordinator';
export { OpenAIEmbeddingProvider, OpenAIGenerationProvider } from './services/llm_providers/openai';

export { JobModel } from './models/JobModel';
export { SqliteVectorModel } from './models/SqliteVectorModel';
export { initDb } from './models/db';
export { runMigrations } from './models/runMigrations';

export { loadConfig, loadEnvFile, type RagConfig } from './utils/config';
export { initRuntime, type InitOptions, type RagRuntime } from './bootstrap/initServices';
