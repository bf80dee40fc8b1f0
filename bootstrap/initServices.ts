import Database from 'better-sqlite3';
import { logger } from '../utils/logger';
import type { RagConfig } from '../utils/config';
import { initDb } from '../models/db';
import runMigrations from '../models/runMigrations';

// Import models
import { JobModel } from '../models/JobModel';
import { SqliteVectorModel } from '../models/SqliteVectorModel';

// Import services
import { ChunkExtractor, type PdfTextParser } from '../services/ingestion/ChunkExtractor';
import { EmbeddingService } from '../services/EmbeddingService';
import { IngestPipeline } from '../services/ingestion/IngestPipeline';
import { QueryPipeline } from '../services/QueryPipeline';
import { JobCoordinator } from '../services/jobs/JobCoordinator';
import { OpenAIEmbeddingProvider, OpenAIGenerationProvider } from '../services/llm_providers/openai';
import type { IEmbeddingProvider, IGenerationProvider } from '../shared/llm-types';

export interface Models {
  jobModel: JobModel;
  vectorModel: SqliteVectorModel;
}

export interface Services {
  chunkExtractor: ChunkExtractor;
  embeddingService: EmbeddingService;
  ingestPipeline: IngestPipeline;
  queryPipeline: QueryPipeline;
  jobCoordinator: JobCoordinator;
}

export interface Providers {
  embeddingProvider: IEmbeddingProvider;
  generationProvider: IGenerationProvider;
}

export interface InitOptions {
  /** Open connection to use instead of `config.dbPath`. Migrations still run. */
  db?: Database.Database;
  /** Replaces the OpenAI providers. */
  providers?: Partial<Providers>;
  pdfParser?: PdfTextParser;
}

export interface RagRuntime {
  db: Database.Database;
  models: Models;
  services: Services;
  /** Stops the coordinator and waits for running jobs, then closes the database. */
  shutdown(): Promise<void>;
}

export async function initModels(db: Database.Database): Promise<Models> {
  logger.info('[Bootstrap] Initializing models...');

  const jobModel = new JobModel(db);
  logger.info('[Bootstrap] JobModel instantiated.');

  const vectorModel = new SqliteVectorModel(db);
  await vectorModel.initialize();
  logger.info('[Bootstrap] SqliteVectorModel initialized.');

  return { jobModel, vectorModel };
}

export function createProviders(config: RagConfig, overrides: Partial<Providers> = {}): Providers {
  return {
    embeddingProvider: overrides.embeddingProvider ?? new OpenAIEmbeddingProvider({
      apiKey: config.openaiApiKey,
      model: config.embedding.model,
      dimensions: config.embedding.dimension,
      batchSize: config.embedding.batchSize,
    }),
    generationProvider: overrides.generationProvider ?? new OpenAIGenerationProvider({
      apiKey: config.openaiApiKey,
      model: config.generation.model,
    }),
  };
}

export async function initServices(config: RagConfig, models: Models, providers: Providers, pdfParser?: PdfTextParser): Promise<Services> {
  logger.info('[Bootstrap] Initializing services...');

  const retry = { maxAttempts: config.calls.maxAttempts, baseDelayMs: config.calls.baseDelayMs };

  const chunkExtractor = new ChunkExtractor(config.chunking, { pdfParser });

  const embeddingService = new EmbeddingService(
    { provider: providers.embeddingProvider },
    {
      dimension: config.embedding.dimension,
      batchSize: config.embedding.batchSize,
      concurrency: config.embedding.concurrency,
      timeoutMs: config.calls.timeoutMs,
      retry,
    }
  );

  const ingestPipeline = new IngestPipeline(
    { chunkExtractor, embeddingService, vectorModel: models.vectorModel },
    {
      collectionName: config.retrieval.collectionName,
      distanceMetric: config.retrieval.distanceMetric,
    }
  );

  const queryPipeline = new QueryPipeline(
    { embeddingService, vectorModel: models.vectorModel, generationProvider: providers.generationProvider },
    {
      collectionName: config.retrieval.collectionName,
      maxContextChars: config.retrieval.maxContextChars,
      minScore: config.retrieval.minScore,
      maxTokens: config.generation.maxTokens,
      temperature: config.generation.temperature,
      timeoutMs: config.calls.timeoutMs,
      retry,
    }
  );

  const jobCoordinator = new JobCoordinator(
    { jobModel: models.jobModel, ingestPipeline, queryPipeline },
    {
      concurrency: config.jobs.concurrency,
      pollInterval: config.jobs.pollIntervalMs,
      maxStepAttempts: config.jobs.maxStepAttempts,
      stepRetry: { baseDelayMs: config.calls.baseDelayMs },
      defaultTopK: config.retrieval.topK,
    }
  );

  await models.vectorModel.ensureCollection(
    config.retrieval.collectionName,
    config.embedding.dimension,
    config.retrieval.distanceMetric
  );

  const services: Services = { chunkExtractor, embeddingService, ingestPipeline, queryPipeline, jobCoordinator };
  for (const [name, service] of Object.entries(services)) {
    await service.initialize();
    logger.debug(`[Bootstrap] ${name} initialized.`);
  }

  logger.info('[Bootstrap] Services initialized.');
  return services;
}

/**
 * Open the database, apply migrations and wire every model and service.
 */
export async function initRuntime(config: RagConfig, options: InitOptions = {}): Promise<RagRuntime> {
  const db = options.db ?? initDb(config.dbPath);
  runMigrations(db);

  const models = await initModels(db);
  const providers = createProviders(config, options.providers);
  const services = await initServices(config, models, providers, options.pdfParser);

  return {
    db,
    models,
    services,
    async shutdown() {
      logger.info('[Bootstrap] Shutting down...');
      await services.jobCoordinator.cleanup();
      if (!options.db && db.open) {
        db.close();
      }
      logger.info('[Bootstrap] Shutdown complete.');
    },
  };
}
