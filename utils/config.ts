import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ValidationError } from '../services/base/ServiceError';
import { logger } from './logger';

const optionalNumber = (schema: z.ZodNumber) =>
  z.preprocess(value => (value === '' || value === undefined ? undefined : value), schema.optional());

const EnvSchema = z.object({
  RAG_DB_PATH: z.string().min(1).default('./data/rag.db'),
  OPENAI_API_KEY: z.string().min(1).optional(),
  RAG_EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
  RAG_EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(1024),
  RAG_EMBED_BATCH_SIZE: z.coerce.number().int().positive().default(16),
  RAG_EMBED_CONCURRENCY: z.coerce.number().int().positive().default(4),
  RAG_GENERATION_MODEL: z.string().min(1).default('gpt-4o-mini'),
  RAG_GENERATION_MAX_TOKENS: z.coerce.number().int().positive().default(1024),
  RAG_GENERATION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  RAG_CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
  RAG_CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(200),
  RAG_COLLECTION: z.string().min(1).default('docs'),
  RAG_DISTANCE_METRIC: z.enum(['cosine', 'dot', 'euclidean']).default('cosine'),
  RAG_TOP_K: z.coerce.number().int().positive().default(5),
  RAG_MAX_CONTEXT_CHARS: z.coerce.number().int().positive().default(12000),
  RAG_MIN_SCORE: optionalNumber(z.coerce.number()),
  RAG_CALL_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  RAG_PROVIDER_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  RAG_RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  RAG_STEP_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  RAG_JOB_CONCURRENCY: z.coerce.number().int().positive().default(4),
  RAG_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
}).refine(env => env.RAG_CHUNK_OVERLAP < env.RAG_CHUNK_SIZE, {
  message: 'RAG_CHUNK_OVERLAP must be smaller than RAG_CHUNK_SIZE',
  path: ['RAG_CHUNK_OVERLAP'],
});

export interface RagConfig {
  dbPath: string;
  openaiApiKey?: string;
  embedding: {
    model: string;
    dimension: number;
    batchSize: number;
    concurrency: number;
  };
  generation: {
    model: string;
    maxTokens: number;
    temperature: number;
  };
  chunking: {
    chunkSize: number;
    chunkOverlap: number;
  };
  retrieval: {
    collectionName: string;
    distanceMetric: 'cosine' | 'dot' | 'euclidean';
    topK: number;
    maxContextChars: number;
    minScore?: number;
  };
  calls: {
    timeoutMs: number;
    maxAttempts: number;
    baseDelayMs: number;
  };
  jobs: {
    concurrency: number;
    pollIntervalMs: number;
    maxStepAttempts: number;
  };
}

/**
 * Load a .env file into process.env if it exists. Variables already set
 * in the environment win.
 */
export function loadEnvFile(envPath: string = path.resolve(process.cwd(), '.env')): boolean {
  if (!fs.existsSync(envPath)) {
    logger.debug(`[Config] .env file not found at: ${envPath}. Proceeding without it.`);
    return false;
  }
  const result = dotenv.config({ path: envPath });
  if (result.error) {
    throw new ValidationError(`Failed to load ${envPath}: ${result.error.message}`);
  }
  logger.info(`[Config] Loaded .env file from: ${envPath}`);
  return true;
}

/**
 * Build a validated configuration from environment variables.
 * @throws ValidationError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RagConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  const e = parsed.data;

  return {
    dbPath: e.RAG_DB_PATH,
    openaiApiKey: e.OPENAI_API_KEY,
    embedding: {
      model: e.RAG_EMBEDDING_MODEL,
      dimension: e.RAG_EMBEDDING_DIMENSION,
      batchSize: e.RAG_EMBED_BATCH_SIZE,
      concurrency: e.RAG_EMBED_CONCURRENCY,
    },
    generation: {
      model: e.RAG_GENERATION_MODEL,
      maxTokens: e.RAG_GENERATION_MAX_TOKENS,
      temperature: e.RAG_GENERATION_TEMPERATURE,
    },
    chunking: {
      chunkSize: e.RAG_CHUNK_SIZE,
      chunkOverlap: e.RAG_CHUNK_OVERLAP,
    },
    retrieval: {
      collectionName: e.RAG_COLLECTION,
      distanceMetric: e.RAG_DISTANCE_METRIC,
      topK: e.RAG_TOP_K,
      maxContextChars: e.RAG_MAX_CONTEXT_CHARS,
      minScore: e.RAG_MIN_SCORE,
    },
    calls: {
      timeoutMs: e.RAG_CALL_TIMEOUT_MS,
      maxAttempts: e.RAG_PROVIDER_MAX_ATTEMPTS,
      baseDelayMs: e.RAG_RETRY_BASE_DELAY_MS,
    },
    jobs: {
      concurrency: e.RAG_JOB_CONCURRENCY,
      pollIntervalMs: e.RAG_POLL_INTERVAL_MS,
      maxStepAttempts: e.RAG_STEP_MAX_ATTEMPTS,
    },
  };
}
