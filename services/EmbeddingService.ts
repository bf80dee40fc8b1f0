import { BaseService } from './base/BaseService';
import { EmbeddingError, ValidationError } from './base/ServiceError';
import type { IEmbeddingProvider, ILLMContext } from '../shared/llm-types';
import { withRetry, withTimeout, type RetryPolicy } from '../utils/backoff';
import { mapWithConcurrency } from '../utils/concurrency';
import { classifyError } from '../utils/errorClassification';

export interface EmbeddingServiceConfig {
  /** Vector length every returned embedding must have. */
  dimension: number;
  /** Texts per provider call. */
  batchSize?: number;
  /** Provider calls in flight at once. */
  concurrency?: number;
  /** Per-call timeout in milliseconds. */
  timeoutMs?: number;
  retry?: Partial<RetryPolicy>;
}

interface EmbeddingServiceDeps {
  provider: IEmbeddingProvider;
}

const DEFAULT_BATCH_SIZE = 16;
const DEFAULT_CONCURRENCY = 4;
const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Embeds texts through the configured provider with batching, bounded
 * concurrency, per-call timeouts and retries. Either every input gets a
 * vector of the configured dimension or the call throws.
 */
export class EmbeddingService extends BaseService<EmbeddingServiceDeps> {
  private readonly config: Required<Omit<EmbeddingServiceConfig, 'retry'>> & { retry: Partial<RetryPolicy> };

  constructor(deps: EmbeddingServiceDeps, config: EmbeddingServiceConfig) {
    super('EmbeddingService', deps);
    this.config = {
      dimension: config.dimension,
      batchSize: config.batchSize ?? DEFAULT_BATCH_SIZE,
      concurrency: config.concurrency ?? DEFAULT_CONCURRENCY,
      timeoutMs: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      retry: config.retry ?? {},
    };

    for (const key of ['dimension', 'batchSize', 'concurrency', 'timeoutMs'] as const) {
      const value = this.config[key];
      if (!Number.isInteger(value) || value <= 0) {
        throw new ValidationError(`EmbeddingService ${key} must be a positive integer, got ${value}`);
      }
    }

    const providerDimension = deps.provider.capabilities.dimensions;
    if (providerDimension !== this.config.dimension) {
      this.logWarn(`Provider ${deps.provider.providerName} reports ${providerDimension} dimensions, configured ${this.config.dimension}`);
    }
  }

  get dimension(): number {
    return this.config.dimension;
  }

  /**
   * @returns One vector per text, in input order
   * @throws EmbeddingError PROVIDER_FAILURE once retries are exhausted,
   *   DIMENSION_MISMATCH when the provider returns a wrong-length vector
   */
  async embed(texts: string[], context?: ILLMContext): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    return this.execute('embed', async () => {
      const batchSize = Math.min(this.config.batchSize, this.deps.provider.capabilities.maxBatchSize ?? Infinity);
      const batches: string[][] = [];
      for (let i = 0; i < texts.length; i += batchSize) {
        batches.push(texts.slice(i, i + batchSize));
      }

      const results = await mapWithConcurrency(batches, this.config.concurrency, (batch, index) =>
        this.embedBatch(batch, index * batchSize, context)
      );
      return results.flat();
    }, { textCount: texts.length });
  }

  /**
   * Embed a single query text with one provider call.
   */
  async embedQuery(text: string, context?: ILLMContext): Promise<number[]> {
    const { provider } = this.deps;
    const vector = await this.callProvider(
      () => provider.embedQuery(text, context),
      `${provider.providerName}.embedQuery`,
      { offset: 0, count: 1 }
    );
    this.assertDimensions([vector], 0);
    return vector;
  }

  private async embedBatch(texts: string[], offset: number, context?: ILLMContext): Promise<number[][]> {
    const { provider } = this.deps;
    const vectors = await this.callProvider(
      async () => {
        const result = await provider.embedDocuments(texts, context);
        if (result.length !== texts.length) {
          throw new EmbeddingError(
            'PROVIDER_FAILURE',
            `Provider returned ${result.length} vectors for ${texts.length} texts`,
            { offset, expected: texts.length, received: result.length }
          );
        }
        return result;
      },
      `${provider.providerName}.embedDocuments`,
      { offset, count: texts.length }
    );
    this.assertDimensions(vectors, offset);
    return vectors;
  }

  private async callProvider<T>(
    call: () => Promise<T>,
    operation: string,
    batch: { offset: number; count: number }
  ): Promise<T> {
    let attempts = 0;
    try {
      return await withRetry(
        () => {
          attempts++;
          return withTimeout(call, this.config.timeoutMs, operation);
        },
        error => classifyError(error).retryable,
        this.config.retry,
        {
          onRetry: (error, attempt, delayMs) =>
            this.logWarn(`${operation} attempt ${attempt + 1} failed, retrying in ${delayMs}ms:`, error),
        }
      );
    } catch (error) {
      if (error instanceof EmbeddingError && error.code === 'DIMENSION_MISMATCH') {
        throw error;
      }
      const { retryable } = classifyError(error);
      const message = error instanceof Error ? error.message : String(error);
      throw new EmbeddingError(
        'PROVIDER_FAILURE',
        `Embedding texts ${batch.offset}..${batch.offset + batch.count - 1} failed after ${attempts} attempt(s): ${message}`,
        { ...batch, attempts, cause: message },
        retryable
      );
    }
  }

  private assertDimensions(vectors: number[][], offset: number): void {
    const mismatched = vectors
      .map((vector, i) => ({ index: offset + i, length: vector.length }))
      .filter(v => v.length !== this.config.dimension);

    if (mismatched.length > 0) {
      throw new EmbeddingError(
        'DIMENSION_MISMATCH',
        `Expected vectors of dimension ${this.config.dimension}, got ${mismatched[0].length} at index ${mismatched[0].index}`,
        { expected: this.config.dimension, mismatched }
      );
    }
  }
}
