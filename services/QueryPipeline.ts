import { BaseService } from './base/BaseService';
import { GenerationError, StoreError, ValidationError } from './base/ServiceError';
import { EmbeddingService } from './EmbeddingService';
import { InlineStepContext, type StepContext } from './jobs/StepContext';
import { GeneratedAnswerSchema, SourceChunkSchema, VectorSchema } from '../shared/schemas/jobSchemas';
import type { IGenerationProvider, ILLMContext } from '../shared/llm-types';
import type { AnswerResult, IVectorStoreModel, SourceChunk } from '../shared/types';
import { withRetry, withTimeout, type RetryPolicy } from '../utils/backoff';
import { classifyError } from '../utils/errorClassification';
import { DEFAULT_COLLECTION_NAME } from './ingestion/constants';

export const QUERY_STEPS = {
  EMBED: 'embed-question',
  SEARCH: 'search-collection',
  GENERATE: 'generate-answer',
} as const;

export const SYSTEM_INSTRUCTION =
  'You answer questions using only the provided context. ' +
  'If the context does not contain the answer, say that you do not know.';

export const NO_CONTEXT_MARKER = '[No relevant context was found for this question.]';

interface QueryPipelineDeps {
  embeddingService: EmbeddingService;
  vectorModel: IVectorStoreModel;
  generationProvider: IGenerationProvider;
}

export interface QueryPipelineConfig {
  collectionName?: string;
  /** Upper bound on the characters of the context block. */
  maxContextChars?: number;
  /** Results scoring below this are not used as context. */
  minScore?: number;
  maxTokens?: number;
  temperature?: number;
  /** Per-call timeout for the generation provider. */
  timeoutMs?: number;
  retry?: Partial<RetryPolicy>;
}

export interface ContextBlock {
  text: string;
  included: SourceChunk[];
}

const CONTEXT_SEPARATOR = '\n\n';

/**
 * Join chunks, most relevant first, as `- [source] text` entries. Entries
 * that would push the block past `maxChars` are dropped together with every
 * less relevant one; an entry is never cut.
 */
export function buildContextBlock(chunks: readonly SourceChunk[], maxChars: number): ContextBlock {
  const entries: string[] = [];
  const included: SourceChunk[] = [];
  let length = 0;

  for (const chunk of chunks) {
    const entry = `- [${chunk.source}] ${chunk.text}`;
    const next = entries.length === 0 ? entry.length : length + CONTEXT_SEPARATOR.length + entry.length;
    if (next > maxChars) {
      break;
    }
    entries.push(entry);
    included.push(chunk);
    length = next;
  }

  return {
    text: entries.length > 0 ? entries.join(CONTEXT_SEPARATOR) : NO_CONTEXT_MARKER,
    included,
  };
}

export function buildUserContent(question: string, contextBlock: string): string {
  return [
    'Use the following context to answer the question.',
    '',
    'Context:',
    contextBlock,
    '',
    `Question: ${question}`,
    'Answer concisely using the context above.',
  ].join('\n');
}

/**
 * embed-question -> search-collection -> generate-answer.
 */
export class QueryPipeline extends BaseService<QueryPipelineDeps> {
  private readonly config: Required<Omit<QueryPipelineConfig, 'minScore' | 'retry'>> &
    Pick<QueryPipelineConfig, 'minScore'> & { retry: Partial<RetryPolicy> };

  constructor(deps: QueryPipelineDeps, config: QueryPipelineConfig = {}) {
    super('QueryPipeline', deps);
    this.config = {
      collectionName: config.collectionName ?? DEFAULT_COLLECTION_NAME,
      maxContextChars: config.maxContextChars ?? 12000,
      minScore: config.minScore,
      maxTokens: config.maxTokens ?? 1024,
      temperature: config.temperature ?? 0.2,
      timeoutMs: config.timeoutMs ?? 60000,
      retry: config.retry ?? {},
    };
  }

  async answer(question: string, topK: number, step: StepContext = new InlineStepContext()): Promise<AnswerResult> {
    const trimmed = question.trim();
    if (!trimmed) {
      throw new ValidationError('Question must not be empty');
    }
    if (!Number.isInteger(topK) || topK <= 0) {
      throw new ValidationError(`topK must be a positive integer, got ${topK}`);
    }

    return this.execute('answer', async () => {
      const context: ILLMContext = { taskType: 'query_embedding', jobId: step.jobId };

      const queryVector = await step.run(
        QUERY_STEPS.EMBED,
        () => this.deps.embeddingService.embedQuery(trimmed, context),
        VectorSchema
      );

      const retrieved = await step.run(
        QUERY_STEPS.SEARCH,
        () => this.search(queryVector, topK),
        SourceChunkSchema.array()
      );

      const { minScore } = this.config;
      const usable = minScore === undefined ? retrieved : retrieved.filter(chunk => chunk.score >= minScore);
      const contextBlock = buildContextBlock(usable, this.config.maxContextChars);

      if (contextBlock.included.length === 0) {
        this.logInfo(`No usable context for question (retrieved ${retrieved.length}), generating with no-context marker`);
      }

      const generated = await step.run(
        QUERY_STEPS.GENERATE,
        async () => ({
          answerText: await this.generate(buildUserContent(trimmed, contextBlock.text), step.jobId),
          numContexts: contextBlock.included.length,
        }),
        GeneratedAnswerSchema
      );

      return {
        answerText: generated.answerText,
        sourceChunks: contextBlock.included,
        numContexts: generated.numContexts,
      };
    }, { topK, jobId: step.jobId });
  }

  /**
   * A collection that does not exist yet has nothing to retrieve.
   */
  private async search(queryVector: number[], topK: number): Promise<SourceChunk[]> {
    try {
      const results = await this.deps.vectorModel.search(this.config.collectionName, queryVector, topK);
      return results.map(result => ({
        id: result.record.id,
        text: result.record.payload.text,
        source: result.record.payload.source,
        score: result.score,
      }));
    } catch (error) {
      if (error instanceof StoreError && error.code === 'COLLECTION_NOT_FOUND') {
        this.logWarn(`Collection '${this.config.collectionName}' does not exist, searching nothing`);
        return [];
      }
      throw error;
    }
  }

  private async generate(userContent: string, jobId?: string): Promise<string> {
    const { generationProvider } = this.deps;
    const operation = `${generationProvider.providerName}.generate`;
    let attempts = 0;

    try {
      return await withRetry(
        async () => {
          attempts++;
          const text = await withTimeout(
            () => generationProvider.generate(
              {
                systemInstruction: SYSTEM_INSTRUCTION,
                userContent,
                maxTokens: this.config.maxTokens,
                temperature: this.config.temperature,
              },
              { taskType: 'answer_generation', jobId }
            ),
            this.config.timeoutMs,
            operation
          );
          if (!text.trim()) {
            throw new GenerationError('EMPTY_RESPONSE', `${generationProvider.providerName} returned an empty answer`, { attempts });
          }
          return text;
        },
        error => classifyError(error).retryable,
        this.config.retry,
        {
          onRetry: (error, attempt, delayMs) =>
            this.logWarn(`${operation} attempt ${attempt + 1} failed, retrying in ${delayMs}ms:`, error),
        }
      );
    } catch (error) {
      if (error instanceof GenerationError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new GenerationError(
        'PROVIDER_FAILURE',
        `Answer generation failed after ${attempts} attempt(s): ${message}`,
        { attempts, cause: message },
        classifyError(error).retryable
      );
    }
  }
}
