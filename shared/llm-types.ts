export interface ILLMContext {
  jobId?: string;
  taskType: 'ingest_embedding' | 'query_embedding' | 'answer_generation' | string;
}

export interface IEmbeddingProviderCapabilities {
  dimensions: number;
  /** Largest number of texts the provider accepts in one call. */
  maxBatchSize?: number;
}

/**
 * Embedding capability. Implementations must return one vector per input
 * text, in input order.
 */
export interface IEmbeddingProvider {
  readonly providerName: string;
  readonly capabilities: IEmbeddingProviderCapabilities;

  embedDocuments(texts: string[], context?: ILLMContext): Promise<number[][]>;

  embedQuery(text: string, context?: ILLMContext): Promise<number[]>;
}

export interface IGenerationRequest {
  systemInstruction: string;
  userContent: string;
  maxTokens: number;
  temperature: number;
}

/**
 * Answer generation capability.
 */
export interface IGenerationProvider {
  readonly providerName: string;

  generate(request: IGenerationRequest, context?: ILLMContext): Promise<string>;
}
