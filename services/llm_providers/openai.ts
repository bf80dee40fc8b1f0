import { ChatOpenAI, OpenAIEmbeddings } from "@langchain/openai";
import { HumanMessage, SystemMessage, type MessageContent } from "@langchain/core/messages";
import {
  IEmbeddingProvider,
  IEmbeddingProviderCapabilities,
  IGenerationProvider,
  IGenerationRequest,
  ILLMContext,
} from "../../shared/llm-types";
import { GenerationError, ValidationError } from "../base/ServiceError";
import { logger } from "../../utils/logger";

export interface OpenAIProviderOptions {
  apiKey?: string;
  model: string;
}

/**
 * Read at the first provider call, so commands that never reach OpenAI run
 * without a key.
 */
function resolveApiKey(apiKey?: string): string {
  const key = apiKey || process.env.OPENAI_API_KEY;
  if (!key) {
    throw new ValidationError("OPENAI_API_KEY is not set");
  }
  return key;
}

/**
 * Flatten message content (a string or a list of parts) to plain text.
 */
export function contentToText(content: MessageContent): string {
  if (typeof content === "string") {
    return content;
  }
  return content
    .map(part => (typeof part === "object" && "text" in part && typeof part.text === "string" ? part.text : ""))
    .join("");
}

type EmbeddingProviderOptions = OpenAIProviderOptions & { dimensions: number; batchSize?: number };

/**
 * Embeddings through OpenAI. Retries are disabled on the client; the
 * embedding service applies its own timeout and backoff. The client is
 * created on the first call.
 */
export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  private embeddings?: OpenAIEmbeddings;
  private readonly options: EmbeddingProviderOptions;

  readonly providerName: string;
  readonly capabilities: IEmbeddingProviderCapabilities;

  constructor(options: EmbeddingProviderOptions) {
    this.options = options;
    this.providerName = `OpenAI-${options.model}`;
    this.capabilities = {
      dimensions: options.dimensions,
      maxBatchSize: options.batchSize,
    };
  }

  async embedDocuments(texts: string[], context?: ILLMContext): Promise<number[][]> {
    logger.debug(`[${this.providerName}] embedDocuments called`, { textCount: texts.length, context });
    return this.client().embedDocuments(texts);
  }

  async embedQuery(text: string, context?: ILLMContext): Promise<number[]> {
    logger.debug(`[${this.providerName}] embedQuery called`, { textLength: text.length, context });
    return this.client().embedQuery(text);
  }

  private client(): OpenAIEmbeddings {
    if (!this.embeddings) {
      const { apiKey, model, dimensions, batchSize } = this.options;
      this.embeddings = new OpenAIEmbeddings({
        apiKey: resolveApiKey(apiKey),
        model,
        dimensions,
        batchSize,
        maxRetries: 0,
      });
      logger.info(`[OpenAIEmbeddingProvider] Initialized ${model} (${dimensions} dims)`);
    }
    return this.embeddings;
  }
}

/**
 * Chat completion through OpenAI, one system and one human message per call.
 */
export class OpenAIGenerationProvider implements IGenerationProvider {
  private readonly apiKey?: string;
  private readonly model: string;

  readonly providerName: string;

  constructor(options: OpenAIProviderOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.providerName = `OpenAI-${options.model}`;
  }

  async generate(request: IGenerationRequest, context?: ILLMContext): Promise<string> {
    logger.debug(`[${this.providerName}] generate called`, {
      context,
      promptLength: request.userContent.length,
      maxTokens: request.maxTokens,
    });

    const llm = new ChatOpenAI({
      apiKey: resolveApiKey(this.apiKey),
      model: this.model,
      temperature: request.temperature,
      maxTokens: request.maxTokens,
      maxRetries: 0,
    });

    const response = await llm.invoke([
      new SystemMessage(request.systemInstruction),
      new HumanMessage(request.userContent),
    ]);

    const text = contentToText(response.content).trim();
    if (!text) {
      throw new GenerationError("EMPTY_RESPONSE", `${this.providerName} returned an empty answer`);
    }
    return text;
  }
}
