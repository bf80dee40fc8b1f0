import type {
  IEmbeddingProvider,
  IEmbeddingProviderCapabilities,
  IGenerationProvider,
  IGenerationRequest,
} from '../../shared/llm-types';

/**
 * What the next provider call does: succeed, never settle, or reject.
 */
export type CallBehavior = 'ok' | 'hang' | Error;

function settle(behavior: CallBehavior): Promise<void> {
  if (behavior === 'hang') {
    return new Promise<void>(() => undefined);
  }
  if (behavior instanceof Error) {
    return Promise.reject(behavior);
  }
  return Promise.resolve();
}

/**
 * Bag-of-words vector: each lowercase token adds 1 to a bucket picked by a
 * string hash. Texts sharing words point the same way.
 */
export function embedText(text: string, dimensions: number): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  for (const token of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
    let hash = 0;
    for (const ch of token) {
      hash = (hash * 31 + ch.charCodeAt(0)) >>> 0;
    }
    vector[hash % dimensions] += 1;
  }
  return vector;
}

export interface FakeEmbeddingOptions {
  maxBatchSize?: number;
  /** Length of returned vectors when it should differ from `dimensions`. */
  returnDimensions?: number;
}

export class FakeEmbeddingProvider implements IEmbeddingProvider {
  readonly providerName = 'fake-embeddings';
  readonly capabilities: IEmbeddingProviderCapabilities;
  /** Texts of every call, in call order. */
  readonly calls: string[][] = [];

  private script: CallBehavior[] = [];
  private fallback: CallBehavior = 'ok';
  private readonly returnDimensions: number;

  constructor(dimensions: number = 8, options: FakeEmbeddingOptions = {}) {
    this.capabilities = {
      dimensions,
      maxBatchSize: options.maxBatchSize,
    };
    this.returnDimensions = options.returnDimensions ?? dimensions;
  }

  /** Behaviour of the next calls in order; afterwards calls use the fallback. */
  enqueue(...behaviors: CallBehavior[]): this {
    this.script.push(...behaviors);
    return this;
  }

  always(behavior: CallBehavior): this {
    this.fallback = behavior;
    return this;
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    await settle(this.script.shift() ?? this.fallback);
    return texts.map(text => embedText(text, this.returnDimensions));
  }

  async embedQuery(text: string): Promise<number[]> {
    this.calls.push([text]);
    await settle(this.script.shift() ?? this.fallback);
    return embedText(text, this.returnDimensions);
  }
}

export class FakeGenerationProvider implements IGenerationProvider {
  readonly providerName = 'fake-generation';
  readonly requests: IGenerationRequest[] = [];

  private script: CallBehavior[] = [];
  private fallback: CallBehavior = 'ok';

  constructor(private readonly respond: (request: IGenerationRequest) => string = () => 'fake answer') {}

  enqueue(...behaviors: CallBehavior[]): this {
    this.script.push(...behaviors);
    return this;
  }

  always(behavior: CallBehavior): this {
    this.fallback = behavior;
    return this;
  }

  async generate(request: IGenerationRequest): Promise<string> {
    this.requests.push(request);
    await settle(this.script.shift() ?? this.fallback);
    return this.respond(request);
  }
}
