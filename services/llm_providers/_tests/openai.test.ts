import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { OpenAIEmbeddingProvider, OpenAIGenerationProvider, contentToText } from '../openai';
import { GenerationError } from '../../base/ServiceError';

const mocks = vi.hoisted(() => ({
  embeddingsFields: [] as unknown[],
  chatFields: [] as unknown[],
  embedDocuments: vi.fn(),
  embedQuery: vi.fn(),
  invoke: vi.fn(),
}));

vi.mock('@langchain/openai', () => ({
  OpenAIEmbeddings: class {
    embedDocuments = mocks.embedDocuments;
    embedQuery = mocks.embedQuery;
    constructor(fields: unknown) {
      mocks.embeddingsFields.push(fields);
    }
  },
  ChatOpenAI: class {
    invoke = mocks.invoke;
    constructor(fields: unknown) {
      mocks.chatFields.push(fields);
    }
  },
}));

vi.mock('../../../utils/logger', () => ({
  logger: {
    error: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
  },
}));

describe('OpenAI providers', () => {
  const savedKey = process.env.OPENAI_API_KEY;

  beforeEach(() => {
    mocks.embeddingsFields.length = 0;
    mocks.chatFields.length = 0;
    vi.clearAllMocks();
    delete process.env.OPENAI_API_KEY;
  });

  afterEach(() => {
    if (savedKey === undefined) {
      delete process.env.OPENAI_API_KEY;
    } else {
      process.env.OPENAI_API_KEY = savedKey;
    }
  });

  describe('OpenAIEmbeddingProvider', () => {
    it('is created without a key and rejects the first call', async () => {
      const provider = new OpenAIEmbeddingProvider({ model: 'text-embedding-3-small', dimensions: 3 });

      expect(provider.capabilities).toEqual({ dimensions: 3, maxBatchSize: undefined });
      await expect(provider.embedQuery('query')).rejects.toThrow('OPENAI_API_KEY is not set');
      await expect(provider.embedQuery('query')).rejects.toMatchObject({ retryable: false });
      expect(mocks.embeddingsFields).toEqual([]);
    });

    it('falls back to the environment key', async () => {
      process.env.OPENAI_API_KEY = 'test-secret';
      mocks.embedQuery.mockResolvedValue([1, 2, 3]);
      const provider = new OpenAIEmbeddingProvider({ model: 'text-embedding-3-small', dimensions: 3 });

      await provider.embedQuery('query');

      expect(mocks.embeddingsFields[0]).toMatchObject({ apiKey: 'test-secret' });
    });

    it('configures one client without its own retries', async () => {
      mocks.embedDocuments.mockResolvedValue([[1, 2, 3]]);
      const provider = new OpenAIEmbeddingProvider({
        apiKey: 'test-secret',
        model: 'text-embedding-3-small',
        dimensions: 3,
        batchSize: 2,
      });

      await provider.embedDocuments(['a']);
      await provider.embedDocuments(['b']);

      expect(mocks.embeddingsFields).toEqual([{
        apiKey: 'test-secret',
        model: 'text-embedding-3-small',
        dimensions: 3,
        batchSize: 2,
        maxRetries: 0,
      }]);
      expect(provider.capabilities).toMatchObject({ dimensions: 3, maxBatchSize: 2 });
    });

    it('delegates embedding calls', async () => {
      mocks.embedDocuments.mockResolvedValue([[1, 2, 3]]);
      mocks.embedQuery.mockResolvedValue([4, 5, 6]);
      const provider = new OpenAIEmbeddingProvider({ apiKey: 'test-secret', model: 'm', dimensions: 3 });

      expect(await provider.embedDocuments(['doc'])).toEqual([[1, 2, 3]]);
      expect(await provider.embedQuery('query')).toEqual([4, 5, 6]);
      expect(mocks.embedDocuments).toHaveBeenCalledWith(['doc']);
      expect(mocks.embedQuery).toHaveBeenCalledWith('query');
    });
  });

  describe('OpenAIGenerationProvider', () => {
    const request = {
      systemInstruction: 'Be brief.',
      userContent: 'What is up?',
      maxTokens: 100,
      temperature: 0.1,
    };

    it('sends a system and a human message and trims the answer', async () => {
      mocks.invoke.mockResolvedValue({ content: '  The answer.  ' });
      const provider = new OpenAIGenerationProvider({ apiKey: 'test-secret', model: 'gpt-4o-mini' });

      expect(await provider.generate(request)).toBe('The answer.');
      expect(mocks.chatFields).toEqual([{
        apiKey: 'test-secret',
        model: 'gpt-4o-mini',
        temperature: 0.1,
        maxTokens: 100,
        maxRetries: 0,
      }]);
      const [messages] = mocks.invoke.mock.calls[0];
      expect(messages.map((m: { content: unknown }) => m.content)).toEqual(['Be brief.', 'What is up?']);
    });

    it('requires a key only when generating', async () => {
      const provider = new OpenAIGenerationProvider({ model: 'gpt-4o-mini' });

      await expect(provider.generate(request)).rejects.toThrow('OPENAI_API_KEY is not set');
      expect(mocks.chatFields).toEqual([]);
    });

    it('rejects an empty answer', async () => {
      mocks.invoke.mockResolvedValue({ content: '' });
      const provider = new OpenAIGenerationProvider({ apiKey: 'test-secret', model: 'gpt-4o-mini' });

      await expect(provider.generate(request)).rejects.toMatchObject({ code: 'EMPTY_RESPONSE' });
      await expect(provider.generate(request)).rejects.toBeInstanceOf(GenerationError);
    });
  });

  it('flattens content parts to text', () => {
    expect(contentToText([
      { type: 'text', text: 'Hello, ' },
      { type: 'image_url', image_url: 'https://example.com/a.png' },
      { type: 'text', text: 'world' },
    ])).toBe('Hello, world');
  });
});
