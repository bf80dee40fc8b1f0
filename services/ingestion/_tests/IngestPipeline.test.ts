import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import { IngestPipeline, recordIdFor } from '../IngestPipeline';
import { ChunkExtractor } from '../ChunkExtractor';
import { EmbeddingService } from '../../EmbeddingService';
import { SqliteVectorModel } from '../../../models/SqliteVectorModel';
import { setupTestDb } from '../../../models/_tests/testUtils';
import { ExtractionError } from '../../base/ServiceError';
import { FakeEmbeddingProvider } from '../../../test-utils/fakes/providers';

vi.mock('../../../utils/logger', () => ({
  logger: {
    error: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
  },
}));

const DIM = 8;

describe('IngestPipeline', () => {
  let db: Database.Database;
  let vectorModel: SqliteVectorModel;
  let provider: FakeEmbeddingProvider;
  let pipeline: IngestPipeline;

  beforeEach(async () => {
    db = setupTestDb();
    vectorModel = new SqliteVectorModel(db);
    await vectorModel.initialize();
    provider = new FakeEmbeddingProvider(DIM);
    pipeline = new IngestPipeline({
      chunkExtractor: new ChunkExtractor({ chunkSize: 50, chunkOverlap: 0 }),
      embeddingService: new EmbeddingService({ provider }, { dimension: DIM }),
      vectorModel,
    }, { collectionName: 'docs' });
  });

  afterEach(() => {
    db.close();
  });

  it('derives record ids from source id and chunk index', () => {
    expect(recordIdFor({ sourceId: 'report.pdf', chunkIndex: 3 })).toBe('report.pdf:3');
  });

  it('stores one record per chunk, creating the collection on demand', async () => {
    const result = await pipeline.ingest({
      sourceId: 'notes',
      text: 'Cats purr when content. Dogs bark at strangers. Birds sing at dawn.',
    });

    expect(result).toEqual({
      sourceId: 'notes',
      chunkCount: 2,
      recordIds: ['notes:0', 'notes:1'],
    });
    expect(await vectorModel.getCollection('docs')).toMatchObject({ dimension: DIM, distanceMetric: 'cosine' });
    expect(await vectorModel.count('docs')).toBe(2);
  });

  it('overwrites records when the same document is ingested again', async () => {
    const document = { sourceId: 'notes', text: 'Cats purr when content. Dogs bark at strangers.' };

    const first = await pipeline.ingest(document);
    const second = await pipeline.ingest(document);

    expect(second.recordIds).toEqual(first.recordIds);
    expect(await vectorModel.count('docs')).toBe(first.chunkCount);
  });

  it('removes chunks a shorter new version no longer produces', async () => {
    await pipeline.ingest({
      sourceId: 'notes',
      text: 'Cats purr when content. Dogs bark at strangers. Birds sing at dawn.',
    });

    const result = await pipeline.ingest({ sourceId: 'notes', text: 'Cats purr when content.' });

    expect(result.recordIds).toEqual(['notes:0']);
    expect(await vectorModel.count('docs')).toBe(1);
  });

  it('leaves the store untouched when extraction fails', async () => {
    await expect(pipeline.ingest({ sourceId: 'empty', text: ' ' })).rejects.toBeInstanceOf(ExtractionError);

    expect(provider.calls).toHaveLength(0);
    expect(await vectorModel.getCollection('docs')).toBeNull();
  });

  it('fails on a missing collection when auto-create is off', async () => {
    const strict = new IngestPipeline({
      chunkExtractor: new ChunkExtractor(),
      embeddingService: new EmbeddingService({ provider }, { dimension: DIM }),
      vectorModel,
    }, { collectionName: 'docs', autoCreateCollection: false });

    await expect(strict.ingest({ sourceId: 'x', text: 'Some text.' }))
      .rejects.toMatchObject({ code: 'COLLECTION_NOT_FOUND' });
  });
});
