import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import { SqliteVectorModel, decodeVector, encodeVector } from '../SqliteVectorModel';
import { StoreError, ValidationError } from '../../services/base/ServiceError';
import type { VectorRecord } from '../../shared/types';
import { setupTestDb } from './testUtils';

vi.mock('../../utils/logger', () => ({
  logger: {
    error: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
  },
}));

function record(id: string, vector: number[], source: string = 'src'): VectorRecord {
  return { id, vector, payload: { text: `text of ${id}`, source } };
}

describe('SqliteVectorModel', () => {
  let db: Database.Database;
  let model: SqliteVectorModel;

  beforeEach(async () => {
    db = setupTestDb();
    model = new SqliteVectorModel(db);
    await model.initialize();
  });

  afterEach(() => {
    db.close();
  });

  it('refuses to work before initialize', async () => {
    const uninitialized = new SqliteVectorModel(db);

    expect(uninitialized.isReady()).toBe(false);
    await expect(uninitialized.count('docs')).rejects.toThrow('Not initialized');
  });

  it('encodes vectors without losing precision', () => {
    const vector = [0.1, -2.5, 1 / 3];
    expect(decodeVector(encodeVector(vector))).toEqual(vector);
  });

  describe('ensureCollection', () => {
    it('creates a collection once', async () => {
      const first = await model.ensureCollection('docs', 3, 'cosine');
      const second = await model.ensureCollection('docs', 3, 'cosine');

      expect(first).toMatchObject({ name: 'docs', dimension: 3, distanceMetric: 'cosine' });
      expect(second).toEqual(first);
    });

    it('rejects a different dimension for an existing collection', async () => {
      await model.ensureCollection('docs', 3, 'cosine');

      await expect(model.ensureCollection('docs', 4, 'cosine')).rejects.toMatchObject({ code: 'DIMENSION_CONFLICT' });
    });

    it('keeps the metric of an existing collection', async () => {
      await model.ensureCollection('docs', 3, 'cosine');

      const info = await model.ensureCollection('docs', 3, 'euclidean');

      expect(info.distanceMetric).toBe('cosine');
    });

    it('rejects a non-positive dimension', async () => {
      await expect(model.ensureCollection('docs', 0, 'cosine')).rejects.toThrow(ValidationError);
    });

    it('returns null for an unknown collection', async () => {
      expect(await model.getCollection('nope')).toBeNull();
    });
  });

  describe('upsert', () => {
    beforeEach(async () => {
      await model.ensureCollection('docs', 3, 'cosine');
    });

    it('replaces records by id', async () => {
      await model.upsert('docs', [record('a', [1, 0, 0]), record('b', [0, 1, 0])]);
      const ids = await model.upsert('docs', [record('a', [0, 0, 1])]);

      expect(ids).toEqual(['a']);
      expect(await model.count('docs')).toBe(2);
      const [top] = await model.search('docs', [0, 0, 1], 1);
      expect(top.record.id).toBe('a');
      expect(top.record.vector).toEqual([0, 0, 1]);
    });

    it('fails for a missing collection and names every id', async () => {
      const error = await model.upsert('missing', [record('a', [1, 0, 0])]).catch(e => e);

      expect(error).toBeInstanceOf(StoreError);
      expect(error.code).toBe('COLLECTION_NOT_FOUND');
      expect(error.failedIds).toEqual(['a']);
    });

    it('writes nothing when a vector has the wrong dimension', async () => {
      const error = await model
        .upsert('docs', [record('ok', [1, 0, 0]), record('short', [1, 0])])
        .catch(e => e);

      expect(error.code).toBe('DIMENSION_MISMATCH');
      expect(error.failedIds).toEqual(['short']);
      expect(error.retryable).toBe(false);
      expect(await model.count('docs')).toBe(0);
    });
  });

  describe('search', () => {
    beforeEach(async () => {
      await model.ensureCollection('docs', 3, 'cosine');
    });

    it('orders results by descending score', async () => {
      await model.upsert('docs', [
        record('far', [0, 1, 0]),
        record('near', [1, 0.1, 0]),
        record('mid', [1, 1, 0]),
      ]);

      const results = await model.search('docs', [1, 0, 0], 3);

      expect(results.map(r => r.record.id)).toEqual(['near', 'mid', 'far']);
      expect(results[2].score).toBe(0);
      expect(results[2].distance).toBe(1);
    });

    it('breaks ties by ascending id', async () => {
      await model.upsert('docs', [record('b', [1, 0, 0]), record('a', [2, 0, 0]), record('c', [3, 0, 0])]);

      const results = await model.search('docs', [1, 0, 0], 3);

      expect(results.map(r => r.record.id)).toEqual(['a', 'b', 'c']);
    });

    it('does not pad when the collection has fewer records than topK', async () => {
      await model.upsert('docs', [record('only', [0, 0, 1])]);

      const results = await model.search('docs', [0, 0, 1], 3);

      expect(results).toHaveLength(1);
    });

    it('scores a stored vector against itself as the best match', async () => {
      await model.upsert('docs', [record('self', [1, 2, 3]), record('other', [3, 2, 1])]);

      const [top] = await model.search('docs', [1, 2, 3], 1);

      expect(top.record.id).toBe('self');
      expect(top.score).toBeCloseTo(1, 10);
      expect(top.record.payload).toEqual({ text: 'text of self', source: 'src' });
    });

    it('rejects a query of the wrong dimension', async () => {
      await expect(model.search('docs', [1, 0], 1)).rejects.toMatchObject({ code: 'DIMENSION_MISMATCH' });
    });

    it('rejects a non-positive topK', async () => {
      await expect(model.search('docs', [1, 0, 0], 0)).rejects.toThrow(ValidationError);
    });

    it('scores euclidean collections as 1 / (1 + distance)', async () => {
      await model.ensureCollection('euclid', 2, 'euclidean');
      await model.upsert('euclid', [record('p', [3, 4])]);

      const [result] = await model.search('euclid', [0, 0], 1);

      expect(result.distance).toBe(5);
      expect(result.score).toBeCloseTo(1 / 6, 10);
    });
  });

  describe('deleteBySource', () => {
    it('deletes the records of a source except the kept ids', async () => {
      await model.ensureCollection('docs', 3, 'cosine');
      await model.upsert('docs', [
        record('s:0', [1, 0, 0], 's'),
        record('s:1', [1, 0, 0], 's'),
        record('s:2', [1, 0, 0], 's'),
        record('t:0', [1, 0, 0], 't'),
      ]);

      const removed = await model.deleteBySource('docs', 's', ['s:0']);

      expect(removed).toBe(2);
      const ids = (await model.search('docs', [1, 0, 0], 10)).map(r => r.record.id);
      expect(ids).toEqual(['s:0', 't:0']);
    });
  });
});
