import Database from 'better-sqlite3';
import { logger } from '../utils/logger';
import { scoreVector } from '../utils/vectorMath';
import { StoreError, ValidationError } from '../services/base/ServiceError';
import type {
  CollectionInfo,
  DistanceMetric,
  IVectorStoreModel,
  VectorPayload,
  VectorRecord,
  VectorSearchResult,
} from '../shared/types';
import { z } from 'zod';

interface CollectionRow {
  name: string;
  dimension: number;
  distance_metric: string;
  created_at: number;
}

interface RecordRow {
  id: string;
  vector: Buffer;
  payload: string;
}

const PayloadSchema = z.object({
  text: z.string(),
  source: z.string(),
});

const MetricSchema = z.enum(['cosine', 'dot', 'euclidean']);

const FLOAT64_BYTES = 8;

/** Little-endian float64 encoding, so stored vectors keep full precision. */
export function encodeVector(vector: readonly number[]): Buffer {
  const buffer = Buffer.alloc(vector.length * FLOAT64_BYTES);
  vector.forEach((value, i) => buffer.writeDoubleLE(value, i * FLOAT64_BYTES));
  return buffer;
}

export function decodeVector(buffer: Buffer): number[] {
  const vector = new Array<number>(buffer.length / FLOAT64_BYTES);
  for (let i = 0; i < vector.length; i++) {
    vector[i] = buffer.readDoubleLE(i * FLOAT64_BYTES);
  }
  return vector;
}

/**
 * Vector store backed by two SQLite tables. Search is an exact scan over
 * the collection, scored with the collection's metric.
 */
export class SqliteVectorModel implements IVectorStoreModel {
  private db: Database.Database;
  private initialized = false;

  constructor(db: Database.Database) {
    this.db = db;
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }
    const tables = this.db
      .prepare<[], { name: string }>(`SELECT name FROM sqlite_master WHERE type = 'table' AND name IN ('vector_collections', 'vector_records')`)
      .all();
    if (tables.length !== 2) {
      throw new Error('[SqliteVectorModel] Vector tables are missing. Run migrations before initializing.');
    }
    this.initialized = true;
    logger.info('[SqliteVectorModel] Initialized.');
  }

  isReady(): boolean {
    return this.initialized;
  }

  /**
   * Create the collection if it does not exist. An existing collection with
   * a different dimension is a conflict; a different metric is kept and logged.
   */
  async ensureCollection(name: string, dimension: number, metric: DistanceMetric): Promise<CollectionInfo> {
    this.assertReady();
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new ValidationError(`Collection dimension must be a positive integer, got ${dimension}`);
    }

    const create = this.db.transaction((): CollectionInfo => {
      const existing = this.readCollection(name);
      if (existing) {
        if (existing.dimension !== dimension) {
          throw new StoreError(
            'DIMENSION_CONFLICT',
            `Collection '${name}' exists with dimension ${existing.dimension}, requested ${dimension}`,
            [],
            { collection: name, existingDimension: existing.dimension, requestedDimension: dimension }
          );
        }
        if (existing.distanceMetric !== metric) {
          logger.warn(`[SqliteVectorModel] Collection '${name}' keeps metric '${existing.distanceMetric}' (requested '${metric}')`);
        }
        return existing;
      }

      const createdAt = Date.now();
      this.db.prepare(`
        INSERT INTO vector_collections (name, dimension, distance_metric, created_at)
        VALUES ($name, $dimension, $metric, $createdAt)
      `).run({ name, dimension, metric, createdAt });
      logger.info(`[SqliteVectorModel] Created collection '${name}' (dim=${dimension}, metric=${metric})`);
      return { name, dimension, distanceMetric: metric, createdAt };
    });

    return create();
  }

  async getCollection(name: string): Promise<CollectionInfo | null> {
    this.assertReady();
    return this.readCollection(name);
  }

  /**
   * Insert or replace records by id in one transaction. Either every record
   * of the call is written or none is.
   * @returns Ids of the written records
   */
  async upsert(collectionName: string, records: VectorRecord[]): Promise<string[]> {
    this.assertReady();
    const ids = records.map(r => r.id);
    const collection = this.requireCollection(collectionName, ids);

    const mismatched = records
      .filter(r => r.vector.length !== collection.dimension)
      .map(r => r.id);
    if (mismatched.length > 0) {
      throw new StoreError(
        'DIMENSION_MISMATCH',
        `${mismatched.length} record(s) do not match dimension ${collection.dimension} of '${collectionName}'`,
        mismatched,
        { collection: collectionName }
      );
    }

    const stmt = this.db.prepare(`
      INSERT OR REPLACE INTO vector_records (collection_name, id, vector, payload, source, updated_at)
      VALUES ($collection, $id, $vector, $payload, $source, $updatedAt)
    `);
    const writeAll = this.db.transaction((batch: VectorRecord[]) => {
      const updatedAt = Date.now();
      for (const record of batch) {
        stmt.run({
          collection: collectionName,
          id: record.id,
          vector: encodeVector(record.vector),
          payload: JSON.stringify(record.payload),
          source: record.payload.source,
          updatedAt,
        });
      }
    });

    try {
      writeAll(records);
    } catch (error) {
      logger.error(`[SqliteVectorModel] Upsert of ${records.length} record(s) into '${collectionName}' failed:`, error);
      throw new StoreError(
        'UPSERT_FAILED',
        `Upsert into '${collectionName}' failed: ${error instanceof Error ? error.message : String(error)}`,
        ids,
        { collection: collectionName }
      );
    }

    logger.debug(`[SqliteVectorModel] Upserted ${records.length} record(s) into '${collectionName}'`);
    return ids;
  }

  /**
   * Nearest records to `queryVector`, most relevant first. Equal scores are
   * ordered by ascending id. Never pads: fewer than `topK` records in the
   * collection yields fewer results.
   */
  async search(collectionName: string, queryVector: number[], topK: number): Promise<VectorSearchResult[]> {
    this.assertReady();
    if (!Number.isInteger(topK) || topK <= 0) {
      throw new ValidationError(`topK must be a positive integer, got ${topK}`);
    }
    const collection = this.requireCollection(collectionName, []);
    if (queryVector.length !== collection.dimension) {
      throw new StoreError(
        'DIMENSION_MISMATCH',
        `Query vector has dimension ${queryVector.length}, collection '${collectionName}' expects ${collection.dimension}`,
        [],
        { collection: collectionName }
      );
    }

    const rows = this.db
      .prepare<[string], RecordRow>('SELECT id, vector, payload FROM vector_records WHERE collection_name = ?')
      .all(collectionName);

    const scored = rows.map(row => {
      const vector = decodeVector(row.vector);
      const { score, distance } = scoreVector(collection.distanceMetric, queryVector, vector);
      return { record: { id: row.id, vector, payload: this.parsePayload(row) }, score, distance };
    });

    scored.sort((a, b) => {
      if (b.score !== a.score) {
        return b.score - a.score;
      }
      return a.record.id < b.record.id ? -1 : a.record.id > b.record.id ? 1 : 0;
    });

    return scored.slice(0, topK);
  }

  async count(collectionName: string): Promise<number> {
    this.assertReady();
    this.requireCollection(collectionName, []);
    const row = this.db
      .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM vector_records WHERE collection_name = ?')
      .get(collectionName);
    return row?.count ?? 0;
  }

  /**
   * Delete the records of one source, except `keepIds`.
   * @returns Number of deleted records
   */
  async deleteBySource(collectionName: string, sourceId: string, keepIds: string[] = []): Promise<number> {
    this.assertReady();
    this.requireCollection(collectionName, []);
    const keep = new Set(keepIds);

    const remove = this.db.transaction((): number => {
      const ids = this.db
        .prepare<[string, string], { id: string }>('SELECT id FROM vector_records WHERE collection_name = ? AND source = ?')
        .all(collectionName, sourceId)
        .map(r => r.id)
        .filter(id => !keep.has(id));

      const stmt = this.db.prepare('DELETE FROM vector_records WHERE collection_name = ? AND id = ?');
      for (const id of ids) {
        stmt.run(collectionName, id);
      }
      return ids.length;
    });

    const deleted = remove();
    if (deleted > 0) {
      logger.info(`[SqliteVectorModel] Deleted ${deleted} record(s) of source '${sourceId}' from '${collectionName}'`);
    }
    return deleted;
  }

  private assertReady(): void {
    if (!this.initialized) {
      throw new Error('[SqliteVectorModel] Not initialized. Call initialize() first.');
    }
  }

  private readCollection(name: string): CollectionInfo | null {
    const row = this.db
      .prepare<[string], CollectionRow>('SELECT * FROM vector_collections WHERE name = ?')
      .get(name);
    if (!row) {
      return null;
    }
    return {
      name: row.name,
      dimension: row.dimension,
      distanceMetric: MetricSchema.parse(row.distance_metric),
      createdAt: row.created_at,
    };
  }

  private requireCollection(name: string, affectedIds: string[]): CollectionInfo {
    const collection = this.readCollection(name);
    if (!collection) {
      throw new StoreError('COLLECTION_NOT_FOUND', `Collection '${name}' does not exist`, affectedIds, { collection: name });
    }
    return collection;
  }

  private parsePayload(row: RecordRow): VectorPayload {
    return PayloadSchema.parse(JSON.parse(row.payload));
  }
}
