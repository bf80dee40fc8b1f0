/**
 * Types for vector collections and their records.
 */

export type DistanceMetric = 'cosine' | 'dot' | 'euclidean';

/**
 * Stored alongside each vector.
 */
export interface VectorPayload {
  text: string;
  source: string;
}

export interface VectorRecord {
  id: string;                          // "<sourceId>:<chunkIndex>"
  vector: number[];
  payload: VectorPayload;
}

export interface CollectionInfo {
  name: string;
  dimension: number;
  distanceMetric: DistanceMetric;
  createdAt: number;
}

/**
 * Search result. `score` is always "higher is more relevant", whatever the
 * collection's metric; `distance` is the raw metric distance.
 */
export interface VectorSearchResult {
  record: VectorRecord;
  score: number;
  distance: number;
}

/**
 * Interface for vector store operations.
 */
export interface IVectorStoreModel {
  initialize(): Promise<void>;
  isReady(): boolean;

  // Collection operations
  ensureCollection(name: string, dimension: number, metric: DistanceMetric): Promise<CollectionInfo>;
  getCollection(name: string): Promise<CollectionInfo | null>;

  // Record operations
  upsert(collectionName: string, records: VectorRecord[]): Promise<string[]>;
  deleteBySource(collectionName: string, sourceId: string, keepIds?: string[]): Promise<number>;
  count(collectionName: string): Promise<number>;

  // Search operations
  search(collectionName: string, queryVector: number[], topK: number): Promise<VectorSearchResult[]>;
}
