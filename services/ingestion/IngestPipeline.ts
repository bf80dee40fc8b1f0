import { z } from 'zod';
import { BaseService } from '../base/BaseService';
import { EmbeddingError, StoreError } from '../base/ServiceError';
import { ChunkExtractor } from './ChunkExtractor';
import { EmbeddingService } from '../EmbeddingService';
import { InlineStepContext, type StepContext } from '../jobs/StepContext';
import { ChunkListSchema, VectorListSchema } from '../../shared/schemas/jobSchemas';
import type { Chunk, DistanceMetric, DocumentInput, IngestResult, IVectorStoreModel, VectorRecord } from '../../shared/types';
import { DEFAULT_COLLECTION_NAME, INGEST_STEPS } from './constants';

interface IngestPipelineDeps {
  chunkExtractor: ChunkExtractor;
  embeddingService: EmbeddingService;
  vectorModel: IVectorStoreModel;
}

export interface IngestPipelineConfig {
  collectionName?: string;
  /** Metric used when the collection has to be created. */
  distanceMetric?: DistanceMetric;
  /** Create a missing collection and retry the upsert once. */
  autoCreateCollection?: boolean;
  /** Delete records of the source that the new chunking no longer produces. */
  pruneStaleChunks?: boolean;
}

export function recordIdFor(chunk: Pick<Chunk, 'sourceId' | 'chunkIndex'>): string {
  return `${chunk.sourceId}:${chunk.chunkIndex}`;
}

/**
 * extract-chunks -> embed-chunks -> upsert-records for one document.
 * Record ids depend only on source id and chunk position, so running the
 * same document again overwrites its records.
 */
export class IngestPipeline extends BaseService<IngestPipelineDeps> {
  private readonly config: Required<IngestPipelineConfig>;

  constructor(deps: IngestPipelineDeps, config: IngestPipelineConfig = {}) {
    super('IngestPipeline', deps);
    this.config = {
      collectionName: config.collectionName ?? DEFAULT_COLLECTION_NAME,
      distanceMetric: config.distanceMetric ?? 'cosine',
      autoCreateCollection: config.autoCreateCollection ?? true,
      pruneStaleChunks: config.pruneStaleChunks ?? true,
    };
  }

  async ingest(document: DocumentInput, step: StepContext = new InlineStepContext()): Promise<IngestResult> {
    return this.execute('ingest', async () => {
      const chunks = await step.run(
        INGEST_STEPS.EXTRACT,
        () => this.deps.chunkExtractor.extract(document),
        ChunkListSchema
      );

      const vectors = await step.run(
        INGEST_STEPS.EMBED,
        () => this.deps.embeddingService.embed(
          chunks.map(chunk => chunk.text),
          { taskType: 'ingest_embedding', jobId: step.jobId }
        ),
        VectorListSchema
      );

      if (vectors.length !== chunks.length) {
        throw new EmbeddingError(
          'PROVIDER_FAILURE',
          `Got ${vectors.length} vectors for ${chunks.length} chunks`,
          { chunkCount: chunks.length, vectorCount: vectors.length },
          false
        );
      }

      const sourceId = chunks[0].sourceId;
      const records: VectorRecord[] = chunks.map((chunk, i) => ({
        id: recordIdFor(chunk),
        vector: vectors[i],
        payload: { text: chunk.text, source: chunk.sourceId },
      }));

      const recordIds = await step.run(
        INGEST_STEPS.UPSERT,
        () => this.upsertRecords(sourceId, records),
        z.array(z.string())
      );

      this.logInfo(`Ingested '${sourceId}': ${chunks.length} chunks into '${this.config.collectionName}'`);
      return { sourceId, chunkCount: chunks.length, recordIds };
    }, { sourceId: document.sourceId, filePath: document.filePath, jobId: step.jobId });
  }

  private async upsertRecords(sourceId: string, records: VectorRecord[]): Promise<string[]> {
    const { vectorModel, embeddingService } = this.deps;
    const { collectionName } = this.config;
    let ids: string[];

    try {
      ids = await vectorModel.upsert(collectionName, records);
    } catch (error) {
      if (!(error instanceof StoreError && error.code === 'COLLECTION_NOT_FOUND' && this.config.autoCreateCollection)) {
        throw error;
      }
      this.logWarn(`Collection '${collectionName}' is missing, creating it and retrying the upsert once`);
      await vectorModel.ensureCollection(collectionName, embeddingService.dimension, this.config.distanceMetric);
      ids = await vectorModel.upsert(collectionName, records);
    }

    if (this.config.pruneStaleChunks) {
      const removed = await vectorModel.deleteBySource(collectionName, sourceId, ids);
      if (removed > 0) {
        this.logInfo(`Removed ${removed} stale record(s) of '${sourceId}'`);
      }
    }
    return ids;
  }
}
