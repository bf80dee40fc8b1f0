export interface Chunk {
  text: string;
  sourceId: string;
  /** Position within the document, 0-based across all pages. */
  chunkIndex: number;
  charLength: number;
}

export interface ChunkingOptions {
  /** Target maximum chunk length in characters. */
  chunkSize: number;
  /** Characters of trailing whole sentences carried into the next chunk. */
  chunkOverlap: number;
}
