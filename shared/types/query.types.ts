export interface SourceChunk {
  id: string;
  text: string;
  source: string;
  score: number;
}

export interface AnswerResult {
  answerText: string;
  sourceChunks: SourceChunk[];
  /** Number of chunks that made it into the prompt. */
  numContexts: number;
}

export interface IngestResult {
  sourceId: string;
  chunkCount: number;
  recordIds: string[];
}
