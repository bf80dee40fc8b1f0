import { z } from 'zod';

/**
 * Document accepted by the ingest job. Exactly one content field is required.
 */
export const DocumentInputSchema = z.object({
  sourceId: z.string().min(1).optional(),
  filePath: z.string().min(1).optional(),
  text: z.string().optional(),
  contentBase64: z.string().optional(),
  mimeType: z.string().optional(),
  fileName: z.string().optional(),
}).refine(
  doc => [doc.filePath, doc.text, doc.contentBase64].filter(v => v !== undefined).length === 1,
  { message: 'Exactly one of filePath, text or contentBase64 must be provided' }
);

export const IngestJobInputSchema = z.object({
  document: DocumentInputSchema,
});

export const QueryJobInputSchema = z.object({
  question: z.string().trim().min(1, 'Question must not be empty'),
  topK: z.number().int().positive().max(100),
});

export const ChunkSchema = z.object({
  text: z.string().min(1),
  sourceId: z.string(),
  chunkIndex: z.number().int().nonnegative(),
  charLength: z.number().int().positive(),
});

export const ChunkListSchema = z.array(ChunkSchema);

export const VectorSchema = z.array(z.number());
export const VectorListSchema = z.array(VectorSchema);

export const IngestResultSchema = z.object({
  sourceId: z.string(),
  chunkCount: z.number().int().nonnegative(),
  recordIds: z.array(z.string()),
});

export const SourceChunkSchema = z.object({
  id: z.string(),
  text: z.string(),
  source: z.string(),
  score: z.number(),
});

export const AnswerResultSchema = z.object({
  answerText: z.string(),
  sourceChunks: z.array(SourceChunkSchema),
  numContexts: z.number().int().nonnegative(),
});

export const GeneratedAnswerSchema = z.object({
  answerText: z.string(),
  numContexts: z.number().int().nonnegative(),
});

export const JobFailureSchema = z.object({
  errorKind: z.string(),
  errorCode: z.string(),
  failedStep: z.string().optional(),
  message: z.string(),
});

