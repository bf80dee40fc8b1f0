import type { DocumentInput } from './document.types';
import type { AnswerResult, IngestResult } from './query.types';

export type JobKind = 'ingest_document' | 'answer_question';

export type JobStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'cancelled';

export interface IngestJobInput {
  document: DocumentInput;
}

export interface QueryJobInput {
  question: string;
  topK: number;
}

export interface JobFailure {
  errorKind: string;
  errorCode: string;
  failedStep?: string;
  message: string;
}

interface JobBase {
  id: string;
  status: JobStatus;
  attempts: number;
  /** Completed step outputs by step name. */
  stepResults: Record<string, unknown>;
  cancelRequested: boolean;
  error?: JobFailure;
  createdAt: number;
  updatedAt: number;
  startedAt?: number;
  completedAt?: number;
}

export interface IngestJob extends JobBase {
  kind: 'ingest_document';
  input: IngestJobInput;
  result?: IngestResult;
}

export interface QueryJob extends JobBase {
  kind: 'answer_question';
  input: QueryJobInput;
  result?: AnswerResult;
}

export type Job = IngestJob | QueryJob;

export type JobStats = Record<JobStatus, number>;
