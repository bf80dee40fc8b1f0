import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../utils/logger';
import {
  AnswerResultSchema,
  IngestJobInputSchema,
  IngestResultSchema,
  JobFailureSchema,
  QueryJobInputSchema,
} from '../shared/schemas/jobSchemas';
import type {
  AnswerResult,
  IngestJobInput,
  IngestResult,
  Job,
  JobFailure,
  JobKind,
  JobStats,
  JobStatus,
  QueryJobInput,
} from '../shared/types';

// Database row types
interface JobRow {
  id: string;
  kind: string;
  input_payload: string;
  status: string;
  attempts: number;
  cancel_requested: number;
  result: string | null;
  error_info: string | null;
  failed_step: string | null;
  created_at: number;
  updated_at: number;
  started_at: number | null;
  completed_at: number | null;
}

interface JobStepRow {
  step_name: string;
  output: string;
  attempts: number;
}

export type CreateJobParams =
  | { kind: 'ingest_document'; input: IngestJobInput }
  | { kind: 'answer_question'; input: QueryJobInput };

export interface StoredStep {
  output: unknown;
  attempts: number;
}

const JOB_STATUSES: readonly JobStatus[] = ['pending', 'running', 'succeeded', 'failed', 'cancelled'];

function toJobStatus(value: string): JobStatus {
  const status = JOB_STATUSES.find(s => s === value);
  if (!status) {
    throw new Error(`Unknown job status '${value}'`);
  }
  return status;
}

/**
 * Persists jobs and the outputs of their completed steps.
 */
export class JobModel {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
    logger.debug('[JobModel] Initialized.');
  }

  create(params: CreateJobParams): Job {
    const id = uuidv4();
    const now = Date.now();

    this.db.prepare(`
      INSERT INTO jobs (id, kind, input_payload, status, attempts, created_at, updated_at)
      VALUES ($id, $kind, $inputPayload, 'pending', 0, $createdAt, $updatedAt)
    `).run({
      id,
      kind: params.kind,
      inputPayload: JSON.stringify(params.input),
      createdAt: now,
      updatedAt: now,
    });

    const job = this.getById(id);
    if (!job) {
      throw new Error('Failed to retrieve created job');
    }

    logger.debug('[JobModel] Job created', { id, kind: params.kind });
    return job;
  }

  getById(id: string): Job | null {
    const row = this.db.prepare<[string], JobRow>('SELECT * FROM jobs WHERE id = ?').get(id);
    return row ? this.rowToJob(row) : null;
  }

  getByStatus(status: JobStatus): Job[] {
    const rows = this.db
      .prepare<[string], JobRow>('SELECT * FROM jobs WHERE status = ? ORDER BY created_at ASC')
      .all(status);
    return rows.map(row => this.rowToJob(row));
  }

  /**
   * Atomically move up to `limit` pending jobs to running, oldest first.
   */
  claimNextJobs(limit: number, kinds?: JobKind[]): Job[] {
    if (limit <= 0) {
      return [];
    }

    const claim = this.db.transaction((): string[] => {
      let query = `SELECT id FROM jobs WHERE status = 'pending'`;
      const params: (string | number)[] = [];

      if (kinds && kinds.length > 0) {
        query += ` AND kind IN (${kinds.map(() => '?').join(',')})`;
        params.push(...kinds);
      }
      query += ' ORDER BY created_at ASC, rowid ASC LIMIT ?';
      params.push(limit);

      const ids = this.db.prepare<(string | number)[], { id: string }>(query).all(...params).map(r => r.id);
      const now = Date.now();
      const start = this.db.prepare(`
        UPDATE jobs
        SET status = 'running', attempts = attempts + 1, started_at = $now, updated_at = $now
        WHERE id = $id AND status = 'pending'
      `);
      for (const id of ids) {
        start.run({ id, now });
      }
      return ids;
    });

    return claim()
      .map(id => this.getById(id))
      .filter((job): job is Job => job !== null);
  }

  markAsSucceeded(id: string, result: IngestResult | AnswerResult): boolean {
    const now = Date.now();
    const info = this.db.prepare(`
      UPDATE jobs
      SET status = 'succeeded', result = $result, error_info = NULL, failed_step = NULL,
          completed_at = $now, updated_at = $now
      WHERE id = $id AND status = 'running'
    `).run({ id, result: JSON.stringify(result), now });
    return info.changes > 0;
  }

  markAsFailed(id: string, failure: JobFailure): boolean {
    const now = Date.now();
    const info = this.db.prepare(`
      UPDATE jobs
      SET status = 'failed', error_info = $errorInfo, failed_step = $failedStep,
          completed_at = $now, updated_at = $now
      WHERE id = $id AND status IN ('pending', 'running')
    `).run({
      id,
      errorInfo: JSON.stringify(failure),
      failedStep: failure.failedStep ?? null,
      now,
    });
    return info.changes > 0;
  }

  /**
   * Cancel a job that has not finished. Returns false for terminal jobs.
   */
  markAsCancelled(id: string): boolean {
    const now = Date.now();
    const info = this.db.prepare(`
      UPDATE jobs
      SET status = 'cancelled', completed_at = $now, updated_at = $now
      WHERE id = $id AND status IN ('pending', 'running')
    `).run({ id, now });
    return info.changes > 0;
  }

  /**
   * Flag a running job for cancellation at its next step boundary.
   */
  requestCancel(id: string): boolean {
    const info = this.db.prepare(`
      UPDATE jobs SET cancel_requested = 1, updated_at = $now
      WHERE id = $id AND status = 'running'
    `).run({ id, now: Date.now() });
    return info.changes > 0;
  }

  isCancelRequested(id: string): boolean {
    const row = this.db
      .prepare<[string], { cancel_requested: number }>('SELECT cancel_requested FROM jobs WHERE id = ?')
      .get(id);
    return row?.cancel_requested === 1;
  }

  /**
   * Put a failed job back in the queue. Completed steps are kept so the
   * retry resumes after the last one.
   */
  resetForRetry(id: string): boolean {
    const info = this.db.prepare(`
      UPDATE jobs
      SET status = 'pending', error_info = NULL, failed_step = NULL, cancel_requested = 0,
          completed_at = NULL, updated_at = $now
      WHERE id = $id AND status = 'failed'
    `).run({ id, now: Date.now() });
    return info.changes > 0;
  }

  /**
   * Return jobs left running by a stopped process to pending.
   * @param excludeIds Jobs still running in this process
   * @returns Number of recovered jobs
   */
  recoverInterrupted(excludeIds: readonly string[] = []): number {
    let query = `UPDATE jobs SET status = 'pending', updated_at = ? WHERE status = 'running'`;
    if (excludeIds.length > 0) {
      query += ` AND id NOT IN (${excludeIds.map(() => '?').join(',')})`;
    }
    const info = this.db.prepare<(string | number)[]>(query).run(Date.now(), ...excludeIds);
    return info.changes;
  }

  getStepOutput(jobId: string, stepName: string): StoredStep | null {
    const row = this.db
      .prepare<[string, string], JobStepRow>('SELECT step_name, output, attempts FROM job_steps WHERE job_id = ? AND step_name = ?')
      .get(jobId, stepName);
    if (!row) {
      return null;
    }
    return { output: JSON.parse(row.output), attempts: row.attempts };
  }

  saveStepOutput(jobId: string, stepName: string, output: unknown, attempts: number): void {
    const now = Date.now();
    this.db.prepare(`
      INSERT OR REPLACE INTO job_steps (job_id, step_name, output, attempts, completed_at)
      VALUES ($jobId, $stepName, $output, $attempts, $now)
    `).run({ jobId, stepName, output: JSON.stringify(output ?? null), attempts, now });
    this.db.prepare('UPDATE jobs SET updated_at = $now WHERE id = $jobId').run({ jobId, now });
  }

  getStepResults(jobId: string): Record<string, unknown> {
    const rows = this.db
      .prepare<[string], JobStepRow>('SELECT step_name, output, attempts FROM job_steps WHERE job_id = ? ORDER BY completed_at ASC, rowid ASC')
      .all(jobId);
    const results: Record<string, unknown> = {};
    for (const row of rows) {
      results[row.step_name] = JSON.parse(row.output);
    }
    return results;
  }

  getStats(): JobStats {
    const rows = this.db
      .prepare<[], { status: string; count: number }>('SELECT status, COUNT(*) as count FROM jobs GROUP BY status')
      .all();

    const stats: JobStats = { pending: 0, running: 0, succeeded: 0, failed: 0, cancelled: 0 };
    for (const row of rows) {
      stats[toJobStatus(row.status)] = row.count;
    }
    return stats;
  }

  /**
   * Delete finished jobs (and their steps) completed more than `daysToKeep` days ago.
   */
  cleanupOldJobs(daysToKeep: number = 30): number {
    const cutoff = Date.now() - daysToKeep * 24 * 60 * 60 * 1000;
    const finished = `SELECT id FROM jobs WHERE status IN ('succeeded', 'failed', 'cancelled') AND completed_at < ?`;

    // job_steps is removed explicitly; foreign_keys may be off on this connection
    const removed = this.db.transaction((): number => {
      this.db.prepare(`DELETE FROM job_steps WHERE job_id IN (${finished})`).run(cutoff);
      return this.db.prepare(`DELETE FROM jobs WHERE id IN (${finished})`).run(cutoff).changes;
    })();

    logger.info(`[JobModel] Cleaned up ${removed} old jobs`);
    return removed;
  }

  private rowToJob(row: JobRow): Job {
    const base = {
      id: row.id,
      status: toJobStatus(row.status),
      attempts: row.attempts,
      stepResults: this.getStepResults(row.id),
      cancelRequested: row.cancel_requested === 1,
      error: row.error_info ? JobFailureSchema.parse(JSON.parse(row.error_info)) : undefined,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      startedAt: row.started_at ?? undefined,
      completedAt: row.completed_at ?? undefined,
    };
    const payload: unknown = JSON.parse(row.input_payload);
    const result: unknown = row.result ? JSON.parse(row.result) : undefined;

    switch (row.kind) {
      case 'ingest_document':
        return {
          ...base,
          kind: 'ingest_document',
          input: IngestJobInputSchema.parse(payload),
          result: result === undefined ? undefined : IngestResultSchema.parse(result),
        };
      case 'answer_question':
        return {
          ...base,
          kind: 'answer_question',
          input: QueryJobInputSchema.parse(payload),
          result: result === undefined ? undefined : AnswerResultSchema.parse(result),
        };
      default:
        throw new Error(`Unknown job kind '${row.kind}' for job ${row.id}`);
    }
  }
}
