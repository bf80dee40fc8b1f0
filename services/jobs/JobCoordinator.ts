import { EventEmitter } from 'events';
import { BaseService } from '../base/BaseService';
import { JobCancelledError, JobError, NotFoundError, ValidationError, getErrorMessage } from '../base/ServiceError';
import { JobModel } from '../../models/JobModel';
import { IngestPipeline } from '../ingestion/IngestPipeline';
import { QueryPipeline } from '../QueryPipeline';
import { DurableStepRunner } from './DurableStepRunner';
import { IngestJobInputSchema, QueryJobInputSchema } from '../../shared/schemas/jobSchemas';
import type { DocumentInput, Job, JobFailure, JobStats } from '../../shared/types';
import type { RetryPolicy } from '../../utils/backoff';
import { classifyError } from '../../utils/errorClassification';
import type { z } from 'zod';

export interface JobCoordinatorConfig {
  /** Jobs running at once. */
  concurrency?: number;
  /** Milliseconds between polls once started. */
  pollInterval?: number;
  /** Attempts per step before the job fails. */
  maxStepAttempts?: number;
  stepRetry?: Partial<Omit<RetryPolicy, 'maxAttempts'>>;
  /** topK for query jobs submitted without one. */
  defaultTopK?: number;
  /** Running jobs older than this count as stuck in health checks. */
  stuckThresholdMs?: number;
}

interface JobCoordinatorDeps {
  jobModel: JobModel;
  ingestPipeline: IngestPipeline;
  queryPipeline: QueryPipeline;
}

/**
 * - `cancelled`: the job was pending and will not run.
 * - `requested`: the job is running and stops at its next step boundary. A
 *   job already in its last step has no further boundary and still succeeds.
 * - `rejected`: the job is unknown or already finished.
 */
export type CancelOutcome = 'cancelled' | 'requested' | 'rejected';

export interface StepCompletedEvent {
  jobId: string;
  stepName: string;
  replayed: boolean;
}

export interface JobCoordinatorEvents {
  'job:created': [job: Job];
  'job:started': [job: Job];
  'step:completed': [event: StepCompletedEvent];
  'job:succeeded': [job: Job];
  'job:failed': [job: Job, failure: JobFailure];
  'job:cancelled': [job: Job];
}

/**
 * Accepts ingest and query jobs, runs each as a sequence of durable steps
 * and tracks its status. Jobs run concurrently up to `concurrency`; the
 * steps of one job run in order.
 */
export class JobCoordinator extends BaseService<JobCoordinatorDeps> {
  private readonly emitter = new EventEmitter();
  private readonly config: Required<Omit<JobCoordinatorConfig, 'stepRetry'>> & { stepRetry: JobCoordinatorConfig['stepRetry'] };
  private activeJobs: Map<string, Promise<void>> = new Map();
  private pollTimer: NodeJS.Timeout | null = null;

  constructor(deps: JobCoordinatorDeps, config: JobCoordinatorConfig = {}) {
    super('JobCoordinator', deps);
    this.config = {
      concurrency: config.concurrency ?? 4,
      pollInterval: config.pollInterval ?? 1000,
      maxStepAttempts: config.maxStepAttempts ?? 3,
      stepRetry: config.stepRetry,
      defaultTopK: config.defaultTopK ?? 5,
      stuckThresholdMs: config.stuckThresholdMs ?? 15 * 60 * 1000,
    };
    this.logDebug('Initialized with config:', this.config);
  }

  /**
   * Jobs left running by a previous process go back to pending; their
   * completed steps are replayed when they run again.
   */
  async initialize(): Promise<void> {
    await super.initialize();
    this.recoverInterruptedJobs();
  }

  /**
   * Jobs running in this coordinator are never recovered.
   */
  recoverInterruptedJobs(): number {
    const recovered = this.deps.jobModel.recoverInterrupted([...this.activeJobs.keys()]);
    if (recovered > 0) {
      this.logInfo(`Recovered ${recovered} interrupted job(s)`);
    }
    return recovered;
  }

  async submitIngestJob(document: DocumentInput): Promise<string> {
    const input = this.validate(IngestJobInputSchema, { document });
    const job = this.deps.jobModel.create({ kind: 'ingest_document', input });
    this.emit('job:created', job);
    this.logInfo(`Submitted ingest job ${job.id}`);
    return job.id;
  }

  async submitQueryJob(question: string, topK: number = this.config.defaultTopK): Promise<string> {
    const input = this.validate(QueryJobInputSchema, { question, topK });
    const job = this.deps.jobModel.create({ kind: 'answer_question', input });
    this.emit('job:created', job);
    this.logInfo(`Submitted query job ${job.id}`);
    return job.id;
  }

  /**
   * @throws NotFoundError for an unknown id
   */
  async getJobStatus(jobId: string): Promise<Job> {
    const job = this.deps.jobModel.getById(jobId);
    if (!job) {
      throw new NotFoundError('Job', jobId);
    }
    return job;
  }

  /**
   * A pending job is cancelled immediately, a running one at its next step
   * boundary; the step in flight is allowed to finish.
   */
  async cancelJob(jobId: string): Promise<CancelOutcome> {
    const job = this.deps.jobModel.getById(jobId);
    if (!job) {
      return 'rejected';
    }

    if (job.status === 'pending' && !this.activeJobs.has(jobId)) {
      if (!this.deps.jobModel.markAsCancelled(jobId)) {
        return 'rejected';
      }
      this.emitJobEvent('job:cancelled', jobId);
      return 'cancelled';
    }

    if (job.status === 'running' && this.deps.jobModel.requestCancel(jobId)) {
      this.logInfo(`Cancellation requested for running job ${jobId}`);
      return 'requested';
    }

    return 'rejected';
  }

  /**
   * Manually re-submit a failed job. Steps it already completed are kept.
   */
  async retryJob(jobId: string): Promise<boolean> {
    const retried = this.deps.jobModel.resetForRetry(jobId);
    if (retried) {
      this.logInfo(`Job ${jobId} re-submitted`);
    }
    return retried;
  }

  getStats(): JobStats {
    return this.deps.jobModel.getStats();
  }

  getActiveJobCount(): number {
    return this.activeJobs.size;
  }

  async cleanupOldJobs(daysToKeep: number = 30): Promise<number> {
    return this.deps.jobModel.cleanupOldJobs(daysToKeep);
  }

  /**
   * Start polling for pending jobs. Recovery happens in `initialize`.
   */
  start(): void {
    if (this.pollTimer) {
      return;
    }
    this.pollTimer = setInterval(() => {
      this.processJobs().catch(error => this.logError('Error during poll:', error));
    }, this.config.pollInterval);
    this.logInfo(`Polling every ${this.config.pollInterval}ms`);
  }

  stop(): void {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
  }

  /**
   * Claim pending jobs up to the free concurrency slots and start them.
   * @returns Number of jobs started
   */
  async processJobs(): Promise<number> {
    return this.execute('processJobs', async () => {
      const availableSlots = this.config.concurrency - this.activeJobs.size;
      if (availableSlots <= 0) {
        this.logDebug(`No available slots (${this.activeJobs.size}/${this.config.concurrency} active)`);
        return 0;
      }

      const jobs = this.deps.jobModel.claimNextJobs(availableSlots);
      let started = 0;
      for (const job of jobs) {
        if (this.activeJobs.has(job.id)) {
          this.logWarn(`Job ${job.id} is already running here, not starting it again`);
          continue;
        }
        const jobPromise = this.runJob(job)
          .catch(error => this.logError(`Job ${job.id} could not be finalized:`, error))
          .finally(() => {
            this.activeJobs.delete(job.id);
          });
        this.activeJobs.set(job.id, jobPromise);
        started++;
      }
      return started;
    });
  }

  /**
   * Wait until no job is running.
   */
  async drain(): Promise<void> {
    while (this.activeJobs.size > 0) {
      await Promise.all(this.activeJobs.values());
    }
  }

  /**
   * Process jobs until none are pending or running.
   */
  async runUntilIdle(): Promise<void> {
    do {
      await this.processJobs();
      await this.drain();
    } while (this.deps.jobModel.getStats().pending > 0);
  }

  async cleanup(): Promise<void> {
    this.stop();
    if (this.activeJobs.size > 0) {
      this.logInfo(`Waiting for ${this.activeJobs.size} active job(s) to complete`);
    }
    await this.drain();
    this.logInfo('JobCoordinator cleanup completed');
  }

  /**
   * Unhealthy when a job has been running longer than the stuck threshold.
   */
  async healthCheck(): Promise<boolean> {
    const now = Date.now();
    const stuck = this.deps.jobModel
      .getByStatus('running')
      .filter(job => now - (job.startedAt ?? job.createdAt) > this.config.stuckThresholdMs);
    if (stuck.length > 0) {
      this.logWarn(`Health check warning: ${stuck.length} job(s) appear to be stuck`);
      return false;
    }
    return true;
  }

  on<E extends keyof JobCoordinatorEvents>(event: E, listener: (...args: JobCoordinatorEvents[E]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  once<E extends keyof JobCoordinatorEvents>(event: E, listener: (...args: JobCoordinatorEvents[E]) => void): this {
    this.emitter.once(event, listener);
    return this;
  }

  off<E extends keyof JobCoordinatorEvents>(event: E, listener: (...args: JobCoordinatorEvents[E]) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  private async runJob(job: Job): Promise<void> {
    this.logInfo(`Processing job ${job.id} (${job.kind}, attempt ${job.attempts})`);
    this.emit('job:started', job);

    const runner = new DurableStepRunner(job.id, { jobModel: this.deps.jobModel }, {
      maxAttempts: this.config.maxStepAttempts,
      retry: this.config.stepRetry,
      onStepCompleted: (stepName, _output, replayed) =>
        this.emit('step:completed', { jobId: job.id, stepName, replayed }),
    });

    try {
      const result = job.kind === 'ingest_document'
        ? await this.deps.ingestPipeline.ingest(job.input.document, runner)
        : await this.deps.queryPipeline.answer(job.input.question, job.input.topK, runner);

      this.deps.jobModel.markAsSucceeded(job.id, result);
      this.logInfo(`Job ${job.id} succeeded`);
      this.emitJobEvent('job:succeeded', job.id);
    } catch (error) {
      if (error instanceof JobCancelledError) {
        this.deps.jobModel.markAsCancelled(job.id);
        this.logInfo(`Job ${job.id} cancelled`);
        this.emitJobEvent('job:cancelled', job.id);
        return;
      }

      const failure = toJobFailure(error);
      this.deps.jobModel.markAsFailed(job.id, failure);
      this.logError(`Job ${job.id} failed${failure.failedStep ? ` at step '${failure.failedStep}'` : ''}:`, error);

      const failed = this.deps.jobModel.getById(job.id);
      if (failed) {
        this.emit('job:failed', failed, failure);
      }
    }
  }

  private validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || 'input'}: ${issue.message}`);
      throw new ValidationError(`Invalid job input: ${issues.join('; ')}`, { issues });
    }
    return parsed.data;
  }

  private emit<E extends keyof JobCoordinatorEvents>(event: E, ...args: JobCoordinatorEvents[E]): void {
    this.emitter.emit(event, ...args);
  }

  private emitJobEvent(event: 'job:succeeded' | 'job:cancelled', jobId: string): void {
    const job = this.deps.jobModel.getById(jobId);
    if (job) {
      this.emit(event, job);
    }
  }
}

/**
 * Failure record of a job: the kind and code of the underlying error and the
 * step it happened in.
 */
export function toJobFailure(error: unknown): JobFailure {
  if (error instanceof JobError) {
    return {
      errorKind: error.errorKind,
      errorCode: error.errorCode,
      failedStep: error.stepName,
      message: getErrorMessage(error.originalError),
    };
  }
  const { errorKind, errorCode } = classifyError(error);
  return { errorKind, errorCode, message: getErrorMessage(error) };
}
