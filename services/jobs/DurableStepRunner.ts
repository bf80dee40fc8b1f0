import type { z } from 'zod';
import { BaseService } from '../base/BaseService';
import { JobCancelledError, JobError } from '../base/ServiceError';
import { JobModel } from '../../models/JobModel';
import { withRetry, type RetryPolicy } from '../../utils/backoff';
import { classifyError } from '../../utils/errorClassification';
import type { StepContext } from './StepContext';

interface DurableStepRunnerDeps {
  jobModel: JobModel;
}

export interface DurableStepRunnerOptions {
  /** Attempts per step, first one included. */
  maxAttempts: number;
  retry?: Partial<Omit<RetryPolicy, 'maxAttempts'>>;
  onStepCompleted?: (stepName: string, output: unknown, replayed: boolean) => void;
}

/**
 * Step context of one job. Completed outputs live in `job_steps`; a step
 * with a stored output is replayed, not run. Retryable failures are retried
 * in place, anything else (or an exhausted budget) ends the job with a
 * JobError naming the step.
 */
export class DurableStepRunner extends BaseService<DurableStepRunnerDeps> implements StepContext {
  readonly jobId: string;
  private readonly options: DurableStepRunnerOptions;

  constructor(jobId: string, deps: DurableStepRunnerDeps, options: DurableStepRunnerOptions) {
    super('DurableStepRunner', deps);
    this.jobId = jobId;
    this.options = options;
  }

  async run<T>(stepName: string, fn: () => Promise<T>, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const { jobModel } = this.deps;

    const stored = jobModel.getStepOutput(this.jobId, stepName);
    if (stored) {
      const parsed = schema.safeParse(stored.output);
      if (parsed.success) {
        this.logDebug(`Job ${this.jobId}: replaying stored output of step '${stepName}'`);
        this.options.onStepCompleted?.(stepName, parsed.data, true);
        return parsed.data;
      }
      this.logWarn(`Job ${this.jobId}: stored output of step '${stepName}' is invalid, running it again`, parsed.error.issues);
    }

    if (jobModel.isCancelRequested(this.jobId)) {
      throw new JobCancelledError(this.jobId, stepName);
    }

    let attempts = 0;
    let output: T;
    try {
      output = await withRetry(
        () => {
          attempts++;
          return fn();
        },
        error => classifyError(error).retryable,
        { ...this.options.retry, maxAttempts: this.options.maxAttempts },
        {
          onRetry: (error, attempt, delayMs) =>
            this.logWarn(`Job ${this.jobId}: step '${stepName}' attempt ${attempt + 1} failed, retrying in ${delayMs}ms:`, error),
        }
      );
    } catch (error) {
      throw new JobError(this.jobId, stepName, error, attempts);
    }

    jobModel.saveStepOutput(this.jobId, stepName, output, attempts);
    this.logDebug(`Job ${this.jobId}: step '${stepName}' completed after ${attempts} attempt(s)`);
    this.options.onStepCompleted?.(stepName, output, false);
    return output;
  }
}
