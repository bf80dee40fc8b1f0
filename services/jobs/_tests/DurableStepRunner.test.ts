import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import { z } from 'zod';
import { DurableStepRunner } from '../DurableStepRunner';
import { JobModel } from '../../../models/JobModel';
import { setupTestDb } from '../../../models/_tests/testUtils';
import { EmbeddingError, ExtractionError, JobCancelledError, JobError } from '../../base/ServiceError';

vi.mock('../../../utils/logger', () => ({
  logger: {
    error: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
  },
}));

const NumberList = z.array(z.number());

describe('DurableStepRunner', () => {
  let db: Database.Database;
  let jobModel: JobModel;
  let jobId: string;

  const createRunner = (onStepCompleted = vi.fn()) =>
    new DurableStepRunner(jobId, { jobModel }, {
      maxAttempts: 3,
      retry: { baseDelayMs: 1, maxDelayMs: 2 },
      onStepCompleted,
    });

  beforeEach(() => {
    db = setupTestDb();
    jobModel = new JobModel(db);
    jobId = jobModel.create({ kind: 'answer_question', input: { question: 'q', topK: 1 } }).id;
    jobModel.claimNextJobs(1);
  });

  afterEach(() => {
    db.close();
  });

  it('runs a step once and stores its output', async () => {
    const fn = vi.fn(async () => [1, 2, 3]);
    const onStepCompleted = vi.fn();

    const output = await createRunner(onStepCompleted).run('numbers', fn, NumberList);

    expect(output).toEqual([1, 2, 3]);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(jobModel.getStepOutput(jobId, 'numbers')).toEqual({ output: [1, 2, 3], attempts: 1 });
    expect(onStepCompleted).toHaveBeenCalledWith('numbers', [1, 2, 3], false);
  });

  it('replays a stored output without running the step', async () => {
    jobModel.saveStepOutput(jobId, 'numbers', [4, 5], 1);
    const fn = vi.fn(async () => [9]);
    const onStepCompleted = vi.fn();

    const output = await createRunner(onStepCompleted).run('numbers', fn, NumberList);

    expect(output).toEqual([4, 5]);
    expect(fn).not.toHaveBeenCalled();
    expect(onStepCompleted).toHaveBeenCalledWith('numbers', [4, 5], true);
  });

  it('runs the step again when the stored output does not match the schema', async () => {
    jobModel.saveStepOutput(jobId, 'numbers', 'not a list', 1);
    const fn = vi.fn(async () => [7]);

    expect(await createRunner().run('numbers', fn, NumberList)).toEqual([7]);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('retries retryable failures within the attempt budget', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new EmbeddingError('PROVIDER_FAILURE', 'flaky'))
      .mockResolvedValueOnce([1]);

    const output = await createRunner().run('numbers', fn, NumberList);

    expect(output).toEqual([1]);
    expect(fn).toHaveBeenCalledTimes(2);
    expect(jobModel.getStepOutput(jobId, 'numbers')?.attempts).toBe(2);
  });

  it('fails immediately on a fatal error and names the step', async () => {
    const fn = vi.fn().mockRejectedValue(new ExtractionError('EMPTY_DOCUMENT', 'nothing there'));

    const error = await createRunner().run('extract', fn, NumberList).catch(e => e);

    expect(fn).toHaveBeenCalledTimes(1);
    expect(error).toBeInstanceOf(JobError);
    expect(error).toMatchObject({
      jobId,
      stepName: 'extract',
      errorKind: 'ExtractionError',
      errorCode: 'EMPTY_DOCUMENT',
    });
    expect(jobModel.getStepOutput(jobId, 'extract')).toBeNull();
  });

  it('gives up once the attempt budget is used', async () => {
    const fn = vi.fn().mockRejectedValue(new EmbeddingError('PROVIDER_FAILURE', 'still down'));

    const error = await createRunner().run('embed', fn, NumberList).catch(e => e);

    expect(fn).toHaveBeenCalledTimes(3);
    expect(error).toMatchObject({ stepName: 'embed', errorKind: 'EmbeddingError', errorCode: 'PROVIDER_FAILURE' });
  });

  it('stops at the step boundary once cancellation is requested', async () => {
    jobModel.requestCancel(jobId);
    const fn = vi.fn(async () => [1]);

    await expect(createRunner().run('numbers', fn, NumberList)).rejects.toBeInstanceOf(JobCancelledError);
    expect(fn).not.toHaveBeenCalled();
  });
});
