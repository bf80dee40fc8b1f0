#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import path from 'path';
import { initRuntime, type InitOptions, type RagRuntime } from '../../bootstrap/initServices';
import { loadConfig, loadEnvFile } from '../config';
import { logger } from '../logger';
import { getErrorMessage } from '../../services/base/ServiceError';
import type { Job } from '../../shared/types';

interface IngestCommandOptions {
  sourceId?: string;
}

interface AskCommandOptions {
  topK?: number;
  json?: boolean;
}

interface CleanupCommandOptions {
  days: number;
}

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

const defaultIO: CliIO = {
  out: line => process.stdout.write(`${line}\n`),
  err: line => process.stderr.write(`${line}\n`),
};

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function describeJob(job: Job): string[] {
  const lines = [`${job.id}  ${job.kind}  ${job.status}  (attempts: ${job.attempts})`];
  if (job.error) {
    const step = job.error.failedStep ? ` at ${job.error.failedStep}` : '';
    lines.push(`  error: ${job.error.errorKind}/${job.error.errorCode}${step}: ${job.error.message}`);
  }
  if (job.kind === 'ingest_document' && job.result) {
    lines.push(`  ingested ${job.result.chunkCount} chunk(s) from ${job.result.sourceId}`);
  }
  return lines;
}

/**
 * Build the `rag` command line. `init` opens the runtime for each command;
 * tests pass their own database and providers through it.
 */
export function createProgram(init: InitOptions = {}, io: CliIO = defaultIO): Command {
  const program = new Command();

  async function withRuntime(fn: (runtime: RagRuntime) => Promise<void>): Promise<void> {
    loadEnvFile();
    const runtime = await initRuntime(loadConfig(), init);
    try {
      await fn(runtime);
    } finally {
      await runtime.shutdown();
    }
  }

  program
    .name('rag')
    .description('Ingest documents and answer questions over them (set LOG_LEVEL=debug for details)');

  program
    .command('ingest')
    .description('Chunk, embed and store one or more documents')
    .argument('<paths...>', 'Files to ingest')
    .option('--source-id <id>', 'Source id to use (single file only)')
    .action(async (paths: string[], options: IngestCommandOptions) => {
      if (options.sourceId && paths.length > 1) {
        throw new InvalidArgumentError('--source-id can only be used with a single file.');
      }
      await withRuntime(async ({ services }) => {
        const { jobCoordinator } = services;
        const jobIds: string[] = [];
        for (const filePath of paths) {
          jobIds.push(await jobCoordinator.submitIngestJob({
            filePath: path.resolve(filePath),
            sourceId: options.sourceId,
          }));
        }
        await jobCoordinator.runUntilIdle();

        let failed = 0;
        for (const jobId of jobIds) {
          const job = await jobCoordinator.getJobStatus(jobId);
          if (job.status !== 'succeeded') failed++;
          describeJob(job).forEach(io.out);
        }
        if (failed > 0) {
          process.exitCode = 1;
        }
      });
    });

  program
    .command('ask')
    .description('Answer a question from the ingested documents')
    .argument('<question>', 'Question to answer')
    .option('-k, --top-k <n>', 'Chunks to retrieve', parsePositiveInt)
    .option('--json', 'Print the full answer as JSON')
    .action(async (question: string, options: AskCommandOptions) => {
      await withRuntime(async ({ services }) => {
        const { jobCoordinator } = services;
        const jobId = await jobCoordinator.submitQueryJob(question, options.topK);
        await jobCoordinator.runUntilIdle();

        const job = await jobCoordinator.getJobStatus(jobId);
        if (job.kind !== 'answer_question' || job.status !== 'succeeded' || !job.result) {
          describeJob(job).forEach(io.err);
          process.exitCode = 1;
          return;
        }

        if (options.json) {
          io.out(JSON.stringify(job.result, null, 2));
          return;
        }
        io.out(job.result.answerText);
        if (job.result.sourceChunks.length > 0) {
          io.out('');
          io.out('Sources:');
          for (const chunk of job.result.sourceChunks) {
            io.out(`  [${chunk.score.toFixed(3)}] ${chunk.source} (${chunk.id})`);
          }
        }
      });
    });

  program
    .command('status')
    .description('Show one job, or counts of jobs by status')
    .argument('[jobId]', 'Job to show')
    .action(async (jobId: string | undefined) => {
      await withRuntime(async ({ services }) => {
        const { jobCoordinator } = services;
        if (jobId) {
          describeJob(await jobCoordinator.getJobStatus(jobId)).forEach(io.out);
          return;
        }
        for (const [status, count] of Object.entries(jobCoordinator.getStats())) {
          io.out(`${status.padEnd(10)} ${count}`);
        }
      });
    });

  program
    .command('retry')
    .description('Re-run a failed job from its first incomplete step')
    .argument('<jobId>', 'Failed job')
    .action(async (jobId: string) => {
      await withRuntime(async ({ services }) => {
        const { jobCoordinator } = services;
        if (!(await jobCoordinator.retryJob(jobId))) {
          io.err(`Job ${jobId} is not in a failed state`);
          process.exitCode = 1;
          return;
        }
        await jobCoordinator.runUntilIdle();
        describeJob(await jobCoordinator.getJobStatus(jobId)).forEach(io.out);
      });
    });

  program
    .command('cleanup')
    .description('Delete finished jobs older than the given age')
    .option('--days <n>', 'Days of finished jobs to keep', parsePositiveInt, 30)
    .action(async (options: CleanupCommandOptions) => {
      await withRuntime(async ({ services }) => {
        const removed = await services.jobCoordinator.cleanupOldJobs(options.days);
        io.out(`Removed ${removed} job(s)`);
      });
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch(error => {
      logger.error('[CLI] Command failed:', error);
      process.stderr.write(`Error: ${getErrorMessage(error)}\n`);
      process.exit(1);
    });
}
