import type { z } from 'zod';

/**
 * Runs the named steps of a pipeline. A durable implementation records each
 * step's output and replays it instead of running the step again.
 */
export interface StepContext {
  readonly jobId?: string;
  /**
   * @param schema Validates an output replayed from storage
   */
  run<T>(stepName: string, fn: () => Promise<T>, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T>;
}

/**
 * Runs steps directly, once each, with nothing recorded.
 */
export class InlineStepContext implements StepContext {
  readonly jobId = undefined;

  async run<T>(_stepName: string, fn: () => Promise<T>): Promise<T> {
    return fn();
  }
}
