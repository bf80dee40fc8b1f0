import { logger } from '../../utils/logger';

/**
 * Abstract base class for the pipeline services.
 * Provides logging, timed execution and lifecycle hooks.
 */
export abstract class BaseService<TDeps = Record<string, never>> {
  protected readonly logger = logger;
  protected readonly serviceName: string;
  protected readonly deps: TDeps;

  constructor(serviceName: string, deps: TDeps) {
    this.serviceName = serviceName;
    this.deps = deps;
  }

  /**
   * Initialize the service. Override to perform async initialization.
   */
  async initialize(): Promise<void> {
    // Override in subclasses if needed
  }

  /**
   * Release resources held by the service.
   */
  async cleanup(): Promise<void> {
    // Override in subclasses if needed
  }

  /**
   * @returns true if the service is healthy
   */
  async healthCheck(): Promise<boolean> {
    return true;
  }

  /**
   * Execute an async operation with start/completion/failure logging.
   * @param operation The operation name for logging
   * @param fn The async function to execute
   * @param context Optional context object for logging
   */
  protected async execute<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: Record<string, unknown>
  ): Promise<T> {
    const startTime = Date.now();
    const logContext = context ? `, context: ${JSON.stringify(context)}` : '';

    this.logger.debug(`[${this.serviceName}] ${operation} started${logContext}`);

    try {
      const result = await fn();
      const duration = Date.now() - startTime;
      this.logger.debug(`[${this.serviceName}] ${operation} completed in ${duration}ms`);
      return result;
    } catch (error) {
      const duration = Date.now() - startTime;
      this.logger.error(`[${this.serviceName}] ${operation} failed after ${duration}ms:`, error);
      throw error;
    }
  }

  protected logInfo(message: string, ...args: unknown[]): void {
    this.logger.info(`[${this.serviceName}] ${message}`, ...args);
  }

  protected logDebug(message: string, ...args: unknown[]): void {
    this.logger.debug(`[${this.serviceName}] ${message}`, ...args);
  }

  protected logWarn(message: string, ...args: unknown[]): void {
    this.logger.warn(`[${this.serviceName}] ${message}`, ...args);
  }

  protected logError(message: string, error?: unknown, ...args: unknown[]): void {
    if (error) {
      this.logger.error(`[${this.serviceName}] ${message}`, error, ...args);
    } else {
      this.logger.error(`[${this.serviceName}] ${message}`, ...args);
    }
  }
}
