import { logger } from '../../utils/logger';

/**
 * Abstract base class for all tutor services.
 * Provides common functionality like logging, error handling, and lifecycle management.
 */
export abstract class BaseService<TDeps = {}> {
  protected readonly logger = logger;
  protected readonly serviceName: string;
  protected readonly deps: TDeps;

  constructor(serviceName: string, deps: TDeps) {
    this.serviceName = serviceName;
    this.deps = deps;
  }

  /**
   * Initialize the service. Override this method to perform any async initialization.
   */
  async initialize(): Promise<void> {
    // Override in subclasses if needed
  }

  /**
   * Cleanup resources used by the service.
   */
  async cleanup(): Promise<void> {
    // Override in subclasses if needed
  }

  /**
   * Health check for the service. Override to implement custom health checks.
   */
  async healthCheck(): Promise<boolean> {
    return true;
  }

  /**
   * Execute an async operation with automatic logging and error handling.
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

  /**
   * Execute a function and run a compensating action if it fails.
   * Used where an external write cannot be rolled back (e.g. a vector store batch).
   * @returns The result of the action
   */
  protected async withCompensation<T>(
    action: () => Promise<T>,
    compensate: () => Promise<void>
  ): Promise<T> {
    try {
      return await action();
    } catch (error) {
      this.logWarn('Action failed, executing compensation...');
      try {
        await compensate();
        this.logDebug('Compensation completed successfully');
      } catch (compensationError) {
        this.logError('Compensation failed:', compensationError);
        if (error instanceof Error) {
          error.message = `${error.message} (compensation also failed: ${compensationError})`;
        }
      }
      throw error;
    }
  }
}
