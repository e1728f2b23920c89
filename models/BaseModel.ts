import { ServiceError } from '../services/base/ServiceError';
import { logger } from '../utils/logger';

/**
 * Base class for file-backed models, providing common error management
 */
export abstract class BaseModel {
  protected abstract readonly modelName: string;

  /**
   * Handle filesystem errors consistently across all models
   * @param context - Description of the operation that failed
   * @throws ServiceError with code STORAGE_ERROR
   */
  protected handleIoError(error: unknown, context: string): never {
    const message = error instanceof Error ? error.message : 'Unknown storage error';
    logger.error(`[${this.modelName}] Storage error in ${context}: ${message}`, error);

    if (error instanceof ServiceError) {
      throw error;
    }
    throw new ServiceError(`Storage operation failed in ${context}: ${message}`, 'STORAGE_ERROR', 500, { context });
  }
}
