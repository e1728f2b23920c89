/**
 * Base error class for all service-related errors
 */
export class ServiceError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: unknown;

  constructor(message: string, code: string, statusCode: number = 500, details?: unknown) {
    super(message);
    this.name = 'ServiceError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    // Maintains proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Error thrown when a requested user, session, plan or topic is not found
 */
export class NotFoundError extends ServiceError {
  constructor(resource: string, id?: string, details?: unknown) {
    const message = id
      ? `${resource} with id '${id}' not found`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', 404, details);
    this.name = 'NotFoundError';
  }
}

/**
 * Error thrown when input validation fails
 */
export class ValidationError extends ServiceError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when an external service (chat, embeddings, vector database) fails
 */
export class ExternalServiceError extends ServiceError {
  public readonly service: string;

  constructor(service: string, message: string, details?: unknown) {
    super(`External service '${service}' error: ${message}`, 'EXTERNAL_SERVICE_ERROR', 503, details);
    this.name = 'ExternalServiceError';
    this.service = service;
  }
}

/**
 * Error thrown when there's a conflict with existing data
 */
export class ConflictError extends ServiceError {
  constructor(resource: string, message: string, details?: unknown) {
    super(`Conflict with ${resource}: ${message}`, 'CONFLICT_ERROR', 409, details);
    this.name = 'ConflictError';
  }
}

export interface ExtractionAttempt {
  method: string;
  error: string;
}

/**
 * Error thrown when no extraction strategy produced usable pages for a document
 */
export class ExtractionError extends ServiceError {
  public readonly file: string;
  public readonly attempts: ExtractionAttempt[];

  constructor(file: string, attempts: ExtractionAttempt[]) {
    const summary = attempts.map(a => `${a.method}: ${a.error}`).join('; ');
    super(`All extraction methods failed for ${file} (${summary})`, 'EXTRACTION_ERROR', 422, { attempts });
    this.name = 'ExtractionError';
    this.file = file;
    this.attempts = attempts;
  }
}
