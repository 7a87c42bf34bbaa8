/**
 * Error types shared by the store, index and pipeline.
 *
 * "Not found" is not an error anywhere in this package: store reads return
 * null and searches without matches return an empty list.
 */

export class PipelineError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'PipelineError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * Malformed configuration or call arguments.
 */
export class ConfigurationError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'ConfigurationError';
  }
}

/**
 * Filesystem or vector backend write/delete failure.
 */
export class StorageError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'StorageError';
  }
}

/**
 * Read or search failure of the document store or vector backend.
 */
export class RetrievalError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'RetrievalError';
  }
}

export class EmbeddingError extends PipelineError {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, options.cause);
    this.name = 'EmbeddingError';
    this.status = options.status;
  }
}

export class OperationTimeoutError extends RetrievalError {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'OperationTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Render any thrown value as a message string.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
