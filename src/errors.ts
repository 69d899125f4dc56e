/**
 * Error taxonomy for refnote-sync
 *
 * Integrity errors abort the whole invocation. Stage errors are caught at the
 * item boundary and become a Failed(stage, reason) item state. Conflicts are
 * recorded per operation and never abort a plan.
 */

/**
 * Base error class with a stable code and an optional suggestion
 */
export class RefnoteError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'RefnoteError';
  }

  /**
   * Get a user-facing formatted error message
   */
  toUserMessage(): string {
    let msg = `Error: ${this.message}`;
    if (this.suggestion) {
      msg += `\n\nSuggestion: ${this.suggestion}`;
    }
    return msg;
  }
}

/**
 * Missing or malformed configuration
 */
export class ConfigError extends RefnoteError {
  constructor(
    message: string,
    public readonly field?: string,
    suggestion?: string
  ) {
    super(message, 'CONFIG_ERROR', suggestion);
    this.name = 'ConfigError';
  }
}

/**
 * Backup, checkpoint or done-record persistence failed. Fatal to the run.
 */
export class IntegrityError extends RefnoteError {
  constructor(
    message: string,
    public readonly cause?: Error
  ) {
    super(message, 'INTEGRITY_ERROR', 'Check free disk space and permissions of the state and backup directories');
    this.name = 'IntegrityError';
  }
}

/**
 * A destination path is already occupied, or a key is duplicated
 */
export class ConflictError extends RefnoteError {
  constructor(
    message: string,
    public readonly path?: string
  ) {
    super(message, 'CONFLICT');
    this.name = 'ConflictError';
  }
}

/**
 * An item failed inside a pipeline stage
 */
export class StageError extends RefnoteError {
  constructor(
    public readonly stage: string,
    public readonly reason: string
  ) {
    super(`${stage} failed: ${reason}`, 'STAGE_FAILED');
    this.name = 'StageError';
  }
}

/**
 * The retry budget for an external call ran out
 */
export class RetriesExhaustedError extends RefnoteError {
  constructor(
    public readonly attempts: number,
    public readonly lastError: Error
  ) {
    super(`Gave up after ${attempts} attempt(s): ${lastError.message}`, 'RETRIES_EXHAUSTED');
    this.name = 'RetriesExhaustedError';
  }
}

/**
 * The external service rejected the request in a way retrying cannot fix
 */
export class NonRetryableError extends RefnoteError {
  constructor(public readonly lastError: Error) {
    super(`Request rejected: ${lastError.message}`, 'NON_RETRYABLE');
    this.name = 'NonRetryableError';
  }
}

/**
 * Type guard for RefnoteError
 */
export function isRefnoteError(error: unknown): error is RefnoteError {
  return error instanceof RefnoteError;
}

/**
 * Coerce an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Format any error into a user-facing message
 */
export function formatError(error: unknown): string {
  if (isRefnoteError(error)) {
    return error.toUserMessage();
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}
