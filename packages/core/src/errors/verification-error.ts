/**
 * Error types for verification runs
 *
 * Every failure that crosses a package boundary is a VerificationError, so
 * callers can branch on `code` instead of parsing messages.
 */

export type ErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'TABLE_NOT_FOUND'
  | 'NOT_PARTITIONED'
  | 'INVALID_IDENTIFIER'
  | 'INVALID_PARTITION'
  | 'CONNECTION_FAILED'
  | 'QUERY_FAILED'
  | 'PERSISTENCE_FAILED'
  | 'RETRY_EXHAUSTED'
  | 'TIMEOUT'
  | 'CANCELLED'
  | 'UNKNOWN';

export interface VerificationErrorDetails {
  /** Error code for programmatic handling */
  code: ErrorCode;
  /** Human-readable message */
  message: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class VerificationError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: VerificationErrorDetails) {
    super(details.message);
    this.name = 'VerificationError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    // Maintains proper stack trace in V8 environments
    if ('captureStackTrace' in Error) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Message with code and suggested action, for logs and CLI output
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];

    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }

    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/**
 * Raised by the retry executor once every attempt has failed.
 * `cause` holds the error of the last attempt.
 */
export class RetryExhaustedError extends VerificationError {
  readonly operationName: string;
  readonly attempts: number;

  constructor(operationName: string, attempts: number, cause: unknown) {
    const lastError = cause instanceof Error ? cause : new Error(String(cause));
    super({
      code: 'RETRY_EXHAUSTED',
      message: `Operation '${operationName}' failed after ${attempts} attempts: ${lastError.message}`,
      cause: lastError,
      context: { operationName, attempts },
    });
    this.name = 'RetryExhaustedError';
    this.operationName = operationName;
    this.attempts = attempts;
  }
}

export function isVerificationError(error: unknown, code?: ErrorCode): error is VerificationError {
  return error instanceof VerificationError && (code === undefined || error.code === code);
}

/**
 * Helper to wrap unknown errors as VerificationError
 */
export function wrapError(
  error: unknown,
  defaultCode: ErrorCode = 'UNKNOWN',
  context?: Record<string, unknown>
): VerificationError {
  if (error instanceof VerificationError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new VerificationError({
    code: defaultCode,
    message,
    cause,
    context,
  });
}

/**
 * Error raised when an operation observes an aborted signal
 */
export function cancelledError(operation: string): VerificationError {
  return new VerificationError({
    code: 'CANCELLED',
    message: `${operation} was cancelled`,
  });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
