// Path: src/utils/error.ts
// Error handling utilities - consolidate common error extraction patterns

/**
 * Extract error message from unknown error type.
 * Safely handles Error objects, strings, and other types.
 *
 * @param err - Unknown error value
 * @returns Error message string
 */
export function extractErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  if (typeof err === 'string') {
    return err;
  }
  return String(err);
}

/**
 * Summarize an error as `Name: message` for rotation notes.
 * Non-Error values are rendered with String().
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`;
  }
  return extractErrorMessage(err);
}

/**
 * Create a standardized error with code and metadata.
 */
export class RotorError extends Error {
  readonly code: string;
  readonly metadata?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    options?: {
      cause?: Error;
      metadata?: Record<string, unknown>;
    }
  ) {
    super(message);
    this.name = 'RotorError';
    this.code = code;
    this.metadata = options?.metadata;

    if (options?.cause) {
      this.cause = options.cause;
    }
  }
}

/**
 * Raised when the rotation event log can't be written.
 * This is the one rotation-path failure that is allowed to propagate.
 */
export class EventLogError extends RotorError {
  constructor(filePath: string, cause: unknown) {
    super(
      `Failed to append rotation event to ${filePath}: ${extractErrorMessage(cause)}`,
      'EVENT_LOG_WRITE_FAILED',
      {
        cause: cause instanceof Error ? cause : undefined,
        metadata: { filePath },
      }
    );
    this.name = 'EventLogError';
  }
}

/**
 * Raised when an awaited operation does not settle in time.
 */
export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}
