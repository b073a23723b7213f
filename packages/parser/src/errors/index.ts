import { ToprankErrorCode } from './codes.js';

// Re-export for consumers
export { ToprankErrorCode } from './codes.js';

/**
 * Severity levels for errors
 */
export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

/**
 * Base error class for all toprank errors
 */
export class ToprankError extends Error {
  constructor(
    message: string,
    public readonly code: ToprankErrorCode,
    public readonly context?: Record<string, unknown>,
    public readonly severity: ErrorSeverity = 'medium',
    public readonly recoverable: boolean = true,
  ) {
    super(message);
    this.name = 'ToprankError';

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for the json report format
   */
  toJSON() {
    return {
      error: this.message,
      code: this.code,
      severity: this.severity,
      recoverable: this.recoverable,
      context: this.context,
    };
  }

  isRecoverable(): boolean {
    return this.recoverable;
  }
}

/**
 * Configuration errors (config file, option values)
 */
export class ConfigError extends ToprankError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ToprankErrorCode.CONFIG_INVALID, context, 'medium', false);
    this.name = 'ConfigError';
  }
}

/**
 * A single source file could not be read or parsed.
 * The file is dropped from the run; other files are unaffected.
 */
export class ParseError extends ToprankError {
  constructor(
    message: string,
    public readonly file: string,
    context?: Record<string, unknown>,
    code: ToprankErrorCode = ToprankErrorCode.PARSE_FAILED,
  ) {
    super(message, code, { ...context, file }, 'low', true);
    this.name = 'ParseError';
  }
}

/**
 * The analyzed root is missing or is not a directory. Aborts the run.
 */
export class InvalidPathError extends ToprankError {
  constructor(
    message: string,
    public readonly path: string,
    context?: Record<string, unknown>,
  ) {
    super(message, ToprankErrorCode.INVALID_PATH, { ...context, path }, 'critical', false);
    this.name = 'InvalidPathError';
  }
}

/**
 * A ranking could not be written to its output file
 */
export class OutputError extends ToprankError {
  constructor(
    message: string,
    public readonly path: string,
    context?: Record<string, unknown>,
  ) {
    super(message, ToprankErrorCode.WRITE_FAILED, { ...context, path }, 'high', false);
    this.name = 'OutputError';
  }
}

/**
 * Helper function to wrap unknown errors with context
 * @param error - Unknown error object to wrap
 * @param context - Context message describing what operation failed
 * @param additionalContext - Optional additional context data
 * @returns ToprankError with proper message and context
 */
export function wrapError(
  error: unknown,
  context: string,
  additionalContext?: Record<string, unknown>,
): ToprankError {
  const message = getErrorMessage(error);
  const stack = error instanceof Error ? error.stack : undefined;

  const wrappedError = new ToprankError(
    `${context}: ${message}`,
    ToprankErrorCode.INTERNAL_ERROR,
    additionalContext,
  );

  // Preserve original stack trace if available
  if (stack) {
    wrappedError.stack = `${wrappedError.stack}\n\nCaused by:\n${stack}`;
  }

  return wrappedError;
}

/**
 * Type guard to check if an error is a ToprankError
 */
export function isToprankError(error: unknown): error is ToprankError {
  return error instanceof ToprankError;
}

/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Extract stack trace from unknown error type
 */
export function getErrorStack(error: unknown): string | undefined {
  if (error instanceof Error) {
    return error.stack;
  }
  return undefined;
}
