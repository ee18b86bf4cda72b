import { CrapScoreErrorCode } from './codes.js';

// Re-export for consumers
export { CrapScoreErrorCode } from './codes.js';

/**
 * Severity levels for errors
 */
export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

/**
 * Base error class for all crapscore errors
 */
export class CrapScoreError extends Error {
  constructor(
    message: string,
    public readonly code: CrapScoreErrorCode,
    public readonly context?: Record<string, unknown>,
    public readonly severity: ErrorSeverity = 'medium',
  ) {
    super(message);
    this.name = 'CrapScoreError';

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for machine-readable output
   */
  toJSON() {
    return {
      error: this.message,
      code: this.code,
      severity: this.severity,
      context: this.context,
    };
  }
}

/**
 * Caller contract violations: negative threshold, negative or fractional
 * topN, an invalid config file. Nothing is computed when this is thrown.
 */
export class InvalidConfigurationError extends CrapScoreError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
    context?: Record<string, unknown>,
  ) {
    super(message, CrapScoreErrorCode.CONFIG_INVALID, { ...context, issues }, 'high');
    this.name = 'InvalidConfigurationError';
  }
}

/**
 * Coverage report could not be found, read, or recognized
 */
export class CoverageReportError extends CrapScoreError {
  constructor(
    message: string,
    code: CrapScoreErrorCode.COVERAGE_NOT_FOUND | CrapScoreErrorCode.COVERAGE_INVALID,
    public readonly reportPath: string,
    context?: Record<string, unknown>,
  ) {
    super(message, code, { ...context, reportPath }, 'high');
    this.name = 'CoverageReportError';
  }
}

/**
 * Helper function to wrap unknown errors with context
 * @param error - Unknown error object to wrap
 * @param context - Context message describing what operation failed
 * @param additionalContext - Optional additional context data
 * @returns CrapScoreError with proper message and context
 */
export function wrapError(
  error: unknown,
  context: string,
  additionalContext?: Record<string, unknown>,
): CrapScoreError {
  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  const wrappedError = new CrapScoreError(
    `${context}: ${message}`,
    CrapScoreErrorCode.INTERNAL_ERROR,
    additionalContext,
  );

  // Preserve original stack trace if available
  if (stack) {
    wrappedError.stack = `${wrappedError.stack}\n\nCaused by:\n${stack}`;
  }

  return wrappedError;
}

/**
 * Type guard to check if an error is a CrapScoreError
 */
export function isCrapScoreError(error: unknown): error is CrapScoreError {
  return error instanceof CrapScoreError;
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
