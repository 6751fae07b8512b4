/**
 * Base error class for all metrics export errors.
 *
 * Provides structured error information with category, retry capabilities,
 * and optional cause tracking.
 */

/**
 * Error category for classifying metrics export failures
 */
export type ErrorCategory =
  | 'configuration'
  | 'validation'
  | 'authentication'
  | 'connection'
  | 'timeout'
  | 'rate_limit'
  | 'server'
  | 'rejected'
  | 'exhausted'
  | 'cancelled'
  | 'internal';

export interface MetricsExportErrorOptions {
  category: ErrorCategory;
  message: string;
  isRetryable?: boolean;
  status?: number;
  retryAfterMs?: number;
  details?: Record<string, unknown>;
  cause?: Error;
}

/**
 * Base error class for all metrics export errors.
 */
export abstract class MetricsExportError extends Error {
  /**
   * The category of error for classification and handling
   */
  public readonly category: ErrorCategory;

  /**
   * Indicates whether the failed operation may be attempted again
   */
  public readonly isRetryable: boolean;

  /**
   * HTTP status returned by the metrics API, if any
   */
  public readonly status?: number;

  /**
   * Server-requested wait before the next attempt
   */
  public readonly retryAfterMs?: number;

  public readonly details?: Record<string, unknown>;

  public readonly cause?: Error;

  constructor(options: MetricsExportErrorOptions) {
    super(options.message);
    this.name = 'MetricsExportError';
    this.category = options.category;
    this.isRetryable = options.isRetryable ?? false;
    this.status = options.status;
    this.retryAfterMs = options.retryAfterMs;
    this.details = options.details;
    this.cause = options.cause;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Returns a JSON representation of the error
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      isRetryable: this.isRetryable,
      status: this.status,
      retryAfterMs: this.retryAfterMs,
      details: this.details,
      cause: this.cause?.message,
    };
  }

  toString(): string {
    let result = `${this.name}: ${this.message}`;
    if (this.cause) {
      result += `\nCaused by: ${this.cause.message}`;
    }
    return result;
  }
}

/**
 * Type guard to check if an error is a MetricsExportError
 */
export function isMetricsExportError(error: unknown): error is MetricsExportError {
  return error instanceof MetricsExportError;
}

/**
 * Type guard to check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  return isMetricsExportError(error) && error.isRetryable;
}

/**
 * Type guard to check if an error belongs to a specific category
 */
export function isErrorCategory(error: unknown, category: ErrorCategory): boolean {
  return isMetricsExportError(error) && error.category === category;
}
