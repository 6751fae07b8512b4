import { MetricsExportError } from './base.js';

/**
 * Error thrown when the exporter is misconfigured (e.g., missing API key, invalid base URL)
 */
export class ConfigurationError extends MetricsExportError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      category: 'configuration',
      message,
      isRetryable: false,
      details,
    });
    this.name = 'ConfigurationError';
  }

  /**
   * Create a ConfigurationError for a missing API key
   */
  static missingApiKey(): ConfigurationError {
    return new ConfigurationError(
      'Datadog API key is not set; metrics cannot be delivered',
      { field: 'apiKey' }
    );
  }

  /**
   * Create a ConfigurationError for an invalid field value
   */
  static invalidFieldValue(field: string, value: unknown, reason?: string): ConfigurationError {
    const message = reason
      ? `Invalid value for configuration field '${field}': ${reason}`
      : `Invalid value for configuration field '${field}'`;
    return new ConfigurationError(message, { field, value });
  }
}

/**
 * Error describing a metric sample that was excluded before delivery
 */
export class ValidationError extends MetricsExportError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      category: 'validation',
      message,
      isRetryable: false,
      details,
    });
    this.name = 'ValidationError';
  }

  static emptyName(): ValidationError {
    return new ValidationError('Metric name cannot be empty', { name: '' });
  }

  static missingValue(name: string): ValidationError {
    return new ValidationError(`Metric '${name}' has no value`, { name });
  }

  static nonFiniteValue(name: string, value: number): ValidationError {
    return new ValidationError(
      `Metric '${name}' has a non-finite value: ${value}`,
      { name, value: String(value) }
    );
  }
}

/**
 * Error thrown when the metrics API rejects the API or application key (401/403)
 */
export class AuthenticationError extends MetricsExportError {
  constructor(message: string, status?: number, details?: Record<string, unknown>) {
    super({
      category: 'authentication',
      message,
      status: status ?? 403,
      isRetryable: false,
      details,
    });
    this.name = 'AuthenticationError';
  }
}

/**
 * Error thrown when network-level failures occur (e.g., connection refused, DNS resolution failure)
 */
export class NetworkError extends MetricsExportError {
  constructor(message: string, cause?: Error, details?: Record<string, unknown>) {
    super({
      category: 'connection',
      message,
      isRetryable: true,
      details: { ...details, cause: cause?.message },
      cause,
    });
    this.name = 'NetworkError';
  }
}

/**
 * Error thrown when a single submission exceeds its request timeout
 */
export class TimeoutError extends MetricsExportError {
  constructor(timeoutMs: number, cause?: Error) {
    super({
      category: 'timeout',
      message: `Request timeout after ${timeoutMs}ms`,
      isRetryable: true,
      details: { timeoutMs },
      cause,
    });
    this.name = 'TimeoutError';
  }
}

/**
 * Error thrown when rate limits are exceeded (429)
 */
export class RateLimitError extends MetricsExportError {
  constructor(message: string, retryAfterMs?: number, details?: Record<string, unknown>) {
    super({
      category: 'rate_limit',
      message,
      status: 429,
      retryAfterMs,
      isRetryable: true,
      details,
    });
    this.name = 'RateLimitError';
  }
}

/**
 * Error thrown when the metrics API returns a 5xx error
 */
export class ServerError extends MetricsExportError {
  constructor(message: string, status: number, details?: Record<string, unknown>) {
    super({
      category: 'server',
      message,
      status,
      isRetryable: true,
      details,
    });
    this.name = 'ServerError';
  }
}

/**
 * Error thrown when the metrics API refuses a payload (4xx other than 401, 403 and 429)
 */
export class RequestRejectedError extends MetricsExportError {
  constructor(message: string, status: number, details?: Record<string, unknown>) {
    super({
      category: 'rejected',
      message,
      status,
      isRetryable: false,
      details,
    });
    this.name = 'RequestRejectedError';
  }
}

/**
 * Error recorded when a batch failed on every allowed attempt
 */
export class RetryExhaustedError extends MetricsExportError {
  constructor(attempts: number, lastError: MetricsExportError) {
    super({
      category: 'exhausted',
      message: `Delivery failed after ${attempts} attempts: ${lastError.message}`,
      status: lastError.status,
      isRetryable: false,
      details: { attempts, lastCategory: lastError.category },
      cause: lastError,
    });
    this.name = 'RetryExhaustedError';
  }
}

/**
 * Error recorded when delivery was stopped by the caller
 */
export class CancelledError extends MetricsExportError {
  constructor(message = 'Metrics export was cancelled') {
    super({
      category: 'cancelled',
      message,
      isRetryable: false,
    });
    this.name = 'CancelledError';
  }
}

/**
 * Error thrown when the delivery state machine receives an event it cannot accept
 */
export class DeliveryStateError extends MetricsExportError {
  constructor(state: string, event: string) {
    super({
      category: 'internal',
      message: `Event '${event}' is not valid in delivery state '${state}'`,
      isRetryable: false,
      details: { state, event },
    });
    this.name = 'DeliveryStateError';
  }
}
