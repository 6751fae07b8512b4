/**
 * Error classes for the metrics exporter.
 */

export {
  MetricsExportError,
  isMetricsExportError,
  isRetryableError,
  isErrorCategory,
} from './base.js';
export type { ErrorCategory, MetricsExportErrorOptions } from './base.js';

export {
  ConfigurationError,
  ValidationError,
  AuthenticationError,
  NetworkError,
  TimeoutError,
  RateLimitError,
  ServerError,
  RequestRejectedError,
  RetryExhaustedError,
  CancelledError,
  DeliveryStateError,
} from './categories.js';
