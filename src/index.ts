/**
 * Benchmark metrics exporter
 *
 * Delivers benchmark results (latency percentiles, throughput, task success
 * counts) to the Datadog metrics API in bounded batches, with exponential
 * backoff retries, optional background dispatch and partial-success
 * accounting.
 *
 * @example
 * ```typescript
 * import { MetricsExporter } from 'benchmark-metrics-exporter';
 *
 * const exporter = MetricsExporter.fromEnvironment();
 * const handle = exporter.exportAsync(
 *   { latency_p95: 150.5 },
 *   'inference.benchmark.aiperf',
 *   ['model:test-model']
 * );
 * await exporter.close();
 * ```
 *
 * @packageDocumentation
 */

// Exporter exports
export {
  MetricsExporter,
  emptyResult,
  isFullySuccessful,
  summarize,
  type ExportErrorKind,
  type ExportErrorMarker,
  type ExportHandle,
  type ExportOptions,
  type ExportResult,
  type MetricsExporterOptions,
} from './exporter/index.js';

// Configuration exports
export {
  DEFAULT_ASYNC_TIMEOUT_MS,
  DEFAULT_BASE_URL,
  DEFAULT_CONNECTIONS,
  DEFAULT_RETRY_CONFIG,
  DEFAULT_TIMEOUT_MS,
  MAX_BATCH_SIZE,
  SERIES_PATH,
  configFromEnvironment,
  createDefaultConfig,
  hasApiKey,
  parseTags,
  validateConfig,
  type MetricsExporterConfig,
  type MetricsExporterConfigInput,
  type RetryConfig,
} from './config/index.js';

// Error exports
export {
  AuthenticationError,
  CancelledError,
  ConfigurationError,
  DeliveryStateError,
  MetricsExportError,
  NetworkError,
  RateLimitError,
  RequestRejectedError,
  RetryExhaustedError,
  ServerError,
  TimeoutError,
  ValidationError,
  isErrorCategory,
  isMetricsExportError,
  isRetryableError,
  type ErrorCategory,
} from './errors/index.js';

// Samples and batches
export {
  buildSamples,
  normalizeTags,
  partition,
  qualifyName,
  toSeriesPayload,
  type Batch,
  type MetricSample,
  type MetricValues,
  type SeriesEntry,
  type SeriesPayload,
} from './metrics/index.js';

// Delivery
export {
  BatchDeliverer,
  computeBackoff,
  initialState,
  isTerminal,
  systemClock,
  transition,
  type AttemptOutcome,
  type BatchOutcome,
  type Clock,
  type DeliveryAttempt,
  type DeliveryEvent,
  type DeliveryState,
  type TransitionContext,
} from './delivery/index.js';

// Transport
export {
  UndiciMetricsTransport,
  createMetricsTransport,
  type MetricsTransport,
  type SubmitOptions,
  type SubmitResponse,
  type UndiciTransportOptions,
} from './transport/index.js';

// Logging
export {
  ConsoleLogger,
  NoopLogger,
  type LogFormat,
  type ConsoleLoggerOptions,
  type LogLevel,
  type Logger,
} from './observability/index.js';

// Benchmark results
export {
  benchmarkTags,
  metricPrefixFor,
  parseAiperfResults,
  parseOsworldResults,
  reportBenchmarkResults,
  type BenchmarkContext,
  type BenchmarkKind,
  type BenchmarkRun,
} from './results/index.js';
