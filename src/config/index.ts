/**
 * Configuration module exports for the metrics exporter
 */

export {
  type MetricsExporterConfig,
  type MetricsExporterConfigInput,
  type RetryConfig,
  DEFAULT_BASE_URL,
  SERIES_PATH,
  MAX_BATCH_SIZE,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_ASYNC_TIMEOUT_MS,
  DEFAULT_CONNECTIONS,
  DEFAULT_RETRY_CONFIG,
  createDefaultConfig,
  validateConfig,
  hasApiKey,
} from './config.js';
export { configFromEnvironment, parseTags } from './env.js';
