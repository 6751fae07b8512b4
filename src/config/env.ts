/**
 * Environment variable configuration for the metrics exporter
 */

import { ConsoleLogger, parseLogFormat, parseLogLevel } from '../observability/index.js';
import type { MetricsExporterConfigInput, RetryConfig } from './config.js';

/**
 * Parse tags from an environment variable string.
 *
 * Accepts `key:value` entries separated by commas and/or whitespace, the
 * way `DD_TAGS` is written.
 */
export function parseTags(tagsString: string): string[] {
  const tags: string[] = [];

  for (const entry of tagsString.split(/[\s,]+/)) {
    const trimmed = entry.trim();
    if (!trimmed) {
      continue;
    }

    const colonIndex = trimmed.indexOf(':');
    if (colonIndex <= 0 || colonIndex === trimmed.length - 1) {
      // Skip entries without a key or value
      continue;
    }

    tags.push(trimmed);
  }

  return tags;
}

function parseNumber(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }

  const parsed = Number(value);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Create configuration from environment variables
 *
 * Reads configuration from the following environment variables:
 * - DD_API_KEY - Datadog API key
 * - DD_APP_KEY - Datadog application key
 * - DATADOG_HOST - Full API base URL override (testing/staging)
 * - DD_SITE - Datadog site, e.g. datadoghq.eu
 * - DD_TAGS - Default tags
 * - DD_METRICS_BATCH_SIZE - Samples per submission
 * - DD_METRICS_MAX_RETRIES - Attempts per batch
 * - DD_METRICS_BASE_DELAY_MS - First backoff delay
 * - DD_METRICS_TIMEOUT_MS - Per-request timeout
 * - LOG_LEVEL - Exporter log level
 * - LOG_FORMAT - `text` or `json` log lines
 *
 * @returns Partial configuration from environment variables
 */
export function configFromEnvironment(
  env: NodeJS.ProcessEnv = process.env
): MetricsExporterConfigInput {
  const config: MetricsExporterConfigInput = {};

  if (env.DD_API_KEY) {
    config.apiKey = env.DD_API_KEY;
  }

  if (env.DD_APP_KEY) {
    config.appKey = env.DD_APP_KEY;
  }

  // DATADOG_HOST wins over DD_SITE
  if (env.DATADOG_HOST) {
    config.baseUrl = env.DATADOG_HOST;
  } else if (env.DD_SITE) {
    config.baseUrl = `https://api.${env.DD_SITE}`;
  }

  if (env.DD_TAGS) {
    config.defaultTags = parseTags(env.DD_TAGS);
  }

  const batchSize = parseNumber(env.DD_METRICS_BATCH_SIZE);
  if (batchSize !== undefined) {
    config.batchSize = batchSize;
  }

  const timeoutMs = parseNumber(env.DD_METRICS_TIMEOUT_MS);
  if (timeoutMs !== undefined) {
    config.timeoutMs = timeoutMs;
  }

  const retry: Partial<RetryConfig> = {};
  const maxAttempts = parseNumber(env.DD_METRICS_MAX_RETRIES);
  if (maxAttempts !== undefined) {
    retry.maxAttempts = maxAttempts;
  }
  const baseDelayMs = parseNumber(env.DD_METRICS_BASE_DELAY_MS);
  if (baseDelayMs !== undefined) {
    retry.baseDelayMs = baseDelayMs;
  }
  if (Object.keys(retry).length > 0) {
    config.retry = retry;
  }

  if (env.LOG_LEVEL || env.LOG_FORMAT) {
    config.logger = new ConsoleLogger({
      level: parseLogLevel(env.LOG_LEVEL),
      format: parseLogFormat(env.LOG_FORMAT),
    });
  }

  return config;
}
