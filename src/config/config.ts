/**
 * Configuration types for the metrics exporter.
 * @module config
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import type { Logger } from '../observability/index.js';

/** Default Datadog API base URL. */
export const DEFAULT_BASE_URL = 'https://api.datadoghq.com';

/** Path of the metrics series intake. */
export const SERIES_PATH = '/api/v1/series';

/** Records per HTTP submission accepted by the intake. */
export const MAX_BATCH_SIZE = 20;

/** Default per-request timeout in milliseconds. */
export const DEFAULT_TIMEOUT_MS = 10000;

/** Default wait for in-flight asynchronous exports in milliseconds. */
export const DEFAULT_ASYNC_TIMEOUT_MS = 30000;

/** Default number of pooled connections to the intake. */
export const DEFAULT_CONNECTIONS = 10;

/**
 * Retry configuration.
 */
export interface RetryConfig {
  /** Total attempts per batch, including the first. */
  maxAttempts: number;
  /** Delay before the second attempt in milliseconds. */
  baseDelayMs: number;
  /** Upper bound for computed backoff delays in milliseconds. */
  maxDelayMs: number;
  /** Jitter factor (0.0 to 1.0); 0 gives a deterministic 1s, 2s, 4s sequence. */
  jitterFactor: number;
}

/**
 * Default retry configuration.
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0,
};

/**
 * Metrics exporter configuration.
 */
export interface MetricsExporterConfig {
  /** Datadog API key. Delivery is refused when missing. */
  apiKey?: string;
  /** Optional Datadog application key. */
  appKey?: string;
  /** API base URL (protocol and host, no trailing slash). */
  baseUrl: string;
  /** Per-request timeout in milliseconds. */
  timeoutMs: number;
  /** Samples per HTTP submission. */
  batchSize: number;
  retry: RetryConfig;
  /** How long `flush()` waits for asynchronous exports. */
  asyncTimeoutMs: number;
  /** Size of the shared connection pool. */
  connections: number;
  /** Tags applied to every sample of every export. */
  defaultTags: string[];
  logger?: Logger;
}

/**
 * Input accepted by `validateConfig`; everything except nested retry fields is optional.
 */
export type MetricsExporterConfigInput = Partial<Omit<MetricsExporterConfig, 'retry'>> & {
  retry?: Partial<RetryConfig>;
};

const retrySchema = z.object({
  maxAttempts: z.number().int().min(1),
  baseDelayMs: z.number().int().min(0),
  maxDelayMs: z.number().int().min(0),
  jitterFactor: z.number().min(0).max(1),
});

const configSchema = z.object({
  apiKey: z.string().optional(),
  appKey: z.string().optional(),
  baseUrl: z
    .string()
    .url()
    .refine((url) => url.startsWith('http://') || url.startsWith('https://'), {
      message: 'Base URL must start with http:// or https://',
    }),
  timeoutMs: z.number().int().positive(),
  batchSize: z.number().int().min(1).max(MAX_BATCH_SIZE),
  retry: retrySchema,
  asyncTimeoutMs: z.number().int().positive(),
  connections: z.number().int().positive(),
  defaultTags: z.array(z.string()),
});

/**
 * Creates a default exporter configuration.
 */
export function createDefaultConfig(): MetricsExporterConfig {
  return {
    baseUrl: DEFAULT_BASE_URL,
    timeoutMs: DEFAULT_TIMEOUT_MS,
    batchSize: MAX_BATCH_SIZE,
    retry: { ...DEFAULT_RETRY_CONFIG },
    asyncTimeoutMs: DEFAULT_ASYNC_TIMEOUT_MS,
    connections: DEFAULT_CONNECTIONS,
    defaultTags: [],
  };
}

/**
 * Applies defaults and validates an exporter configuration.
 *
 * A missing API key is accepted here; the exporter reports it per export
 * call so that a benchmark can construct it unconditionally.
 *
 * @throws {ConfigurationError} If any field is invalid.
 */
export function validateConfig(input: MetricsExporterConfigInput = {}): MetricsExporterConfig {
  const defaults = createDefaultConfig();
  const { logger, ...rest } = input;

  const candidate = {
    ...defaults,
    ...rest,
    retry: { ...defaults.retry, ...input.retry },
  };

  const parsed = configSchema.safeParse(candidate);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? issue.path.join('.') : 'config';
    throw ConfigurationError.invalidFieldValue(
      field,
      readPath(candidate, issue?.path ?? []),
      issue?.message
    );
  }

  const config: MetricsExporterConfig = {
    ...parsed.data,
    apiKey: normalizeKey(parsed.data.apiKey),
    appKey: normalizeKey(parsed.data.appKey),
    baseUrl: parsed.data.baseUrl.replace(/\/+$/, ''),
  };
  if (logger) {
    config.logger = logger;
  }
  return config;
}

/**
 * Returns true when the configuration carries a usable API key.
 */
export function hasApiKey(config: MetricsExporterConfig): config is MetricsExporterConfig & { apiKey: string } {
  return typeof config.apiKey === 'string' && config.apiKey.length > 0;
}

function normalizeKey(key: string | undefined): string | undefined {
  const trimmed = key?.trim();
  return trimmed ? trimmed : undefined;
}

function readPath(value: unknown, path: ReadonlyArray<string | number>): unknown {
  let current: unknown = value;
  for (const segment of path) {
    if (current === null || typeof current !== 'object') {
      return undefined;
    }
    current = Reflect.get(current, segment);
  }
  return current;
}
