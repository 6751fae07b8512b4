/**
 * MetricsExporter - batched, retrying delivery of benchmark results
 *
 * Turns a mapping of metric short names to values into namespaced gauge
 * samples, splits them into batches of at most 20, and submits each batch
 * to the Datadog series intake through the retry state machine.
 *
 * - Batches are independent: one permanently failed batch does not stop the rest
 * - Per-sample and per-batch failures are reported in the result, never thrown
 * - `async: true` hands back a handle immediately; `flush()` waits for those
 *   exports before process exit
 *
 * @example
 * ```typescript
 * const exporter = MetricsExporter.fromEnvironment();
 *
 * const result = await exporter.export(
 *   { latency_p95: 150.5, throughput: 100.2 },
 *   'inference.benchmark.aiperf',
 *   ['model:test-model', 'benchmark:aiperf']
 * );
 * console.log(`${result.delivered}/${result.attempted} delivered`);
 *
 * await exporter.close();
 * ```
 */

import {
  configFromEnvironment,
  hasApiKey,
  validateConfig,
  type MetricsExporterConfig,
  type MetricsExporterConfigInput,
} from '../config/index.js';
import { BatchDeliverer, systemClock, type BatchOutcome, type Clock } from '../delivery/index.js';
import { AuthenticationError, ConfigurationError, type MetricsExportError } from '../errors/index.js';
import {
  buildSamples,
  metricEntries,
  normalizeTags,
  partition,
  type Batch,
  type MetricValues,
} from '../metrics/index.js';
import { ConsoleLogger, type Logger } from '../observability/index.js';
import { createMetricsTransport, type MetricsTransport } from '../transport/index.js';
import { emptyResult, summarize, type ExportErrorMarker, type ExportResult } from './result.js';

export interface ExportOptions {
  /** Return a handle immediately and deliver in the background */
  async?: boolean;
  /** Stops further attempts when aborted */
  signal?: AbortSignal;
}

/**
 * Handle for an export running in the background
 */
export interface ExportHandle {
  /** Resolves once every batch is resolved; never rejects */
  readonly result: Promise<ExportResult>;
  /** Stops further attempts; batches not yet delivered are reported failed */
  cancel(reason?: string): void;
}

/**
 * Collaborators that tests and embedders may replace
 */
export interface MetricsExporterOptions {
  transport?: MetricsTransport;
  clock?: Clock;
  random?: () => number;
}

export class MetricsExporter {
  readonly config: MetricsExporterConfig;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly transport?: MetricsTransport;
  private readonly ownsTransport: boolean;
  private readonly deliverer?: BatchDeliverer;
  private readonly inFlight = new Set<Promise<ExportResult>>();

  /**
   * @throws {ConfigurationError} If the configuration is invalid. A missing
   * API key is not an error here; exports report it instead.
   */
  constructor(config: MetricsExporterConfigInput = {}, options: MetricsExporterOptions = {}) {
    this.config = validateConfig(config);
    this.logger = this.config.logger ?? new ConsoleLogger();
    this.clock = options.clock ?? systemClock;

    if (options.transport) {
      this.transport = options.transport;
    } else if (hasApiKey(this.config)) {
      this.transport = createMetricsTransport({
        baseUrl: this.config.baseUrl,
        apiKey: this.config.apiKey,
        appKey: this.config.appKey,
        timeoutMs: this.config.timeoutMs,
        connections: this.config.connections,
        logger: this.logger,
      });
    }
    this.ownsTransport = options.transport === undefined;

    if (this.transport) {
      this.deliverer = new BatchDeliverer({
        transport: this.transport,
        retry: this.config.retry,
        clock: this.clock,
        random: options.random,
        logger: this.logger,
      });
    }
  }

  /**
   * Create an exporter from environment variables, with explicit overrides on top
   */
  static fromEnvironment(
    overrides: MetricsExporterConfigInput = {},
    options: MetricsExporterOptions = {},
    env: NodeJS.ProcessEnv = process.env
  ): MetricsExporter {
    const fromEnv = configFromEnvironment(env);
    return new MetricsExporter(
      {
        ...fromEnv,
        ...overrides,
        retry: { ...fromEnv.retry, ...overrides.retry },
      },
      options
    );
  }

  /**
   * Export a run's metrics.
   *
   * @param metrics - Short name to value; null, undefined and non-finite values are excluded
   * @param metricPrefix - Namespace joined to every short name with `.`
   * @param baseTags - `key:value` tags for every sample, merged with the default tags
   */
  export(
    metrics: MetricValues,
    metricPrefix: string,
    baseTags: Iterable<string>,
    options?: ExportOptions & { async?: false }
  ): Promise<ExportResult>;
  export(
    metrics: MetricValues,
    metricPrefix: string,
    baseTags: Iterable<string>,
    options: ExportOptions & { async: true }
  ): ExportHandle;
  export(
    metrics: MetricValues,
    metricPrefix: string,
    baseTags: Iterable<string>,
    options: ExportOptions = {}
  ): Promise<ExportResult> | ExportHandle {
    if (!options.async) {
      return this.run(metrics, metricPrefix, baseTags, options.signal);
    }

    const controller = new AbortController();
    const external = options.signal;
    const forwardAbort = (): void => controller.abort(external?.reason);
    if (external?.aborted) {
      forwardAbort();
    } else {
      external?.addEventListener('abort', forwardAbort, { once: true });
    }

    const tracked: Promise<ExportResult> = this.run(metrics, metricPrefix, baseTags, controller.signal).then(
      (result) => {
        external?.removeEventListener('abort', forwardAbort);
        this.inFlight.delete(tracked);
        return result;
      }
    );
    this.inFlight.add(tracked);

    return {
      result: tracked,
      cancel: (reason?: string) => controller.abort(reason),
    };
  }

  /**
   * Shorthand for `export(..., { async: true })`
   */
  exportAsync(metrics: MetricValues, metricPrefix: string, baseTags: Iterable<string>): ExportHandle {
    return this.export(metrics, metricPrefix, baseTags, { async: true });
  }

  /**
   * Number of background exports not yet settled
   */
  get pendingExports(): number {
    return this.inFlight.size;
  }

  /**
   * Waits for background exports.
   * @returns true when all settled, false when the timeout elapsed first
   */
  async flush(timeoutMs: number = this.config.asyncTimeoutMs): Promise<boolean> {
    if (this.inFlight.size === 0) {
      return true;
    }

    const pending = Promise.all([...this.inFlight]).then(() => true);
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });

    const settled = await Promise.race([pending, timeout]);
    clearTimeout(timer);

    if (!settled) {
      this.logger.warn('Metrics export still running after timeout, continuing', {
        timeoutMs,
        pendingExports: this.inFlight.size,
      });
    }
    return settled;
  }

  /**
   * Flushes background exports, then releases pooled connections
   */
  async close(timeoutMs?: number): Promise<void> {
    await this.flush(timeoutMs);
    if (this.transport && this.ownsTransport) {
      await this.transport.close();
    }
  }

  private async run(
    metrics: MetricValues,
    metricPrefix: string,
    baseTags: Iterable<string>,
    signal?: AbortSignal
  ): Promise<ExportResult> {
    try {
      return await this.deliverAll(metrics, metricPrefix, baseTags, signal);
    } catch (error) {
      // Telemetry must never fail the benchmark that produced it
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error('Metrics export failed unexpectedly', { error: message });
      return { ...emptyResult(), error: { kind: 'internal', message } };
    }
  }

  private async deliverAll(
    metrics: MetricValues,
    metricPrefix: string,
    baseTags: Iterable<string>,
    signal?: AbortSignal
  ): Promise<ExportResult> {
    const startedAt = this.clock.now();

    if (metricEntries(metrics).length === 0) {
      return emptyResult();
    }

    const deliverer = this.deliverer;
    if (!deliverer || !hasApiKey(this.config)) {
      const error = ConfigurationError.missingApiKey();
      this.logger.warn('DD_API_KEY not set, skipping metrics export', { prefix: metricPrefix });
      return { ...emptyResult(), error: { kind: 'configuration', message: error.message } };
    }

    const tags = normalizeTags(this.config.defaultTags, baseTags);
    const { samples, rejected } = buildSamples(metrics, metricPrefix, tags, startedAt);

    for (const rejection of rejected) {
      this.logger.warn('Metric sample excluded', { error: rejection.message, ...rejection.details });
    }

    if (samples.length === 0) {
      this.logger.warn('No valid metrics to send', { prefix: metricPrefix, rejected: rejected.length });
      return summarize([], rejected, this.clock.now() - startedAt);
    }

    const batches = partition(samples, this.config.batchSize);
    const outcomes: BatchOutcome[] = [];
    let authFailure: MetricsExportError | undefined;

    // Sequential, in partition order
    for (const batch of batches) {
      if (authFailure) {
        outcomes.push(skipped(batch, authFailure));
        continue;
      }

      const outcome = await deliverer.deliver(batch, signal);
      outcomes.push(outcome);

      if (outcome.status === 'failed_permanent') {
        this.logger.error('Metrics batch failed permanently', {
          batch: batch.index + 1,
          totalBatches: batches.length,
          samples: outcome.size,
          attempts: outcome.attempts.length,
          error: outcome.error?.message,
        });
        if (outcome.error instanceof AuthenticationError) {
          authFailure = outcome.error;
        }
      }
    }

    const marker = callLevelError(authFailure, signal);
    const result = summarize(outcomes, rejected, this.clock.now() - startedAt, marker);
    this.logSummary(result, metricPrefix);
    return result;
  }

  private logSummary(result: ExportResult, metricPrefix: string): void {
    const context = {
      prefix: metricPrefix,
      delivered: result.delivered,
      failed: result.failed,
      rejected: result.rejected,
      batches: result.batches.length,
      durationMs: result.durationMs,
    };

    if (result.failed === 0) {
      this.logger.info(`Sent ${result.delivered} metrics to Datadog`, context);
    } else if (result.delivered > 0) {
      this.logger.warn(`Partially sent ${result.delivered}/${result.attempted} metrics to Datadog`, context);
    } else {
      this.logger.error(`Failed to send ${result.attempted} metrics to Datadog`, context);
    }
  }
}

function skipped(batch: Batch, error: MetricsExportError): BatchOutcome {
  return {
    index: batch.index,
    size: batch.samples.length,
    status: 'failed_permanent',
    attempts: [],
    error,
  };
}

function callLevelError(
  authFailure: MetricsExportError | undefined,
  signal: AbortSignal | undefined
): ExportErrorMarker | undefined {
  if (authFailure) {
    return { kind: 'authentication', message: authFailure.message };
  }
  if (signal?.aborted) {
    return { kind: 'cancelled', message: 'Metrics export was cancelled' };
  }
  return undefined;
}
