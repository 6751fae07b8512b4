/**
 * Glue between a finished benchmark run and the exporter.
 */

import type { ExportResult, MetricsExporter } from '../exporter/index.js';
import { ConsoleLogger, type Logger } from '../observability/index.js';
import { parseAiperfResults } from './aiperf.js';
import { parseOsworldResults } from './osworld.js';

export type BenchmarkKind = 'aiperf' | 'osworld';

export const DEFAULT_CLUSTER_NAME = 'inference-cluster';

export interface BenchmarkContext {
  benchmark: BenchmarkKind;
  model: string;
  /** Inference endpoint under test (AIPerf) */
  endpoint?: string;
  /** Task domain (OSWorld) */
  domain?: string;
  clusterName?: string;
  extraTags?: string[];
}

export interface BenchmarkRun extends BenchmarkContext {
  resultDir: string;
  /** Wait for delivery; defaults to the exporter's async timeout */
  timeoutMs?: number;
}

export function metricPrefixFor(benchmark: BenchmarkKind): string {
  return `inference.benchmark.${benchmark}`;
}

export function benchmarkTags(context: BenchmarkContext): string[] {
  const tags = [`model:${context.model}`];
  if (context.endpoint) {
    tags.push(`endpoint:${context.endpoint}`);
  }
  if (context.domain) {
    tags.push(`domain:${context.domain}`);
  }
  tags.push(`benchmark:${context.benchmark}`);
  tags.push(`cluster_name:${context.clusterName ?? DEFAULT_CLUSTER_NAME}`);
  return [...tags, ...(context.extraTags ?? [])];
}

/**
 * Parses a run's results and exports them in the background, waiting up to
 * the timeout for delivery.
 *
 * Never throws: a benchmark's exit status must not depend on telemetry.
 *
 * @returns the export result, or undefined when nothing was parsed or the
 * wait timed out
 */
export async function reportBenchmarkResults(
  exporter: MetricsExporter,
  run: BenchmarkRun,
  options: { logger?: Logger } = {}
): Promise<ExportResult | undefined> {
  const logger = options.logger ?? new ConsoleLogger();

  try {
    const metrics =
      run.benchmark === 'aiperf'
        ? await parseAiperfResults(run.resultDir, { logger })
        : await parseOsworldResults(run.resultDir, { logger });

    if (Object.keys(metrics).length === 0) {
      logger.warn('No benchmark metrics to export', {
        benchmark: run.benchmark,
        resultDir: run.resultDir,
      });
      return undefined;
    }

    const handle = exporter.exportAsync(metrics, metricPrefixFor(run.benchmark), benchmarkTags(run));
    const settled = await exporter.flush(run.timeoutMs);
    if (!settled) {
      return undefined;
    }
    return await handle.result;
  } catch (error) {
    logger.error('Benchmark metrics report failed', {
      benchmark: run.benchmark,
      error: error instanceof Error ? error.message : String(error),
    });
    return undefined;
  }
}
