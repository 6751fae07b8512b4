/**
 * Reads AIPerf result exports into a flat metric mapping.
 */

import { readFile, readdir, stat } from 'fs/promises';
import path from 'path';
import { NoopLogger, type Logger } from '../observability/index.js';

/** Aggregated statistics file written by AIPerf */
export const AIPERF_RESULT_FILE = 'profile_export_aiperf.json';

/** Top-level metric fields of an AIPerf JSON export */
export const AIPERF_METRIC_FIELDS = [
  'request_latency',
  'time_to_first_token',
  'time_to_second_token',
  'inter_token_latency',
  'inter_chunk_latency',
  'request_throughput',
  'output_token_throughput',
  'output_token_throughput_per_user',
  'request_count',
  'good_request_count',
  'error_request_count',
  'output_sequence_length',
  'input_sequence_length',
  'output_token_count',
  'reasoning_token_count',
  'goodput',
  'total_output_tokens',
  'total_reasoning_tokens',
  'benchmark_duration',
  'total_isl',
  'total_osl',
  'error_isl',
  'total_error_isl',
] as const;

const FIELD_STATS = ['avg', 'p50', 'p95', 'p99', 'min', 'max', 'std'] as const;
const NESTED_STATS = ['mean', 'p50', 'p95', 'p99'] as const;
const DIRECT_STATS = ['avg', 'mean', 'p50', 'p95', 'p99', 'min', 'max', 'std'] as const;

const LEGACY_KEYS = [
  'latency_p50',
  'latency_p95',
  'latency_p99',
  'ttft',
  'ttft_ms',
  'tokens_per_sec',
  'requests_per_sec',
  'throughput_tokens_per_sec',
  'throughput_requests_per_sec',
] as const;

export interface ParseOptions {
  logger?: Logger;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return isNaN(parsed) ? undefined : parsed;
  }
  return undefined;
}

function assign(metrics: Record<string, number>, key: string, value: unknown): void {
  const parsed = toNumber(value);
  if (parsed !== undefined) {
    metrics[key] = parsed;
  }
}

/**
 * Extracts metrics from a parsed AIPerf export.
 *
 * Understands the current per-field layout (`request_latency.p95`), the
 * nested `metrics.<name>.stats` layout, and the legacy flat keys.
 */
export function extractAiperfMetrics(data: unknown): Record<string, number> {
  const metrics: Record<string, number> = {};
  if (!isObject(data)) {
    return metrics;
  }

  for (const field of AIPERF_METRIC_FIELDS) {
    const metricData = data[field];
    if (!isObject(metricData)) {
      continue;
    }
    for (const stat of FIELD_STATS) {
      assign(metrics, `${field}_${stat}`, metricData[stat]);
    }
  }

  if (isObject(data.metrics)) {
    for (const [name, metricData] of Object.entries(data.metrics)) {
      if (!isObject(metricData)) {
        continue;
      }
      if (isObject(metricData.stats)) {
        const stats = metricData.stats;
        for (const stat of NESTED_STATS) {
          assign(metrics, `${name}_${stat}`, stats[stat]);
        }
      } else {
        for (const stat of DIRECT_STATS) {
          assign(metrics, `${name}_${stat}`, metricData[stat]);
        }
      }
    }
  }

  for (const key of LEGACY_KEYS) {
    assign(metrics, key, data[key]);
  }

  if (isObject(data.latency)) {
    for (const key of ['latency_p50', 'latency_p95', 'latency_p99']) {
      assign(metrics, key, data.latency[key]);
    }
  }

  if (isObject(data.throughput)) {
    assign(metrics, 'throughput_tokens_per_sec', data.throughput.tokens_per_sec);
    assign(metrics, 'throughput_requests_per_sec', data.throughput.requests_per_sec);
  }

  return metrics;
}

async function locateResultFile(resultDir: string): Promise<string | undefined> {
  const preferred = path.join(resultDir, AIPERF_RESULT_FILE);
  try {
    if ((await stat(preferred)).isFile()) {
      return preferred;
    }
  } catch {
    // Fall through to any JSON file in the directory
  }

  const entries = await readdir(resultDir);
  const candidates = entries.filter((entry) => entry.endsWith('.json')).sort();
  return candidates.length > 0 ? path.join(resultDir, candidates[0]) : undefined;
}

/**
 * Parses the AIPerf results in `resultDir`.
 *
 * @returns metric short name to value; empty when nothing could be read
 */
export async function parseAiperfResults(
  resultDir: string,
  options: ParseOptions = {}
): Promise<Record<string, number>> {
  const logger = options.logger ?? new NoopLogger();

  let file: string | undefined;
  try {
    file = await locateResultFile(resultDir);
  } catch (error) {
    logger.warn('Cannot read AIPerf result directory', {
      resultDir,
      error: error instanceof Error ? error.message : String(error),
    });
    return {};
  }

  if (!file) {
    logger.warn('No JSON result files found', { resultDir });
    return {};
  }

  let data: unknown;
  try {
    data = JSON.parse(await readFile(file, 'utf8'));
  } catch (error) {
    logger.warn('Failed to parse AIPerf results', {
      file,
      error: error instanceof Error ? error.message : String(error),
    });
    return {};
  }

  const metrics = extractAiperfMetrics(data);
  if (Object.keys(metrics).length > 0) {
    logger.info(`Parsed ${Object.keys(metrics).length} metrics from ${path.basename(file)}`);
  } else {
    logger.warn(`No metrics extracted from ${path.basename(file)}`, {
      keys: isObject(data) ? Object.keys(data).slice(0, 10) : [],
    });
  }
  return metrics;
}
