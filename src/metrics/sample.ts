/**
 * Metric samples: construction, tag normalization and validation.
 */

import { ValidationError } from '../errors/index.js';

/**
 * A single numeric result bound for the metrics API
 */
export interface MetricSample {
  /** Fully namespaced metric name, e.g. `inference.benchmark.aiperf.latency_p95` */
  name: string;
  value: number;
  /** Deduplicated `key:value` tags */
  tags: string[];
  /** Milliseconds since the epoch */
  timestamp: number;
}

/**
 * Metric values as benchmark parsers produce them; absent values are skipped
 */
export type MetricValues =
  | Record<string, number | null | undefined>
  | ReadonlyMap<string, number | null | undefined>;

export interface BuiltSamples {
  samples: MetricSample[];
  rejected: ValidationError[];
}

/**
 * Merges tag sets, trimming entries and collapsing duplicates.
 * First occurrence wins the position.
 */
export function normalizeTags(...tagSets: Iterable<string>[]): string[] {
  const seen = new Set<string>();
  for (const tags of tagSets) {
    for (const tag of tags) {
      const trimmed = tag.trim();
      if (trimmed) {
        seen.add(trimmed);
      }
    }
  }
  return [...seen];
}

/**
 * Entries in insertion order. Plain objects list integer-like keys first;
 * pass a Map when that matters.
 */
export function metricEntries(metrics: MetricValues): Array<[string, number | null | undefined]> {
  return isMetricMap(metrics) ? [...metrics.entries()] : Object.entries(metrics);
}

function isMetricMap(
  metrics: MetricValues
): metrics is ReadonlyMap<string, number | null | undefined> {
  return metrics instanceof Map;
}

/**
 * `prefix + "." + shortName`, or the bare short name for an empty prefix
 */
export function qualifyName(prefix: string, shortName: string): string {
  return prefix ? `${prefix}.${shortName}` : shortName;
}

/**
 * Builds one sample per metric entry, in insertion order, excluding entries
 * that fail validation.
 */
export function buildSamples(
  metrics: MetricValues,
  prefix: string,
  tags: readonly string[],
  timestamp: number
): BuiltSamples {
  const samples: MetricSample[] = [];
  const rejected: ValidationError[] = [];

  for (const [shortName, value] of metricEntries(metrics)) {
    if (!shortName.trim()) {
      rejected.push(ValidationError.emptyName());
      continue;
    }
    if (value === null || value === undefined) {
      rejected.push(ValidationError.missingValue(shortName));
      continue;
    }
    if (!Number.isFinite(value)) {
      rejected.push(ValidationError.nonFiniteValue(shortName, value));
      continue;
    }

    samples.push({
      name: qualifyName(prefix, shortName),
      value,
      tags: [...tags],
      timestamp,
    });
  }

  return { samples, rejected };
}
