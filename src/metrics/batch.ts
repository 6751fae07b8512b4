/**
 * Batch partitioning and the Datadog series wire format.
 */

import type { MetricSample } from './sample.js';

/**
 * An ordered slice of samples sent in one HTTP submission
 */
export interface Batch {
  /** Zero-based position in the partition */
  index: number;
  samples: MetricSample[];
}

/**
 * One series entry of a `/api/v1/series` submission
 */
export interface SeriesEntry {
  metric: string;
  type: 'gauge';
  /** `[unix seconds, value]` pairs */
  points: Array<[number, number]>;
  tags: string[];
}

export interface SeriesPayload {
  series: SeriesEntry[];
}

/**
 * Splits samples into consecutive batches of at most `batchSize`.
 * Produces `ceil(n / batchSize)` batches and preserves input order.
 */
export function partition(samples: readonly MetricSample[], batchSize: number): Batch[] {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
  }

  const batches: Batch[] = [];
  for (let start = 0; start < samples.length; start += batchSize) {
    batches.push({
      index: batches.length,
      samples: samples.slice(start, start + batchSize),
    });
  }
  return batches;
}

/**
 * Formats a batch as the series intake body
 */
export function toSeriesPayload(batch: Batch): SeriesPayload {
  return {
    series: batch.samples.map((sample): SeriesEntry => ({
      metric: sample.name,
      type: 'gauge',
      points: [[Math.floor(sample.timestamp / 1000), sample.value]],
      tags: sample.tags,
    })),
  };
}
