/**
 * Aggregate outcome of one export call.
 */

import type { BatchOutcome } from '../delivery/index.js';
import type { ValidationError } from '../errors/index.js';

export type ExportErrorKind = 'configuration' | 'authentication' | 'cancelled' | 'internal';

/**
 * Call-level failure, set when the export stopped for a reason no batch
 * could overcome
 */
export interface ExportErrorMarker {
  kind: ExportErrorKind;
  message: string;
}

export interface ExportResult {
  /** Batches accepted by the intake */
  batchesSent: number;
  /** Batches that ended in failed_permanent */
  batchesFailed: number;
  /** Valid samples handed to delivery (excludes rejected samples) */
  attempted: number;
  delivered: number;
  failed: number;
  /** Samples excluded by validation */
  rejected: number;
  batches: BatchOutcome[];
  rejections: ValidationError[];
  error?: ExportErrorMarker;
  durationMs: number;
}

export function emptyResult(): ExportResult {
  return {
    batchesSent: 0,
    batchesFailed: 0,
    attempted: 0,
    delivered: 0,
    failed: 0,
    rejected: 0,
    batches: [],
    rejections: [],
    durationMs: 0,
  };
}

/**
 * Folds batch outcomes into one result
 */
export function summarize(
  batches: BatchOutcome[],
  rejections: ValidationError[],
  durationMs: number,
  error?: ExportErrorMarker
): ExportResult {
  const result = emptyResult();

  for (const batch of batches) {
    result.attempted += batch.size;
    if (batch.status === 'delivered') {
      result.batchesSent++;
      result.delivered += batch.size;
    } else {
      result.batchesFailed++;
      result.failed += batch.size;
    }
  }

  result.batches = batches;
  result.rejections = rejections;
  result.rejected = rejections.length;
  result.durationMs = durationMs;
  if (error) {
    result.error = error;
  }
  return result;
}

/**
 * True when every batch was delivered and no call-level error occurred
 */
export function isFullySuccessful(result: ExportResult): boolean {
  return result.error === undefined && result.batchesFailed === 0;
}
