/**
 * Per-batch delivery state machine.
 *
 * pending -> attempting -> delivered | retry_wait | failed_permanent
 * retry_wait -> attempting
 *
 * `transition` is pure: time and randomness come in through the context so
 * each edge can be exercised on its own.
 */

import type { RetryConfig } from '../config/index.js';
import {
  CancelledError,
  DeliveryStateError,
  RetryExhaustedError,
  type MetricsExportError,
} from '../errors/index.js';

export type DeliveryState =
  | { status: 'pending'; attempt: 0 }
  | { status: 'attempting'; attempt: number }
  | { status: 'retry_wait'; attempt: number; delayMs: number; error: MetricsExportError }
  | { status: 'delivered'; attempt: number }
  | { status: 'failed_permanent'; attempt: number; error: MetricsExportError };

export type DeliveryStatus = DeliveryState['status'];

export type DeliveryEvent =
  | { type: 'schedule' }
  | { type: 'success' }
  | { type: 'failure'; error: MetricsExportError }
  | { type: 'wait_elapsed' }
  | { type: 'cancel'; reason?: string };

export interface TransitionContext {
  retry: RetryConfig;
  /** Uniform random source in [0, 1), used for jitter */
  random: () => number;
}

export function initialState(): DeliveryState {
  return { status: 'pending', attempt: 0 };
}

export function isTerminal(state: DeliveryState): boolean {
  return state.status === 'delivered' || state.status === 'failed_permanent';
}

/**
 * Calculate the delay after a failed attempt using exponential backoff with jitter
 * @param attempt - The attempt that just failed (1-indexed)
 * @returns Delay in milliseconds
 */
export function computeBackoff(attempt: number, retry: RetryConfig, random: () => number): number {
  // Exponential backoff: baseDelay * 2^(attempt-1)
  const exponentialDelay = retry.baseDelayMs * Math.pow(2, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, retry.maxDelayMs);

  if (retry.jitterFactor === 0) {
    return cappedDelay;
  }

  // Random value between -jitter% and +jitter%
  const jitter = cappedDelay * retry.jitterFactor * (random() * 2 - 1);
  return Math.max(0, Math.floor(cappedDelay + jitter));
}

/**
 * Applies one event to a delivery state.
 * @throws {DeliveryStateError} For events the current state does not accept.
 */
export function transition(
  state: DeliveryState,
  event: DeliveryEvent,
  context: TransitionContext
): DeliveryState {
  if (event.type === 'cancel') {
    if (isTerminal(state)) {
      throw new DeliveryStateError(state.status, event.type);
    }
    return {
      status: 'failed_permanent',
      attempt: state.attempt,
      error: new CancelledError(event.reason),
    };
  }

  switch (state.status) {
    case 'pending':
      if (event.type === 'schedule') {
        return { status: 'attempting', attempt: 1 };
      }
      break;

    case 'attempting':
      if (event.type === 'success') {
        return { status: 'delivered', attempt: state.attempt };
      }
      if (event.type === 'failure') {
        return onFailure(state.attempt, event.error, context);
      }
      break;

    case 'retry_wait':
      if (event.type === 'wait_elapsed') {
        return { status: 'attempting', attempt: state.attempt + 1 };
      }
      break;

    case 'delivered':
    case 'failed_permanent':
      break;
  }

  throw new DeliveryStateError(state.status, event.type);
}

function onFailure(
  attempt: number,
  error: MetricsExportError,
  context: TransitionContext
): DeliveryState {
  if (!error.isRetryable) {
    return { status: 'failed_permanent', attempt, error };
  }

  if (attempt >= context.retry.maxAttempts) {
    return {
      status: 'failed_permanent',
      attempt,
      error: new RetryExhaustedError(attempt, error),
    };
  }

  // A server-provided Retry-After replaces the computed backoff, within the same cap
  const delayMs = Math.min(
    error.retryAfterMs ?? computeBackoff(attempt, context.retry, context.random),
    context.retry.maxDelayMs
  );
  return { status: 'retry_wait', attempt, delayMs, error };
}
