/**
 * Drives one batch through the delivery state machine against a transport.
 */

import type { RetryConfig } from '../config/index.js';
import { MetricsExportError, NetworkError } from '../errors/index.js';
import { toSeriesPayload, type Batch } from '../metrics/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import type { MetricsTransport } from '../transport/index.js';
import { systemClock, type Clock } from './clock.js';
import {
  initialState,
  transition,
  type DeliveryEvent,
  type DeliveryState,
  type TransitionContext,
} from './state-machine.js';

export type AttemptOutcome = 'success' | 'retryable_failure' | 'fatal_failure';

/**
 * Record of one HTTP submission of a batch
 */
export interface DeliveryAttempt {
  batchIndex: number;
  /** 1-indexed */
  attempt: number;
  outcome: AttemptOutcome;
  latencyMs: number;
  error?: MetricsExportError;
}

/**
 * Final state of a batch
 */
export interface BatchOutcome {
  index: number;
  size: number;
  status: 'delivered' | 'failed_permanent';
  attempts: DeliveryAttempt[];
  error?: MetricsExportError;
}

export interface BatchDelivererOptions {
  transport: MetricsTransport;
  retry: RetryConfig;
  clock?: Clock;
  random?: () => number;
  logger?: Logger;
}

export class BatchDeliverer {
  private readonly transport: MetricsTransport;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly context: TransitionContext;

  constructor(options: BatchDelivererOptions) {
    this.transport = options.transport;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? new NoopLogger();
    this.context = {
      retry: options.retry,
      random: options.random ?? Math.random,
    };
  }

  /**
   * Delivers a batch, retrying retryable failures with backoff.
   * Never rejects: every failure is folded into the returned outcome.
   */
  async deliver(batch: Batch, signal?: AbortSignal): Promise<BatchOutcome> {
    const payload = toSeriesPayload(batch);
    const attempts: DeliveryAttempt[] = [];
    let state: DeliveryState = initialState();

    for (;;) {
      if (state.status === 'delivered') {
        return { index: batch.index, size: batch.samples.length, status: 'delivered', attempts };
      }
      if (state.status === 'failed_permanent') {
        return {
          index: batch.index,
          size: batch.samples.length,
          status: 'failed_permanent',
          attempts,
          error: state.error,
        };
      }

      if (signal?.aborted) {
        state = transition(state, { type: 'cancel' }, this.context);
        continue;
      }

      switch (state.status) {
        case 'pending':
          state = transition(state, { type: 'schedule' }, this.context);
          break;

        case 'attempting': {
          const startedAt = this.clock.now();
          let event: DeliveryEvent;
          try {
            await this.transport.submit(payload, { signal });
            event = { type: 'success' };
          } catch (error) {
            event = { type: 'failure', error: toDeliveryError(error) };
          }

          attempts.push({
            batchIndex: batch.index,
            attempt: state.attempt,
            outcome: outcomeOf(event),
            latencyMs: this.clock.now() - startedAt,
            error: event.type === 'failure' ? event.error : undefined,
          });
          state = transition(state, event, this.context);
          break;
        }

        case 'retry_wait':
          this.logger.warn('Metrics batch submission failed, retrying', {
            batch: batch.index + 1,
            attempt: state.attempt,
            maxAttempts: this.context.retry.maxAttempts,
            delayMs: state.delayMs,
            error: state.error.message,
          });
          await this.clock.sleep(state.delayMs, signal);
          if (!signal?.aborted) {
            state = transition(state, { type: 'wait_elapsed' }, this.context);
          }
          break;
      }
    }
  }
}

function outcomeOf(event: DeliveryEvent): AttemptOutcome {
  if (event.type !== 'failure') {
    return 'success';
  }
  return event.error.isRetryable ? 'retryable_failure' : 'fatal_failure';
}

/**
 * Anything a transport throws outside the taxonomy is treated as a connection failure
 */
function toDeliveryError(error: unknown): MetricsExportError {
  if (error instanceof MetricsExportError) {
    return error;
  }
  if (error instanceof Error) {
    return new NetworkError(error.message, error);
  }
  return new NetworkError(String(error));
}
