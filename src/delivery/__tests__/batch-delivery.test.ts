import { describe, it, expect, beforeEach } from 'vitest';
import { createFakeClock, type FakeClock } from '../../__mocks__/clock.mock.js';
import {
  ACCEPTED,
  createMockMetricsTransport,
  mockMetricsTransportError,
  type MockMetricsTransport,
} from '../../__mocks__/http-transport.mock.js';
import { createMockLogger, type MockLogger } from '../../__mocks__/logger.mock.js';
import { DEFAULT_RETRY_CONFIG } from '../../config/index.js';
import {
  CancelledError,
  NetworkError,
  RateLimitError,
  RequestRejectedError,
  RetryExhaustedError,
  ServerError,
} from '../../errors/index.js';
import { toSeriesPayload, type Batch } from '../../metrics/index.js';
import { BatchDeliverer } from '../batch-delivery.js';

function makeBatch(size: number, index = 0): Batch {
  return {
    index,
    samples: Array.from({ length: size }, (_, i) => ({
      name: `inference.benchmark.aiperf.metric_${i}`,
      value: i,
      tags: ['model:test-model'],
      timestamp: 1_700_000_000_000,
    })),
  };
}

describe('BatchDeliverer', () => {
  let transport: MockMetricsTransport;
  let clock: FakeClock;
  let logger: MockLogger;
  let deliverer: BatchDeliverer;

  beforeEach(() => {
    transport = createMockMetricsTransport();
    clock = createFakeClock();
    logger = createMockLogger();
    deliverer = new BatchDeliverer({ transport, retry: DEFAULT_RETRY_CONFIG, clock, logger });
  });

  it('should deliver on the first attempt', async () => {
    transport.submit.mockResolvedValue(ACCEPTED);
    const batch = makeBatch(2);

    const outcome = await deliverer.deliver(batch);

    expect(outcome).toEqual({
      index: 0,
      size: 2,
      status: 'delivered',
      attempts: [{ batchIndex: 0, attempt: 1, outcome: 'success', latencyMs: 0, error: undefined }],
    });
    expect(transport.submit).toHaveBeenCalledTimes(1);
    expect(transport.submit).toHaveBeenCalledWith(toSeriesPayload(batch), { signal: undefined });
    expect(clock.sleeps).toEqual([]);
  });

  it('should retry retryable failures with exponential backoff', async () => {
    const error = new ServerError('Service unavailable', 503);
    transport.submit
      .mockRejectedValueOnce(error)
      .mockRejectedValueOnce(error)
      .mockResolvedValueOnce(ACCEPTED);

    const outcome = await deliverer.deliver(makeBatch(3));

    expect(outcome.status).toBe('delivered');
    expect(outcome.attempts.map((attempt) => attempt.outcome)).toEqual([
      'retryable_failure',
      'retryable_failure',
      'success',
    ]);
    expect(transport.submit).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([1000, 2000]);
  });

  it('should log each retry', async () => {
    transport.submit
      .mockRejectedValueOnce(new ServerError('Service unavailable', 503))
      .mockResolvedValueOnce(ACCEPTED);

    await deliverer.deliver(makeBatch(1, 1));

    expect(logger.warn).toHaveBeenCalledWith('Metrics batch submission failed, retrying', {
      batch: 2,
      attempt: 1,
      maxAttempts: 3,
      delayMs: 1000,
      error: 'Service unavailable',
    });
  });

  it('should fail permanently after the last attempt', async () => {
    mockMetricsTransportError(transport, new ServerError('Service unavailable', 503));

    const outcome = await deliverer.deliver(makeBatch(20));

    expect(outcome.status).toBe('failed_permanent');
    expect(outcome.attempts).toHaveLength(3);
    expect(outcome.error).toBeInstanceOf(RetryExhaustedError);
    expect(outcome.error?.message).toBe('Delivery failed after 3 attempts: Service unavailable');
    expect(transport.submit).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([1000, 2000]);
  });

  it('should not retry a rejected payload', async () => {
    const error = new RequestRejectedError('Payload too large', 413);
    transport.submit.mockRejectedValue(error);

    const outcome = await deliverer.deliver(makeBatch(5));

    expect(outcome.status).toBe('failed_permanent');
    expect(outcome.error).toBe(error);
    expect(outcome.attempts.map((attempt) => attempt.outcome)).toEqual(['fatal_failure']);
    expect(clock.sleeps).toEqual([]);
  });

  it('should wait as long as Retry-After asks within the maximum delay', async () => {
    transport.submit
      .mockRejectedValueOnce(new RateLimitError('Rate limit exceeded', 7000))
      .mockResolvedValueOnce(ACCEPTED);

    const outcome = await deliverer.deliver(makeBatch(1));

    expect(outcome.status).toBe('delivered');
    expect(clock.sleeps).toEqual([7000]);
  });

  it('should cap a long Retry-After at the maximum delay', async () => {
    transport.submit
      .mockRejectedValueOnce(new RateLimitError('Rate limit exceeded', 86_400_000))
      .mockResolvedValueOnce(ACCEPTED);

    const outcome = await deliverer.deliver(makeBatch(1));

    expect(outcome.status).toBe('delivered');
    expect(clock.sleeps).toEqual([DEFAULT_RETRY_CONFIG.maxDelayMs]);
  });

  it('should treat unknown errors as connection failures', async () => {
    transport.submit.mockRejectedValue(new Error('socket hang up'));
    const single = new BatchDeliverer({
      transport,
      retry: { ...DEFAULT_RETRY_CONFIG, maxAttempts: 1 },
      clock,
    });

    const outcome = await single.deliver(makeBatch(1));

    expect(outcome.error).toBeInstanceOf(RetryExhaustedError);
    expect(outcome.error?.cause).toBeInstanceOf(NetworkError);
    expect(outcome.error?.cause?.message).toBe('socket hang up');
  });

  it('should record attempt latency from the clock', async () => {
    transport.submit.mockImplementation(async () => {
      await clock.sleep(40);
      return ACCEPTED;
    });

    const outcome = await deliverer.deliver(makeBatch(1));

    expect(outcome.attempts[0]?.latencyMs).toBe(40);
  });

  it('should not submit when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    const outcome = await deliverer.deliver(makeBatch(3), controller.signal);

    expect(outcome.status).toBe('failed_permanent');
    expect(outcome.attempts).toEqual([]);
    expect(outcome.error).toBeInstanceOf(CancelledError);
    expect(transport.submit).not.toHaveBeenCalled();
  });

  it('should stop retrying when cancelled during backoff', async () => {
    const controller = new AbortController();
    transport.submit.mockRejectedValue(new ServerError('Service unavailable', 503));
    const cancelling = new BatchDeliverer({
      transport,
      retry: DEFAULT_RETRY_CONFIG,
      clock: {
        now: () => 0,
        sleep: async () => {
          controller.abort();
        },
      },
    });

    const outcome = await cancelling.deliver(makeBatch(2), controller.signal);

    expect(outcome.status).toBe('failed_permanent');
    expect(outcome.error).toBeInstanceOf(CancelledError);
    expect(outcome.attempts).toHaveLength(1);
    expect(transport.submit).toHaveBeenCalledTimes(1);
  });
});
