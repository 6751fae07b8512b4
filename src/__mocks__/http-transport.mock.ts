import { vi, type Mock } from 'vitest';
import type { MetricsTransport, SubmitResponse } from '../transport/http-transport.js';

export interface MockMetricsTransport extends MetricsTransport {
  submit: Mock<MetricsTransport['submit']>;
  close: Mock<MetricsTransport['close']>;
}

export const ACCEPTED: SubmitResponse = { status: 202, body: { status: 'ok' } };

export function createMockMetricsTransport(): MockMetricsTransport {
  return {
    submit: vi.fn<MetricsTransport['submit']>(),
    close: vi.fn<MetricsTransport['close']>().mockResolvedValue(undefined),
  };
}

export function createMockMetricsTransportWithDefaults(): MockMetricsTransport {
  const transport = createMockMetricsTransport();

  // Default accepted response
  transport.submit.mockResolvedValue(ACCEPTED);

  return transport;
}

export function mockMetricsTransportError(transport: MockMetricsTransport, error: Error): void {
  transport.submit.mockRejectedValue(error);
}
