import { vi, type Mock } from 'vitest';
import type { Logger } from '../observability/logging.js';

export interface MockLogger extends Logger {
  trace: Mock<Logger['trace']>;
  debug: Mock<Logger['debug']>;
  info: Mock<Logger['info']>;
  warn: Mock<Logger['warn']>;
  error: Mock<Logger['error']>;
}

export function createMockLogger(): MockLogger {
  return {
    trace: vi.fn<Logger['trace']>(),
    debug: vi.fn<Logger['debug']>(),
    info: vi.fn<Logger['info']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>(),
  };
}
