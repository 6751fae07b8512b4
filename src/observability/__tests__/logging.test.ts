import { describe, it, expect, vi } from 'vitest';
import { ConsoleLogger, NoopLogger, parseLogFormat, parseLogLevel, type ConsoleLoggerOptions } from '../logging.js';

function capture(options: ConsoleLoggerOptions = {}): { logger: ConsoleLogger; lines: string[] } {
  const lines: string[] = [];
  const logger = new ConsoleLogger({ timestamps: false, ...options, write: (line) => lines.push(line) });
  return { logger, lines };
}

describe('ConsoleLogger', () => {
  it('should write text lines with key=value fields', () => {
    const { logger, lines } = capture();

    logger.warn('Metrics batch submission failed, retrying', {
      batch: 2,
      delayMs: 1000,
      error: 'Service unavailable',
    });

    expect(lines).toEqual([
      'WARN metrics-exporter: Metrics batch submission failed, retrying batch=2 delayMs=1000 error="Service unavailable"',
    ]);
  });

  it('should render non-string fields as JSON', () => {
    const { logger, lines } = capture();

    logger.error('failed', { cause: new Error('boom'), tags: ['model:test-model'], missing: undefined });

    expect(lines).toEqual([
      'ERROR metrics-exporter: failed cause="boom" tags=["model:test-model"] missing=undefined',
    ]);
  });

  it('should write JSON lines', () => {
    const { logger, lines } = capture({ format: 'json' });

    logger.info('Sent 2 metrics to Datadog', { delivered: 2 });

    expect(lines).toEqual([
      '{"level":"info","logger":"metrics-exporter","msg":"Sent 2 metrics to Datadog","delivered":2}',
    ]);
  });

  it('should use the configured name', () => {
    const { logger, lines } = capture({ name: 'aiperf' });

    logger.info('done');

    expect(lines).toEqual(['INFO aiperf: done']);
  });

  it('should prefix an ISO timestamp when enabled', () => {
    const { logger, lines } = capture({ timestamps: true });

    logger.info('hi');

    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z INFO metrics-exporter: hi$/);
  });

  it('should drop messages below the configured level', () => {
    const { logger, lines } = capture({ level: 'warn' });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(lines).toEqual(['WARN metrics-exporter: shown']);
    expect(logger.isEnabled('error')).toBe(true);
    expect(logger.isEnabled('trace')).toBe(false);
  });

  it('should write to the console by default', () => {
    const output = vi.spyOn(console, 'log').mockImplementation(() => {});

    new ConsoleLogger({ timestamps: false }).info('hello');

    expect(output).toHaveBeenCalledWith('INFO metrics-exporter: hello');
    output.mockRestore();
  });

  it('should stay silent as a NoopLogger', () => {
    const output = vi.spyOn(console, 'log').mockImplementation(() => {});

    new NoopLogger().error('nothing');

    expect(output).not.toHaveBeenCalled();
    output.mockRestore();
  });
});

describe('parseLogLevel', () => {
  it('should accept known levels case-insensitively', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel(' warn ')).toBe('warn');
  });

  it('should fall back to info', () => {
    expect(parseLogLevel('verbose')).toBe('info');
    expect(parseLogLevel(undefined)).toBe('info');
  });
});

describe('parseLogFormat', () => {
  it('should select json', () => {
    expect(parseLogFormat('JSON')).toBe('json');
  });

  it('should fall back to text', () => {
    expect(parseLogFormat('pretty')).toBe('text');
    expect(parseLogFormat(undefined)).toBe('text');
  });
});
