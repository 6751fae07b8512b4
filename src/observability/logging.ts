/**
 * Exporter logging.
 *
 * Every record is one line. `json` is for log shippers scraping benchmark
 * pods, `text` for a terminal.
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';
export type LogContext = Record<string, unknown>;

export interface Logger {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  /** Logger name written on every line */
  name?: string;
  timestamps?: boolean;
  /** Line sink; `console.log` when omitted */
  write?: (line: string) => void;
}

export const DEFAULT_LOGGER_NAME = 'metrics-exporter';

const LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

/**
 * Parses a `LOG_LEVEL` value, falling back to `info`
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const lower = value?.trim().toLowerCase() ?? '';
  return isLogLevel(lower) ? lower : 'info';
}

/**
 * Parses a `LOG_FORMAT` value; anything but `json` is `text`
 */
export function parseLogFormat(value: string | undefined): LogFormat {
  return value?.trim().toLowerCase() === 'json' ? 'json' : 'text';
}

export class ConsoleLogger implements Logger {
  readonly level: LogLevel;
  readonly format: LogFormat;
  private readonly name: string;
  private readonly timestamps: boolean;
  private readonly write: (line: string) => void;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.format = options.format ?? 'text';
    this.name = options.name ?? DEFAULT_LOGGER_NAME;
    this.timestamps = options.timestamps ?? true;
    this.write = options.write ?? ((line) => console.log(line));
  }

  isEnabled(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  trace(message: string, context?: LogContext): void {
    this.emit('trace', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.emit('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.emit('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.emit('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.emit('error', message, context);
  }

  private emit(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const time = this.timestamps ? new Date().toISOString() : undefined;
    if (this.format === 'json') {
      this.write(JSON.stringify({ time, level, logger: this.name, msg: message, ...context }));
      return;
    }

    const head = [time, level.toUpperCase(), `${this.name}:`, message]
      .filter((part) => part !== undefined)
      .join(' ');
    const fields = Object.entries(context ?? {}).map(([key, value]) => `${key}=${formatField(value)}`);
    this.write(fields.length > 0 ? `${head} ${fields.join(' ')}` : head);
  }
}

/**
 * `key=value` rendering: bare words stay bare, everything else is JSON
 */
function formatField(value: unknown): string {
  if (value === undefined) {
    return 'undefined';
  }
  if (typeof value === 'string') {
    return /^[^\s"=]+$/.test(value) ? value : JSON.stringify(value);
  }
  if (value instanceof Error) {
    return JSON.stringify(value.message);
  }
  return JSON.stringify(value);
}

export class NoopLogger implements Logger {
  trace(_message: string, _context?: LogContext): void {}
  debug(_message: string, _context?: LogContext): void {}
  info(_message: string, _context?: LogContext): void {}
  warn(_message: string, _context?: LogContext): void {}
  error(_message: string, _context?: LogContext): void {}
}
