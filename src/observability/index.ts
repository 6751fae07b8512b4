export {
  ConsoleLogger,
  DEFAULT_LOGGER_NAME,
  NoopLogger,
  parseLogFormat,
  parseLogLevel,
  type ConsoleLoggerOptions,
  type LogContext,
  type Logger,
  type LogFormat,
  type LogLevel,
} from './logging.js';
