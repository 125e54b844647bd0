/**
 * stockline Logging
 *
 * Structured logging of operation results with pluggable formatters.
 */

export {
  Logger,
  logger,
  createLogger,
  type LogLevel,
  type LogEntry,
  type LoggerOptions,
} from './logger.js';

export {
  type LogFormatter,
  LineFormatter,
  JsonFormatter,
  KeyValueFormatter,
} from './formatters/index.js';
