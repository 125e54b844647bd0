/**
 * Structured Logger for stockline
 */

import { getConfiguration } from '../config.js';
import type { Result, ResultJSON } from '../result.js';
import type { LogFormatter } from './formatters/types.js';
import { LineFormatter } from './formatters/line.js';

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log entry data
 */
export interface LogEntry {
  level: LogLevel;
  timestamp: Date;
  pid: number;
  progname: string;
  result: ResultJSON;
  tags?: string[];
}

/**
 * Logger options
 */
export interface LoggerOptions {
  /** Output stream (default: process.stdout) */
  output?: NodeJS.WritableStream;
  /** Log formatter (default: LineFormatter) */
  formatter?: LogFormatter;
  /** Program name (default: 'stockline') */
  progname?: string;
  /** Minimum log level (default: 'info') */
  level?: LogLevel;
  /** Enable/disable logging (default: true) */
  enabled?: boolean;
  /** Clock used for timestamps */
  now?: () => Date;
}

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Structured logger for engine operations.
 */
export class Logger {
  private output: NodeJS.WritableStream;
  private formatter: LogFormatter;
  private progname: string;
  private level: LogLevel;
  private enabled: boolean;
  private now: () => Date;

  constructor(options: LoggerOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.formatter = options.formatter ?? new LineFormatter();
    this.progname = options.progname ?? 'stockline';
    this.level = options.level ?? 'info';
    this.enabled = options.enabled ?? true;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Log a result at the level its outcome implies: info for success, warn
   * for business failures, error for persistence failures.
   */
  log<T>(result: Result<T>, options?: { level?: LogLevel; tags?: string[] }): void {
    if (!this.enabled) return;

    const level = options?.level ?? this.inferLevel(result);
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      level,
      timestamp: this.now(),
      pid: process.pid,
      progname: this.progname,
      result: result.toJSON(),
      tags: options?.tags,
    };

    this.output.write(this.formatter.format(entry) + '\n');
  }

  /**
   * Log at debug level
   */
  debug(message: string | (() => string)): void {
    this.logMessage('debug', message);
  }

  /**
   * Log at info level
   */
  info(message: string | (() => string)): void {
    this.logMessage('info', message);
  }

  /**
   * Log at warn level
   */
  warn(message: string | (() => string)): void {
    this.logMessage('warn', message);
  }

  /**
   * Log at error level
   */
  error(message: string | (() => string)): void {
    this.logMessage('error', message);
  }

  private logMessage(level: LogLevel, message: string | (() => string)): void {
    if (!this.enabled || !this.shouldLog(level)) return;

    const msg = typeof message === 'function' ? message() : message;
    const timestamp = this.now().toISOString();
    const levelChar = level.charAt(0).toUpperCase();

    this.output.write(`${levelChar}, [${timestamp} #${process.pid}] ${level.toUpperCase()} -- ${this.progname}: ${msg}\n`);
  }

  private inferLevel<T>(result: Result<T>): LogLevel {
    if (result.success) return 'info';
    return result.error.code === 'PERSISTENCE' ? 'error' : 'warn';
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.level];
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  setFormatter(formatter: LogFormatter): void {
    this.formatter = formatter;
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }
}

/**
 * Default global logger instance
 */
export const logger = new Logger();

/**
 * Create a logger from the global `logger` configuration, overridden by
 * `options`.
 */
export function createLogger(options?: LoggerOptions): Logger {
  return new Logger({ ...getConfiguration().logger, ...options });
}
