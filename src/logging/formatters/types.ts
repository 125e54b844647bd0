/**
 * Log Formatter Types
 */

import type { LogEntry } from '../logger.js';

/**
 * Log formatter interface
 */
export interface LogFormatter {
  /**
   * Format a result log entry into a single line
   */
  format(entry: LogEntry): string;
}
