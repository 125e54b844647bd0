/**
 * JSON Formatter - Compact JSON log format
 */

import type { LogEntry } from '../logger.js';
import type { LogFormatter } from './types.js';

/**
 * Formats log entries as compact JSON, one object per line.
 *
 * @example
 * {"level":"info","timestamp":"2024-03-01T10:00:00.000Z","pid":3784,"progname":"stockline","operation":"placeOrder","status":"success"}
 */
export class JsonFormatter implements LogFormatter {
  private pretty: boolean;

  constructor(options?: { pretty?: boolean }) {
    this.pretty = options?.pretty ?? false;
  }

  format(entry: LogEntry): string {
    const { level, timestamp, pid, progname, result, tags } = entry;

    const obj: Record<string, unknown> = {
      level,
      timestamp: timestamp.toISOString(),
      pid,
      progname,
      operation: result.operation,
      status: result.status,
    };

    if (tags && tags.length > 0) {
      obj.tags = tags;
    }

    if (Object.keys(result.metadata).length > 0) {
      obj.metadata = result.metadata;
    }

    if (result.code) {
      obj.code = result.code;
    }

    if (result.reason) {
      obj.reason = result.reason;
    }

    if (result.error) {
      obj.error = result.error;
    }

    return JSON.stringify(obj, null, this.pretty ? 2 : undefined);
  }
}
