/**
 * Line Formatter - Traditional single-line log format
 */

import type { LogEntry } from '../logger.js';
import type { LogFormatter } from './types.js';

/**
 * Formats log entries as traditional single-line format.
 *
 * @example
 * W, [2024-03-01T10:00:00.000Z #3784] WARN -- stockline: operation="placeOrder" status="failed" code="INSUFFICIENT_STOCK" reason="..."
 */
export class LineFormatter implements LogFormatter {
  format(entry: LogEntry): string {
    const { level, timestamp, pid, progname, result, tags } = entry;
    const levelChar = level.charAt(0).toUpperCase();

    const parts: string[] = [
      `operation="${result.operation}"`,
      `status="${result.status}"`,
    ];

    if (tags && tags.length > 0) {
      parts.push(`tags=[${tags.map(t => `"${t}"`).join(', ')}]`);
    }

    if (result.code) {
      parts.push(`code="${result.code}"`);
    }

    if (Object.keys(result.metadata).length > 0) {
      parts.push(`metadata=${formatMetadata(result.metadata)}`);
    }

    if (result.reason) {
      parts.push(`reason="${escapeString(result.reason)}"`);
    }

    return `${levelChar}, [${timestamp.toISOString()} #${pid}] ${level.toUpperCase()} -- ${progname}: ${parts.join(' ')}`;
  }
}

function formatMetadata(metadata: Record<string, unknown>): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(metadata)) {
    if (value === undefined) continue;
    parts.push(`${key}: ${formatValue(value)}`);
  }
  return `{${parts.join(', ')}}`;
}

function formatValue(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'string') return `"${escapeString(value)}"`;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (value instanceof Date) return `"${value.toISOString()}"`;
  if (Array.isArray(value)) return `[${value.map(formatValue).join(', ')}]`;
  if (isRecord(value)) return formatMetadata(value);
  return String(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function escapeString(str: string): string {
  return str.replace(/"/g, '\\"').replace(/\n/g, '\\n');
}
