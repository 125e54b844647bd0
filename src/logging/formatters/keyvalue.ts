/**
 * KeyValue Formatter - key=value pairs for log parsing
 */

import { isPlainObject } from '../../utils/types.js';
import type { LogEntry } from '../logger.js';
import type { LogFormatter } from './types.js';

/**
 * Formats log entries as key=value pairs, suitable for log parsing systems.
 * Error details are flattened as `error_<field>`, metadata as `metadata_<field>`.
 *
 * @example
 * level=warn timestamp="2024-03-01T10:00:00.000Z" pid=1 progname="stockline" operation="ledger.reserve" status="failed" code="INSUFFICIENT_STOCK"
 */
export class KeyValueFormatter implements LogFormatter {
  format(entry: LogEntry): string {
    const { level, timestamp, pid, progname, result, tags } = entry;

    const parts: string[] = [
      `level=${level}`,
      `timestamp="${timestamp.toISOString()}"`,
      `pid=${pid}`,
      `progname="${progname}"`,
      `operation="${result.operation}"`,
      `status="${result.status}"`,
    ];

    if (tags && tags.length > 0) {
      parts.push(`tags="${tags.join(',')}"`);
    }

    if (result.code) {
      parts.push(`code="${result.code}"`);
    }

    if (result.reason) {
      parts.push(`reason="${escapeString(result.reason)}"`);
    }

    if (result.error) {
      for (const [key, value] of Object.entries(result.error)) {
        if (value === undefined || key === 'message' || key === 'code') continue;
        parts.push(`error_${toSnakeCase(key)}=${formatValue(value)}`);
      }
    }

    for (const [key, value] of Object.entries(result.metadata)) {
      if (value === undefined) continue;
      parts.push(`metadata_${toSnakeCase(key)}=${formatValue(value)}`);
    }

    return parts.join(' ');
  }
}

function formatValue(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'string') return `"${escapeString(value)}"`;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (Array.isArray(value) || isPlainObject(value)) {
    return `"${escapeString(JSON.stringify(value))}"`;
  }
  return `"${escapeString(String(value))}"`;
}

function escapeString(str: string): string {
  return str.replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

function toSnakeCase(str: string): string {
  return str.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}
