/**
 * Identifier generation using node:crypto
 */

import { randomUUID } from 'node:crypto';

export type IdPrefix = 'ord' | 'txn';

/**
 * Generate a UUID v4 string
 */
export function generateUUID(): string {
  return randomUUID();
}

/**
 * Generate a UUID v7-like string: 48 bits of millisecond timestamp, version
 * nibble 7, variant bits 10, random remainder. Sorts by creation time.
 */
export function generateTimeOrderedUUID(now: number = Date.now()): string {
  const timestampHex = now.toString(16).padStart(12, '0');
  const random = randomUUID().replace(/-/g, '').slice(12);
  const variant = ((parseInt(random.slice(3, 4), 16) & 0x3) | 0x8).toString(16);

  return [
    timestampHex.slice(0, 8),
    timestampHex.slice(8, 12),
    '7' + random.slice(0, 3),
    variant + random.slice(4, 7),
    random.slice(7, 19),
  ].join('-');
}

/**
 * Prefixed, time-ordered entity id, e.g. `ord_0190b1c2-...`
 */
export function generateId(prefix: IdPrefix, now?: number): string {
  return `${prefix}_${generateTimeOrderedUUID(now)}`;
}
