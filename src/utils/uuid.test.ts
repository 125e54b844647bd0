import { describe, it, expect } from 'vitest';
import { generateId, generateTimeOrderedUUID, generateUUID } from './uuid.js';

const UUID_V7 = /^[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('uuid', () => {
  it('should generate v4 UUIDs', () => {
    expect(generateUUID()).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });

  it('should encode the timestamp in the leading 48 bits', () => {
    const id = generateTimeOrderedUUID(0x0190b1c2d3e4);

    expect(id).toMatch(UUID_V7);
    expect(id.startsWith('0190b1c2-d3e4-')).toBe(true);
  });

  it('should sort by creation time', () => {
    const earlier = generateTimeOrderedUUID(1_700_000_000_000);
    const later = generateTimeOrderedUUID(1_700_000_000_001);

    expect(earlier < later).toBe(true);
  });

  it('should prefix entity ids', () => {
    expect(generateId('ord')).toMatch(/^ord_/);
    expect(generateId('txn', 0).slice(4)).toMatch(UUID_V7);
  });
});
