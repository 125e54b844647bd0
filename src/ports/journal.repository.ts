import type { InventoryTransaction, JournalFilter } from '../domain/types.js';

/**
 * Append-only store of stock movements
 */
export interface JournalRepository {
  append(entries: readonly InventoryTransaction[]): Promise<void>;
  list(filter?: JournalFilter): Promise<InventoryTransaction[]>;
}
