import type { InventoryTransaction, JournalFilter } from '../../domain/types.js';
import type { JournalRepository } from '../../ports/journal.repository.js';

export class InMemoryJournalRepository implements JournalRepository {
  private entries: InventoryTransaction[] = [];

  async append(entries: readonly InventoryTransaction[]): Promise<void> {
    this.entries.push(...entries);
  }

  async list(filter: JournalFilter = {}): Promise<InventoryTransaction[]> {
    return this.entries.filter(
      (entry) =>
        (filter.productId === undefined || entry.productId === filter.productId) &&
        (filter.orderId === undefined || entry.orderId === filter.orderId) &&
        (filter.kind === undefined || entry.kind === filter.kind)
    );
  }

  clear(): void {
    this.entries = [];
  }
}
