/**
 * InventoryJournal - audit trail of stock movements
 */

import type {
  InventoryTransaction,
  InventoryTransactionKind,
  JournalFilter,
} from '../domain/types.js';
import type { JournalRepository } from '../ports/journal.repository.js';
import { generateId } from '../utils/uuid.js';

export interface JournalEntryInput {
  productId: string;
  kind: InventoryTransactionKind;
  quantityDelta: number;
  resultingQuantity: number;
  orderId?: string | null;
  actor: string;
}

export class InventoryJournal {
  constructor(
    private readonly repository: JournalRepository,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Stamp and append entries. All entries of one call share a timestamp.
   */
  async record(inputs: readonly JournalEntryInput[]): Promise<InventoryTransaction[]> {
    if (inputs.length === 0) return [];

    const recordedAt = this.now();
    const entries = inputs.map((input): InventoryTransaction =>
      Object.freeze({
        id: generateId('txn', recordedAt.getTime()),
        productId: input.productId,
        kind: input.kind,
        quantityDelta: input.quantityDelta,
        resultingQuantity: input.resultingQuantity,
        orderId: input.orderId ?? null,
        actor: input.actor,
        recordedAt,
      })
    );

    await this.repository.append(entries);
    return entries;
  }

  history(filter?: JournalFilter): Promise<InventoryTransaction[]> {
    return this.repository.list(filter);
  }
}
