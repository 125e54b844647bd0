/**
 * CancellationCoordinator - gives a cancelled order's stock back
 */

import { orderLines } from '../domain/order.js';
import type { Order } from '../domain/types.js';
import type { StockLedger, StockLevels } from '../ledger/stock-ledger.js';
import type { Result } from '../result.js';
import type { LockHandle } from '../utils/lock.js';

export interface ReleaseOptions {
  actor?: string;
  held?: LockHandle;
}

export class CancellationCoordinator {
  constructor(private readonly ledger: StockLedger) {}

  /**
   * Release every item of `order` back to the ledger and journal each line as
   * CANCELLATION.
   *
   * Precondition: called exactly once per order, by OrderLifecycle, as part of
   * the PLACED/PAID to CANCELLED move. There is no deduplication here; a
   * second call credits the stock again.
   */
  releaseOrderStock(order: Order, options: ReleaseOptions = {}): Promise<Result<StockLevels>> {
    return this.ledger.releaseAll(orderLines(order), {
      actor: options.actor,
      orderId: order.id,
      journalKind: 'CANCELLATION',
      held: options.held,
    });
  }
}
