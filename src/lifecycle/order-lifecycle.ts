/**
 * OrderLifecycle - moves a single order through its statuses
 */

import { CancellationCoordinator } from '../cancellation/cancellation-coordinator.js';
import { orderLines, withStatus } from '../domain/order.js';
import type { Order, OrderStatus } from '../domain/types.js';
import { IllegalTransitionError, NotFoundError, PersistenceError } from '../errors.js';
import type { StockLedger } from '../ledger/stock-ledger.js';
import { logger as defaultLogger, type Logger } from '../logging/logger.js';
import type { OrderRepository } from '../ports/order.repository.js';
import { failedResult, successResult, type Result } from '../result.js';
import { orderKey, productKey, type LockHandle } from '../utils/lock.js';
import { canTransition, holdsReservation } from './order-status.js';

export interface OrderLifecycleOptions {
  orders: OrderRepository;
  ledger: StockLedger;
  cancellation?: CancellationCoordinator;
  now?: () => Date;
  logger?: Logger;
}

export interface TransitionOptions {
  actor?: string;
}

const OPERATION = 'lifecycle.transition';

export class OrderLifecycle {
  private readonly orders: OrderRepository;
  private readonly ledger: StockLedger;
  private readonly cancellation: CancellationCoordinator;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: OrderLifecycleOptions) {
    this.orders = options.orders;
    this.ledger = options.ledger;
    this.cancellation = options.cancellation ?? new CancellationCoordinator(options.ledger);
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Move an order to `target`. The order is re-read under its lock, so a
   * stale `Order` argument cannot resurrect an old status.
   *
   * Cancelling a PLACED or PAID order releases its stock in the same
   * critical section as the status write: product locks are held from the
   * release until the order is saved, and a failed save re-reserves the stock.
   */
  transition(order: Order | string, target: OrderStatus, options: TransitionOptions = {}): Promise<Result<Order>> {
    const orderId = typeof order === 'string' ? order : order.id;

    return this.ledger.lock.runExclusive<Result<Order>>([orderKey(orderId)], async (orderHandle) => {
      let found: Order | null;
      try {
        found = await this.orders.getOrder(orderId);
      } catch (error) {
        return failedResult<Order>(OPERATION, new PersistenceError(OPERATION, error));
      }

      if (!found) {
        return failedResult<Order>(OPERATION, new NotFoundError('order', orderId));
      }
      const current = found;

      if (!canTransition(current.status, target)) {
        return failedResult<Order>(
          OPERATION,
          new IllegalTransitionError(orderId, current.status, target)
        );
      }

      const updated = withStatus(current, target, this.now());

      if (target === 'CANCELLED' && holdsReservation(current.status)) {
        return this.cancel(current, updated, orderHandle, options);
      }

      try {
        await this.orders.saveOrder(updated);
      } catch (error) {
        return failedResult<Order>(OPERATION, new PersistenceError(OPERATION, error));
      }

      this.logger.debug(() => `${OPERATION} ${orderId} ${current.status} -> ${target}`);
      return successResult<Order>(OPERATION, updated);
    });
  }

  private cancel(
    current: Order,
    updated: Order,
    orderHandle: LockHandle,
    options: TransitionOptions
  ): Promise<Result<Order>> {
    const keys = current.items.map((item) => productKey(item.productId));

    return this.ledger.lock.runExclusive<Result<Order>>(
      keys,
      async (stockHandle) => {
        const released = await this.cancellation.releaseOrderStock(current, {
          actor: options.actor,
          held: stockHandle,
        });
        if (!released.success) {
          return failedResult<Order>(OPERATION, released.error);
        }

        try {
          await this.orders.saveOrder(updated);
        } catch (error) {
          await this.restoreReservation(current, stockHandle, options);
          return failedResult<Order>(OPERATION, new PersistenceError(OPERATION, error));
        }

        this.logger.debug(() => `${OPERATION} ${current.id} ${current.status} -> CANCELLED, stock released`);
        return successResult<Order>(OPERATION, updated);
      },
      orderHandle
    );
  }

  private async restoreReservation(order: Order, held: LockHandle, options: TransitionOptions): Promise<void> {
    const restored = await this.ledger.reserveAll(orderLines(order), {
      actor: options.actor,
      orderId: order.id,
      journalKind: 'SALE',
      held,
    });
    if (!restored.success) {
      this.logger.error(`${OPERATION} could not re-reserve stock of ${order.id}: ${restored.reason}`);
    }
  }
}
