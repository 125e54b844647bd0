/**
 * CommerceEngine - the consistency engine behind one set of repositories
 *
 * Wires ledger, checkout, lifecycle and the derived views around a single
 * KeyedLock, runs every call through the configured middlewares and logs its
 * result. Callers pass a RequestContext on every call; the engine keeps no
 * session state of its own.
 */

import { CancellationCoordinator } from './cancellation/cancellation-coordinator.js';
import type { CartInput } from './checkout/cart.js';
import { CheckoutCoordinator } from './checkout/checkout-coordinator.js';
import { getConfiguration } from './config.js';
import type {
  InventoryTransaction,
  JournalFilter,
  Order,
  OrderFilter,
  OrderStatus,
  Product,
  RequestContext,
} from './domain/types.js';
import { isCommerceError, NotFoundError, PersistenceError } from './errors.js';
import { InventoryJournal } from './ledger/inventory-journal.js';
import { StockLedger } from './ledger/stock-ledger.js';
import { OrderLifecycle } from './lifecycle/order-lifecycle.js';
import { createLogger, type Logger } from './logging/logger.js';
import { MetricsAggregator, type MetricsOptions, type OrderMetrics } from './metrics/metrics-aggregator.js';
import { applyMiddlewares, type OperationMiddleware } from './middleware/types.js';
import { LowStockMonitor } from './monitoring/low-stock-monitor.js';
import type { JournalRepository } from './ports/journal.repository.js';
import type { OrderRepository } from './ports/order.repository.js';
import type { ProductRepository } from './ports/product.repository.js';
import { failedResult, successResult, type Result } from './result.js';
import { KeyedLock, orderKey, type LockMode } from './utils/lock.js';

export interface CommerceEngineOptions {
  products: ProductRepository;
  orders: OrderRepository;
  /** Enables the inventory journal */
  journal?: JournalRepository;
  /** Defaults to the configured `lockMode` */
  lockMode?: LockMode;
  /** Defaults to a logger built from the `logger` configuration */
  logger?: Logger;
  /** Replaces the globally registered middlewares for this engine */
  middlewares?: readonly OperationMiddleware[];
  now?: () => Date;
}

export class CommerceEngine {
  readonly ledger: StockLedger;
  readonly checkout: CheckoutCoordinator;
  readonly lifecycle: OrderLifecycle;
  readonly cancellation: CancellationCoordinator;
  readonly monitor: LowStockMonitor;
  readonly metricsAggregator: MetricsAggregator;
  readonly journal?: InventoryJournal;

  private readonly orders: OrderRepository;
  private readonly logger: Logger;
  private readonly middlewares?: readonly OperationMiddleware[];

  constructor(options: CommerceEngineOptions) {
    const now = options.now ?? (() => new Date());

    this.orders = options.orders;
    this.logger = options.logger ?? createLogger();
    this.middlewares = options.middlewares;
    this.journal = options.journal ? new InventoryJournal(options.journal, now) : undefined;

    this.ledger = new StockLedger({
      products: options.products,
      lock: new KeyedLock(options.lockMode ?? getConfiguration().lockMode),
      journal: this.journal,
      logger: this.logger,
    });
    this.cancellation = new CancellationCoordinator(this.ledger);
    this.checkout = new CheckoutCoordinator({
      products: options.products,
      orders: options.orders,
      ledger: this.ledger,
      now,
      logger: this.logger,
    });
    this.lifecycle = new OrderLifecycle({
      orders: options.orders,
      ledger: this.ledger,
      cancellation: this.cancellation,
      now,
      logger: this.logger,
    });
    this.monitor = new LowStockMonitor(options.products);
    this.metricsAggregator = new MetricsAggregator(options.orders);
  }

  // ============================================
  // Orders
  // ============================================

  placeOrder(context: RequestContext, userRef: string, cart: CartInput): Promise<Result<Order>> {
    return this.run('placeOrder', context, () =>
      this.checkout.placeOrder(userRef, cart, { actor: context.actor })
    );
  }

  transition(context: RequestContext, orderId: string, target: OrderStatus): Promise<Result<Order>> {
    return this.run('transition', context, () =>
      this.lifecycle.transition(orderId, target, { actor: context.actor })
    );
  }

  markPaid(context: RequestContext, orderId: string): Promise<Result<Order>> {
    return this.transition(context, orderId, 'PAID');
  }

  markDelivered(context: RequestContext, orderId: string): Promise<Result<Order>> {
    return this.transition(context, orderId, 'DELIVERED');
  }

  cancel(context: RequestContext, orderId: string): Promise<Result<Order>> {
    return this.transition(context, orderId, 'CANCELLED');
  }

  /**
   * Read an order under its lock, so an in-flight transition is seen either
   * fully applied or not at all.
   */
  getOrder(context: RequestContext, orderId: string): Promise<Result<Order>> {
    return this.run('getOrder', context, () =>
      this.ledger.lock.runExclusive([orderKey(orderId)], async () => {
        const order = await this.orders.getOrder(orderId);
        return order
          ? successResult<Order>('getOrder', order)
          : failedResult<Order>('getOrder', new NotFoundError('order', orderId));
      })
    );
  }

  /**
   * Orders across keys are read through a lock-wide snapshot: no order in the
   * list is halfway through a transition.
   */
  listOrders(context: RequestContext, filter: OrderFilter = {}): Promise<Result<Order[]>> {
    return this.run('listOrders', context, () =>
      this.snapshot(async () => successResult<Order[]>('listOrders', await this.orders.listOrders(filter)))
    );
  }

  // ============================================
  // Stock
  // ============================================

  peek(context: RequestContext, productId: string): Promise<Result<number>> {
    return this.run('peek', context, () => this.ledger.peek(productId));
  }

  restock(context: RequestContext, productId: string, quantity: number): Promise<Result<number>> {
    return this.run('restock', context, () =>
      this.ledger.restock(productId, quantity, { actor: context.actor })
    );
  }

  stockHistory(context: RequestContext, filter: JournalFilter = {}): Promise<Result<InventoryTransaction[]>> {
    return this.run('stockHistory', context, () =>
      this.snapshot(async () =>
        successResult<InventoryTransaction[]>(
          'stockHistory',
          this.journal ? await this.journal.history(filter) : []
        )
      )
    );
  }

  // ============================================
  // Derived views
  // ============================================

  // Derived views span every product or order, so they wait for all
  // in-flight movements and transitions rather than for single keys.

  lowStock(context: RequestContext): Promise<Result<Product[]>> {
    return this.run('lowStock', context, () =>
      this.snapshot(async () => successResult<Product[]>('lowStock', await this.monitor.scan()))
    );
  }

  metrics(context: RequestContext, options: MetricsOptions = {}): Promise<Result<OrderMetrics>> {
    return this.run('metrics', context, () =>
      this.snapshot(async () =>
        successResult<OrderMetrics>('metrics', await this.metricsAggregator.compute(options))
      )
    );
  }

  // ============================================
  // Execution
  // ============================================

  private snapshot<T>(fn: () => Promise<Result<T>>): Promise<Result<T>> {
    return this.ledger.lock.snapshot(fn);
  }

  private async run<T>(
    name: string,
    context: RequestContext,
    fn: () => Promise<Result<T>>
  ): Promise<Result<T>> {
    const middlewares = this.middlewares ?? getConfiguration().middlewares.registry;

    const result = await applyMiddlewares<T>(middlewares, { name, context }, async () => {
      try {
        return (await fn()).withMetadata({ actor: context.actor });
      } catch (error) {
        const wrapped = isCommerceError(error) ? error : new PersistenceError(name, error);
        return failedResult<T>(name, wrapped, { actor: context.actor });
      }
    });

    this.logger.log(result);
    return result;
  }
}

export function createEngine(options: CommerceEngineOptions): CommerceEngine {
  return new CommerceEngine(options);
}
