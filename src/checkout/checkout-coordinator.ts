/**
 * CheckoutCoordinator - turns a cart into a PLACED order
 *
 * 1. Validate the cart's shape
 * 2. Under the product locks, check every product against the catalog
 * 3. Reserve every line as one all-or-nothing batch
 * 4. Snapshot prices, build and persist the order
 *
 * A failure at any step leaves every product's quantity as it was.
 */

import { buildOrderItems, createOrder, orderLines } from '../domain/order.js';
import type { Order, Product, StockLine } from '../domain/types.js';
import {
  ErrorCollection,
  InvalidCartError,
  NotFoundError,
  PersistenceError,
} from '../errors.js';
import type { StockLedger } from '../ledger/stock-ledger.js';
import { logger as defaultLogger, type Logger } from '../logging/logger.js';
import type { OrderRepository } from '../ports/order.repository.js';
import type { ProductRepository } from '../ports/product.repository.js';
import { failedResult, successResult, type Result } from '../result.js';
import { productKey, type LockHandle } from '../utils/lock.js';
import { generateId } from '../utils/uuid.js';
import { parseCart, type CartInput } from './cart.js';

export interface CheckoutCoordinatorOptions {
  products: ProductRepository;
  orders: OrderRepository;
  ledger: StockLedger;
  now?: () => Date;
  logger?: Logger;
}

export interface PlaceOrderOptions {
  /** Who performs the checkout, when not the order's owner (staff placing for a customer) */
  actor?: string;
}

const OPERATION = 'checkout.placeOrder';

export class CheckoutCoordinator {
  private readonly products: ProductRepository;
  private readonly orders: OrderRepository;
  private readonly ledger: StockLedger;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: CheckoutCoordinatorOptions) {
    this.products = options.products;
    this.orders = options.orders;
    this.ledger = options.ledger;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
  }

  async placeOrder(userRef: string, cart: CartInput, options: PlaceOrderOptions = {}): Promise<Result<Order>> {
    const parsed = parseCart(cart, OPERATION);
    if (!parsed.success) {
      return failedResult<Order>(OPERATION, parsed.error);
    }
    const lines = parsed.value;

    // Names and prices are read under the same locks as the reservation
    const keys = lines.map((line) => productKey(line.productId));
    return this.ledger.lock.runExclusive<Result<Order>>(keys, async (handle) => {
      let catalog: Map<string, Product>;
      try {
        catalog = await this.loadCatalog(lines);
      } catch (error) {
        return failedResult<Order>(OPERATION, new PersistenceError(OPERATION, error));
      }

      const unknown = lines.filter((line) => !catalog.has(line.productId));
      if (unknown.length > 0) {
        return failedResult<Order>(OPERATION, unknownProducts(unknown.map((line) => line.productId)));
      }

      return this.reserveAndCreate(userRef, lines, catalog, handle, options);
    });
  }

  private async reserveAndCreate(
    userRef: string,
    lines: readonly StockLine[],
    catalog: ReadonlyMap<string, Product>,
    held: LockHandle,
    options: PlaceOrderOptions
  ): Promise<Result<Order>> {
    const placedAt = this.now();
    const orderId = generateId('ord', placedAt.getTime());
    const actor = options.actor ?? userRef;

    const reserved = await this.ledger.reserveAll(lines, {
      actor,
      orderId,
      journalKind: 'SALE',
      held,
    });
    if (!reserved.success) {
      // The catalog dropped a product between the read and the reservation
      const error = reserved.error instanceof NotFoundError
        ? unknownProducts([reserved.error.id])
        : reserved.error;
      return failedResult<Order>(OPERATION, error);
    }

    const order = createOrder({
      id: orderId,
      userRef,
      items: buildOrderItems(lines, catalog),
      placedAt,
    });

    try {
      await this.orders.saveOrder(order);
    } catch (error) {
      const undone = await this.ledger.releaseAll(orderLines(order), {
        actor,
        orderId,
        journalKind: 'CANCELLATION',
        held,
      });
      if (!undone.success) {
        this.logger.error(`${OPERATION} could not release stock of unsaved ${orderId}: ${undone.reason}`);
      }
      return failedResult<Order>(OPERATION, new PersistenceError(OPERATION, error));
    }

    this.logger.debug(() => `${OPERATION} ${orderId} for ${userRef}, total ${order.total}`);
    return successResult<Order>(OPERATION, order);
  }

  private async loadCatalog(lines: readonly StockLine[]): Promise<Map<string, Product>> {
    const catalog = new Map<string, Product>();
    for (const line of lines) {
      const product = await this.products.getProduct(line.productId);
      if (product) {
        catalog.set(product.id, product);
      }
    }
    return catalog;
  }
}

function unknownProducts(productIds: readonly string[]): InvalidCartError {
  const issues = new ErrorCollection();
  for (const productId of productIds) {
    issues.add(productId, 'is not in the catalog');
  }
  return new InvalidCartError(issues);
}
