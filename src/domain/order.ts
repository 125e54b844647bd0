import { deepFreeze } from '../utils/types.js';
import { multiplyAmount, sumAmounts } from './money.js';
import type { Order, OrderItem, OrderStatus, Product, StockLine } from './types.js';

/**
 * Snapshot name and price of each product into an order item.
 * `products` must hold every line's product.
 */
export function buildOrderItems(
  lines: readonly StockLine[],
  products: ReadonlyMap<string, Product>
): OrderItem[] {
  const items: OrderItem[] = [];
  for (const line of lines) {
    const product = products.get(line.productId);
    if (!product) {
      throw new Error(`No catalog entry for '${line.productId}'`);
    }
    items.push({
      productId: product.id,
      productName: product.name,
      quantity: line.quantity,
      unitPrice: product.price,
      lineTotal: multiplyAmount(product.price, line.quantity),
    });
  }
  return items;
}

export function createOrder(params: {
  id: string;
  userRef: string;
  items: readonly OrderItem[];
  placedAt: Date;
}): Order {
  const order: Order = {
    id: params.id,
    userRef: params.userRef,
    status: 'PLACED',
    items: [...params.items],
    total: sumAmounts(params.items.map((item) => item.lineTotal)),
    placedAt: new Date(params.placedAt.getTime()),
    updatedAt: new Date(params.placedAt.getTime()),
  };
  return deepFreeze(order);
}

export function withStatus(order: Order, status: OrderStatus, at: Date): Order {
  return copyOrder({ ...order, status, updatedAt: at });
}

/**
 * Frozen copy with its own Date instances. `Object.freeze` leaves a Date's
 * time settable, so every holder of an order gets dates nobody else shares.
 */
export function copyOrder(order: Order): Order {
  return deepFreeze({
    ...order,
    placedAt: new Date(order.placedAt.getTime()),
    updatedAt: new Date(order.updatedAt.getTime()),
  });
}

export function orderLines(order: Order): StockLine[] {
  return order.items.map((item) => ({ productId: item.productId, quantity: item.quantity }));
}
