import { copyOrder } from '../../domain/order.js';
import { matchesOrderFilter, type Order, type OrderFilter } from '../../domain/types.js';
import type { OrderRepository } from '../../ports/order.repository.js';

/**
 * In-Memory implementation of OrderRepository
 * Orders are listed newest first, as the order dashboards show them.
 * Stored and returned orders are copies, so callers never share a Date.
 */
export class InMemoryOrderRepository implements OrderRepository {
  private orders: Map<string, Order> = new Map();

  async getOrder(id: string): Promise<Order | null> {
    const order = this.orders.get(id);
    return order ? copyOrder(order) : null;
  }

  async listOrders(filter?: OrderFilter): Promise<Order[]> {
    return [...this.orders.values()]
      .filter((order) => matchesOrderFilter(order, filter))
      .sort((a, b) => b.placedAt.getTime() - a.placedAt.getTime())
      .map(copyOrder);
  }

  async saveOrder(order: Order): Promise<void> {
    this.orders.set(order.id, copyOrder(order));
  }

  get size(): number {
    return this.orders.size;
  }

  clear(): void {
    this.orders.clear();
  }
}
