import type { Order, OrderFilter } from '../domain/types.js';

/**
 * Order Repository Port
 * Orders are durably retrievable by id; `saveOrder` inserts or replaces.
 */
export interface OrderRepository {
  getOrder(id: string): Promise<Order | null>;
  listOrders(filter?: OrderFilter): Promise<Order[]>;
  saveOrder(order: Order): Promise<void>;
}
