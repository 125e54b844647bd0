/**
 * Domain records
 *
 * Entities are plain data. Anything derived from them (low stock, revenue,
 * legal moves) lives in separate pure functions.
 */

export const ORDER_STATUSES = ['PLACED', 'PAID', 'DELIVERED', 'CANCELLED'] as const;

export type OrderStatus = (typeof ORDER_STATUSES)[number];

export interface Product {
  readonly id: string;
  readonly name: string;
  readonly category: string;
  readonly sku: string | null;
  readonly description?: string;
  /** Current selling price; orders snapshot it at checkout */
  readonly price: number;
  readonly availableQuantity: number;
  readonly lowStockThreshold: number;
}

export interface OrderItem {
  readonly productId: string;
  readonly productName: string;
  readonly quantity: number;
  readonly unitPrice: number;
  readonly lineTotal: number;
}

export interface Order {
  readonly id: string;
  readonly userRef: string;
  readonly status: OrderStatus;
  readonly items: readonly OrderItem[];
  readonly total: number;
  readonly placedAt: Date;
  readonly updatedAt: Date;
}

/**
 * Criteria for order queries. All fields combine with AND; `from`/`to` are
 * inclusive bounds on `placedAt`.
 */
export interface OrderFilter {
  status?: OrderStatus | readonly OrderStatus[];
  userRef?: string;
  from?: Date;
  to?: Date;
}

export type InventoryTransactionKind = 'SALE' | 'CANCELLATION' | 'RESTOCK';

export interface InventoryTransaction {
  readonly id: string;
  readonly productId: string;
  readonly kind: InventoryTransactionKind;
  /** Signed change applied to `availableQuantity` */
  readonly quantityDelta: number;
  readonly resultingQuantity: number;
  readonly orderId: string | null;
  readonly actor: string;
  readonly recordedAt: Date;
}

export interface JournalFilter {
  productId?: string;
  orderId?: string;
  kind?: InventoryTransactionKind;
}

/** One line of a stock movement: how much of which product */
export interface StockLine {
  readonly productId: string;
  readonly quantity: number;
}

export type UserRole = 'admin' | 'staff' | 'customer';

/**
 * Request-scoped attribution passed into every engine call.
 * The engine records `actor`; it does not authorize.
 */
export interface RequestContext {
  readonly actor: string;
  readonly role?: UserRole;
  readonly correlationId?: string;
}

export function isOrderStatus(value: unknown): value is OrderStatus {
  return typeof value === 'string' && (ORDER_STATUSES as readonly string[]).includes(value);
}

export function matchesOrderFilter(order: Order, filter: OrderFilter = {}): boolean {
  if (filter.status !== undefined) {
    const wanted: readonly OrderStatus[] =
      typeof filter.status === 'string' ? [filter.status] : filter.status;
    if (!wanted.includes(order.status)) return false;
  }
  if (filter.userRef !== undefined && order.userRef !== filter.userRef) return false;
  const placed = order.placedAt.getTime();
  if (filter.from && placed < filter.from.getTime()) return false;
  if (filter.to && placed > filter.to.getTime()) return false;
  return true;
}
