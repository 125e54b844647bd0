/**
 * MetricsAggregator - sales figures derived from a set of orders
 *
 * Revenue counts PAID and DELIVERED orders only. PLACED orders are not yet
 * revenue and CANCELLED orders never are. Empty inputs produce zeros.
 */

import { getConfiguration } from '../config.js';
import { roundAmount, sumAmounts } from '../domain/money.js';
import { matchesOrderFilter, type Order, type OrderStatus } from '../domain/types.js';
import { countsAsRevenue } from '../lifecycle/order-status.js';
import type { OrderRepository } from '../ports/order.repository.js';

export interface MetricsOptions {
  /** Inclusive lower bound on `placedAt` */
  from?: Date;
  /** Inclusive upper bound on `placedAt` */
  to?: Date;
  /** Length of `topProducts` */
  topProducts?: number;
}

export interface ProductRevenue {
  productId: string;
  productName: string;
  quantity: number;
  revenue: number;
}

export interface OrderMetrics {
  orderCount: number;
  totalRevenue: number;
  /** DELIVERED over non-cancelled orders, between 0 and 1 */
  completionRate: number;
  averageOrderValue: number;
  statusCounts: Record<OrderStatus, number>;
  /** Orders waiting for payment */
  pendingCount: number;
  /** Paid orders waiting for delivery */
  readyToShipCount: number;
  topProducts: ProductRevenue[];
}

export function aggregateMetrics(orders: Iterable<Order>, options: MetricsOptions = {}): OrderMetrics {
  const limit = options.topProducts ?? getConfiguration().topProductsLimit;
  const statusCounts = emptyStatusCounts();
  const revenueTotals: number[] = [];
  const byProduct = new Map<string, ProductRevenue>();
  let orderCount = 0;

  for (const order of orders) {
    if (!matchesOrderFilter(order, { from: options.from, to: options.to })) continue;

    orderCount++;
    statusCounts[order.status]++;

    if (!countsAsRevenue(order.status)) continue;
    revenueTotals.push(order.total);

    for (const item of order.items) {
      const entry = byProduct.get(item.productId) ?? {
        productId: item.productId,
        productName: item.productName,
        quantity: 0,
        revenue: 0,
      };
      entry.quantity += item.quantity;
      entry.revenue = sumAmounts([entry.revenue, item.lineTotal]);
      byProduct.set(item.productId, entry);
    }
  }

  const totalRevenue = sumAmounts(revenueTotals);
  const nonCancelled = orderCount - statusCounts.CANCELLED;

  return {
    orderCount,
    totalRevenue,
    completionRate: nonCancelled === 0 ? 0 : statusCounts.DELIVERED / nonCancelled,
    averageOrderValue: revenueTotals.length === 0 ? 0 : roundAmount(totalRevenue / revenueTotals.length),
    statusCounts,
    pendingCount: statusCounts.PLACED,
    readyToShipCount: statusCounts.PAID,
    topProducts: rankProducts([...byProduct.values()], limit),
  };
}

function emptyStatusCounts(): Record<OrderStatus, number> {
  return { PLACED: 0, PAID: 0, DELIVERED: 0, CANCELLED: 0 };
}

function rankProducts(entries: ProductRevenue[], limit: number): ProductRevenue[] {
  return entries
    .sort((a, b) => b.revenue - a.revenue || a.productId.localeCompare(b.productId))
    .slice(0, Math.max(0, limit));
}

/**
 * Computes metrics over the orders the repository holds in a date range.
 */
export class MetricsAggregator {
  constructor(private readonly orders: OrderRepository) {}

  async compute(options: MetricsOptions = {}): Promise<OrderMetrics> {
    const orders = await this.orders.listOrders({ from: options.from, to: options.to });
    return aggregateMetrics(orders, options);
  }
}
