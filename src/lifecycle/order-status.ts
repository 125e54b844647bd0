/**
 * Order status state machine
 */

import type { OrderStatus } from '../domain/types.js';
import { assertNever } from '../utils/types.js';

/**
 * Legal moves per status. Typed as a total record so adding a status without
 * deciding its moves fails to compile.
 */
export const ORDER_TRANSITIONS: Readonly<Record<OrderStatus, readonly OrderStatus[]>> = Object.freeze({
  PLACED: ['PAID', 'CANCELLED'],
  PAID: ['DELIVERED', 'CANCELLED'],
  DELIVERED: [],
  CANCELLED: [],
});

export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
  return ORDER_TRANSITIONS[from].includes(to);
}

export function allowedTransitions(from: OrderStatus): readonly OrderStatus[] {
  return ORDER_TRANSITIONS[from];
}

export function isTerminal(status: OrderStatus): boolean {
  return ORDER_TRANSITIONS[status].length === 0;
}

/**
 * Whether an order in this status still holds its stock. PLACED and PAID
 * orders hold it until delivery or cancellation.
 */
export function holdsReservation(status: OrderStatus): boolean {
  switch (status) {
    case 'PLACED':
    case 'PAID':
      return true;
    case 'DELIVERED':
    case 'CANCELLED':
      return false;
    default:
      return assertNever(status);
  }
}

/**
 * Whether the order's total counts as revenue
 */
export function countsAsRevenue(status: OrderStatus): boolean {
  switch (status) {
    case 'PAID':
    case 'DELIVERED':
      return true;
    case 'PLACED':
    case 'CANCELLED':
      return false;
    default:
      return assertNever(status);
  }
}

