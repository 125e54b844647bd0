/**
 * Error taxonomy for stockline
 *
 * Every business failure the engine reports is one of these classes. They are
 * returned inside failed results, never thrown at the caller unless the caller
 * asks for it with `Result.unwrap()`.
 */

import type { OrderStatus } from './domain/types.js';

/**
 * Stable, machine-readable error codes
 */
export type ErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_CART'
  | 'INSUFFICIENT_STOCK'
  | 'ILLEGAL_TRANSITION'
  | 'INVALID_QUANTITY'
  | 'PERSISTENCE';

/**
 * Base error class for all stockline errors
 */
export class CommerceError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CommerceError';
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, code: this.code, message: this.message };
  }
}

export type EntityKind = 'product' | 'order';

/**
 * A referenced product or order does not exist
 */
export class NotFoundError extends CommerceError {
  readonly entity: EntityKind;
  readonly id: string;

  constructor(entity: EntityKind, id: string) {
    super('NOT_FOUND', `${entity === 'product' ? 'Product' : 'Order'} '${id}' not found`);
    this.name = 'NotFoundError';
    this.entity = entity;
    this.id = id;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), entity: this.entity, id: this.id };
  }
}

/**
 * Malformed checkout request: empty cart, bad quantity or unknown product
 */
export class InvalidCartError extends CommerceError {
  readonly issues: ErrorCollection;

  constructor(issues: ErrorCollection, message?: string) {
    super('INVALID_CART', message ?? `Invalid cart: ${issues.fullMessage}`);
    this.name = 'InvalidCartError';
    this.issues = issues;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), issues: this.issues.messages };
  }
}

/**
 * Requested quantity exceeds what the ledger holds at reservation time
 */
export class InsufficientStockError extends CommerceError {
  readonly productId: string;
  readonly requested: number;
  readonly available: number;

  constructor(productId: string, requested: number, available: number) {
    super(
      'INSUFFICIENT_STOCK',
      `Insufficient stock for '${productId}': requested ${requested}, available ${available}`
    );
    this.name = 'InsufficientStockError';
    this.productId = productId;
    this.requested = requested;
    this.available = available;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      productId: this.productId,
      requested: this.requested,
      available: this.available,
    };
  }
}

/**
 * Status change not permitted from the order's current status
 */
export class IllegalTransitionError extends CommerceError {
  readonly orderId: string;
  readonly from: OrderStatus;
  readonly to: OrderStatus;

  constructor(orderId: string, from: OrderStatus, to: OrderStatus) {
    super('ILLEGAL_TRANSITION', `Cannot transition order '${orderId}' from ${from} to ${to}`);
    this.name = 'IllegalTransitionError';
    this.orderId = orderId;
    this.from = from;
    this.to = to;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), orderId: this.orderId, from: this.from, to: this.to };
  }
}

/**
 * Ledger quantities must be positive integers
 */
export class InvalidQuantityError extends CommerceError {
  readonly productId: string;
  readonly quantity: number;

  constructor(productId: string, quantity: number) {
    super('INVALID_QUANTITY', `Quantity for '${productId}' must be a positive integer, got ${quantity}`);
    this.name = 'InvalidQuantityError';
    this.productId = productId;
    this.quantity = quantity;
  }
}

/**
 * A persistence port rejected. Wraps the original error as `cause`.
 */
export class PersistenceError extends CommerceError {
  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('PERSISTENCE', `Persistence failure during ${operation}: ${detail}`, { cause });
    this.name = 'PersistenceError';
  }
}

export function isCommerceError(value: unknown): value is CommerceError {
  return value instanceof CommerceError;
}

/**
 * Error collection for per-field (or per-cart-line) messages
 */
export class ErrorCollection {
  private readonly errors: Map<string, string[]> = new Map();

  add(key: string, message: string): void {
    const existing = this.errors.get(key) ?? [];
    existing.push(message);
    this.errors.set(key, existing);
  }

  has(key: string): boolean {
    return this.errors.has(key);
  }

  get(key: string): string[] {
    return this.errors.get(key) ?? [];
  }

  get isEmpty(): boolean {
    return this.errors.size === 0;
  }

  get size(): number {
    return this.errors.size;
  }

  get messages(): Record<string, string[]> {
    return Object.fromEntries(this.errors);
  }

  get fullMessage(): string {
    const parts: string[] = [];
    for (const [key, msgs] of this.errors) {
      for (const msg of msgs) {
        parts.push(`${key} ${msg}`);
      }
    }
    return parts.join('. ') + (parts.length > 0 ? '.' : '');
  }

  [Symbol.iterator](): IterableIterator<[string, string[]]> {
    return this.errors[Symbol.iterator]();
  }
}
