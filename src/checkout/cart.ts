/**
 * Cart - request-scoped shopping cart value
 *
 * The cart lives with the caller (a session, a request body); the engine
 * only sees it at checkout. Every mutation returns a new cart.
 */

import type { StockLine } from '../domain/types.js';
import { CartLinesSchema } from '../domain/schemas.js';
import { ErrorCollection, InvalidCartError } from '../errors.js';
import { failedResult, successResult, type Result } from '../result.js';

export class Cart {
  private constructor(private readonly items: ReadonlyMap<string, number>) {
    Object.freeze(this);
  }

  static empty(): Cart {
    return new Cart(new Map());
  }

  static from(input: ReadonlyMap<string, number> | Readonly<Record<string, number>>): Cart {
    return new Cart(new Map(entriesOf(input)));
  }

  /** Add units of a product on top of what the cart already holds */
  add(productId: string, quantity: number = 1): Cart {
    const next = new Map(this.items);
    next.set(productId, (next.get(productId) ?? 0) + quantity);
    return new Cart(next);
  }

  /** Replace a product's quantity; zero or less removes the line */
  set(productId: string, quantity: number): Cart {
    if (quantity <= 0) {
      return this.remove(productId);
    }
    const next = new Map(this.items);
    next.set(productId, quantity);
    return new Cart(next);
  }

  remove(productId: string): Cart {
    if (!this.items.has(productId)) return this;
    const next = new Map(this.items);
    next.delete(productId);
    return new Cart(next);
  }

  clear(): Cart {
    return Cart.empty();
  }

  quantityOf(productId: string): number {
    return this.items.get(productId) ?? 0;
  }

  get size(): number {
    return this.items.size;
  }

  get totalQuantity(): number {
    let total = 0;
    for (const quantity of this.items.values()) {
      total += quantity;
    }
    return total;
  }

  get isEmpty(): boolean {
    return this.items.size === 0;
  }

  lines(): StockLine[] {
    return [...this.items].map(([productId, quantity]) => ({ productId, quantity }));
  }

  toJSON(): Record<string, number> {
    return Object.fromEntries(this.items);
  }
}

export type CartInput = Cart | ReadonlyMap<string, number> | Readonly<Record<string, number>>;

/**
 * Validate the shape of a cart: at least one line, every quantity a positive
 * integer, every product id non-empty. Catalog membership is checked later.
 */
export function parseCart(input: CartInput, operation: string = 'cart.parse'): Result<StockLine[], InvalidCartError> {
  const lines = toLines(input);
  const parsed = CartLinesSchema.safeParse(lines);

  if (parsed.success) {
    return successResult<StockLine[], InvalidCartError>(operation, parsed.data);
  }

  const issues = new ErrorCollection();
  for (const issue of parsed.error.issues) {
    const [index, field] = issue.path;
    if (typeof index !== 'number') {
      issues.add('cart', issue.message);
      continue;
    }
    const productId = lines[index]?.productId;
    const key = productId ? productId : `line ${index + 1}`;
    issues.add(key, field === 'quantity' ? `quantity ${issue.message}` : issue.message);
  }

  return failedResult<StockLine[], InvalidCartError>(operation, new InvalidCartError(issues));
}

function toLines(input: CartInput): StockLine[] {
  if (input instanceof Cart) return input.lines();
  return entriesOf(input).map(([productId, quantity]) => ({ productId, quantity }));
}

function isMapInput(
  input: ReadonlyMap<string, number> | Readonly<Record<string, number>>
): input is ReadonlyMap<string, number> {
  return input instanceof Map;
}

function entriesOf(
  input: ReadonlyMap<string, number> | Readonly<Record<string, number>>
): Array<[string, number]> {
  return isMapInput(input) ? [...input] : Object.entries(input);
}
