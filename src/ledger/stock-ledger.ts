/**
 * StockLedger - owns per-product available quantity
 *
 * Every read-modify-write of `availableQuantity` runs under the product's
 * key in the shared KeyedLock. Batch operations hold all of their keys for
 * the whole check-then-write, so a batch either moves every line or none.
 */

import { getConfiguration } from '../config.js';
import type { InventoryTransactionKind, Product, StockLine } from '../domain/types.js';
import {
  InsufficientStockError,
  InvalidQuantityError,
  NotFoundError,
  PersistenceError,
} from '../errors.js';
import { logger as defaultLogger, type Logger } from '../logging/logger.js';
import type { ProductRepository } from '../ports/product.repository.js';
import { failedResult, successResult, type Result } from '../result.js';
import { KeyedLock, productKey, type LockHandle } from '../utils/lock.js';
import type { InventoryJournal } from './inventory-journal.js';

/** Resulting quantity per product id */
export type StockLevels = Readonly<Record<string, number>>;

export interface MovementOptions {
  /** Who caused the movement; recorded in the journal */
  actor?: string;
  orderId?: string;
  /** Journal the movement under this kind; unjournaled when absent */
  journalKind?: InventoryTransactionKind;
  /** Locks already held by the caller */
  held?: LockHandle;
}

export interface StockLedgerOptions {
  products: ProductRepository;
  lock?: KeyedLock;
  journal?: InventoryJournal;
  logger?: Logger;
}

type Direction = 'reserve' | 'release';

interface ResolvedLine {
  line: StockLine;
  product: Product;
}

export const SYSTEM_ACTOR = 'system';

export class StockLedger {
  readonly lock: KeyedLock;
  private readonly products: ProductRepository;
  private readonly journal?: InventoryJournal;
  private readonly logger: Logger;

  constructor(options: StockLedgerOptions) {
    this.products = options.products;
    this.lock = options.lock ?? new KeyedLock(getConfiguration().lockMode);
    this.journal = options.journal;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Decrement a product's quantity. Fails with InsufficientStock when the
   * quantity exceeds what is available; returns the new quantity.
   */
  async reserve(productId: string, quantity: number, options: MovementOptions = {}): Promise<Result<number>> {
    const result = await this.move('ledger.reserve', 'reserve', [{ productId, quantity }], options);
    return result.map((levels) => levels[productId]);
  }

  /**
   * Increment a product's quantity. No upper bound; returns the new quantity.
   */
  async release(productId: string, quantity: number, options: MovementOptions = {}): Promise<Result<number>> {
    const result = await this.move('ledger.release', 'release', [{ productId, quantity }], options);
    return result.map((levels) => levels[productId]);
  }

  /**
   * Receive new stock from a supplier, journaled as RESTOCK.
   */
  async restock(productId: string, quantity: number, options: MovementOptions = {}): Promise<Result<number>> {
    const result = await this.move('ledger.restock', 'release', [{ productId, quantity }], {
      ...options,
      journalKind: 'RESTOCK',
    });
    return result.map((levels) => levels[productId]);
  }

  /**
   * All-or-nothing reservation across several products.
   */
  reserveAll(lines: readonly StockLine[], options: MovementOptions = {}): Promise<Result<StockLevels>> {
    return this.move('ledger.reserveAll', 'reserve', lines, options);
  }

  releaseAll(lines: readonly StockLine[], options: MovementOptions = {}): Promise<Result<StockLevels>> {
    return this.move('ledger.releaseAll', 'release', lines, options);
  }

  /**
   * Current quantity. Waits for in-flight movements on the product, so it
   * never observes half of a batch.
   */
  peek(productId: string): Promise<Result<number>> {
    const operation = 'ledger.peek';

    return this.lock.runExclusive<Result<number>>([productKey(productId)], async () => {
      try {
        const product = await this.products.getProduct(productId);
        if (!product) {
          return failedResult<number>(operation, new NotFoundError('product', productId));
        }
        return successResult<number>(operation, product.availableQuantity);
      } catch (error) {
        return failedResult<number>(operation, new PersistenceError(operation, error));
      }
    });
  }

  private async move(
    operation: string,
    direction: Direction,
    lines: readonly StockLine[],
    options: MovementOptions
  ): Promise<Result<StockLevels>> {
    const invalid = lines.find((line) => !isPositiveInteger(line.quantity));
    if (invalid) {
      return failedResult<StockLevels>(
        operation,
        new InvalidQuantityError(invalid.productId, invalid.quantity)
      );
    }

    const merged = mergeLines(lines);
    const keys = merged.map((line) => productKey(line.productId));

    return this.lock.runExclusive<Result<StockLevels>>(
      keys,
      async () => {
        let resolved: ResolvedLine[];
        try {
          resolved = await this.resolve(merged);
        } catch (error) {
          return failedResult<StockLevels>(operation, new PersistenceError(operation, error));
        }

        const missing = merged.find((line) => !resolved.some((r) => r.line === line));
        if (missing) {
          return failedResult<StockLevels>(operation, new NotFoundError('product', missing.productId));
        }

        if (direction === 'reserve') {
          const short = resolved.find(({ line, product }) => line.quantity > product.availableQuantity);
          if (short) {
            return failedResult<StockLevels>(
              operation,
              new InsufficientStockError(short.line.productId, short.line.quantity, short.product.availableQuantity)
            );
          }
        }

        return this.write(operation, direction, resolved, options);
      },
      options.held
    );
  }

  private async resolve(lines: readonly StockLine[]): Promise<ResolvedLine[]> {
    const resolved: ResolvedLine[] = [];
    for (const line of lines) {
      const product = await this.products.getProduct(line.productId);
      if (product) {
        resolved.push({ line, product });
      }
    }
    return resolved;
  }

  private async write(
    operation: string,
    direction: Direction,
    resolved: readonly ResolvedLine[],
    options: MovementOptions
  ): Promise<Result<StockLevels>> {
    const sign = direction === 'reserve' ? -1 : 1;
    const written: Array<{ productId: string; previous: number }> = [];
    const levels: Record<string, number> = {};

    try {
      for (const { line, product } of resolved) {
        const next = product.availableQuantity + sign * line.quantity;
        await this.products.updateQuantity(line.productId, next);
        written.push({ productId: line.productId, previous: product.availableQuantity });
        levels[line.productId] = next;
      }

      if (this.journal && options.journalKind) {
        const kind = options.journalKind;
        await this.journal.record(
          resolved.map(({ line }) => ({
            productId: line.productId,
            kind,
            quantityDelta: sign * line.quantity,
            resultingQuantity: levels[line.productId],
            orderId: options.orderId ?? null,
            actor: options.actor ?? SYSTEM_ACTOR,
          }))
        );
      }
    } catch (error) {
      await this.compensate(operation, written);
      return failedResult<StockLevels>(operation, new PersistenceError(operation, error));
    }

    this.logger.debug(() => `${operation} ${formatLevels(levels)}`);
    return successResult<StockLevels>(operation, Object.freeze(levels));
  }

  /**
   * Put back the quantities of lines already written. Still under the batch
   * locks, so nobody observed the partial write.
   */
  private async compensate(
    operation: string,
    written: ReadonlyArray<{ productId: string; previous: number }>
  ): Promise<void> {
    for (const { productId, previous } of [...written].reverse()) {
      try {
        await this.products.updateQuantity(productId, previous);
      } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        this.logger.error(
          `${operation} could not restore '${productId}' to ${previous}: ${detail}`
        );
      }
    }
  }
}

export function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Merge lines naming the same product, summing their quantities. Keeps the
 * order of first appearance.
 */
export function mergeLines(lines: readonly StockLine[]): StockLine[] {
  const totals = new Map<string, number>();
  for (const line of lines) {
    totals.set(line.productId, (totals.get(line.productId) ?? 0) + line.quantity);
  }
  return [...totals].map(([productId, quantity]) => ({ productId, quantity }));
}

function formatLevels(levels: Record<string, number>): string {
  return Object.entries(levels)
    .map(([productId, quantity]) => `${productId}=${quantity}`)
    .join(' ');
}
