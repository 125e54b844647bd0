import { getConfiguration } from '../config.js';
import { roundAmount } from './money.js';
import { ProductInputSchema, type ProductInput } from './schemas.js';
import type { Product } from './types.js';

/**
 * Build a frozen product record from catalog input. Missing thresholds take
 * the configured default. Throws a ZodError on malformed input.
 */
export function createProduct(
  input: ProductInput,
  defaultLowStockThreshold: number = getConfiguration().defaultLowStockThreshold
): Product {
  const parsed = ProductInputSchema.parse(input);

  return Object.freeze({
    ...parsed,
    price: roundAmount(parsed.price),
    lowStockThreshold: parsed.lowStockThreshold ?? defaultLowStockThreshold,
  });
}

export function withQuantity(product: Product, availableQuantity: number): Product {
  return Object.freeze({ ...product, availableQuantity });
}
