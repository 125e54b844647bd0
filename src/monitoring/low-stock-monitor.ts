/**
 * LowStockMonitor - products at or below their reorder threshold
 */

import type { Product } from '../domain/types.js';
import type { ProductRepository } from '../ports/product.repository.js';

export function isLowStock(product: Product): boolean {
  return product.availableQuantity <= product.lowStockThreshold;
}

/**
 * Pure filter over a snapshot, keeping the input order.
 */
export function findLowStock(products: Iterable<Product>): Product[] {
  const low: Product[] = [];
  for (const product of products) {
    if (isLowStock(product)) {
      low.push(product);
    }
  }
  return low;
}

/**
 * Reads the catalog on every scan; nothing is cached between calls.
 */
export class LowStockMonitor {
  constructor(private readonly products: ProductRepository) {}

  async scan(): Promise<Product[]> {
    return findLowStock(await this.products.listProducts());
  }

  async isLow(productId: string): Promise<boolean | null> {
    const product = await this.products.getProduct(productId);
    return product ? isLowStock(product) : null;
  }
}
