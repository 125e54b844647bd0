import type { Product } from '../domain/types.js';

/**
 * Catalog port
 *
 * Catalog management owns product metadata. The engine reads through this
 * port and writes nothing but `availableQuantity`.
 */
export interface ProductRepository {
  getProduct(id: string): Promise<Product | null>;
  listProducts(): Promise<Product[]>;
  updateQuantity(id: string, availableQuantity: number): Promise<void>;
}
