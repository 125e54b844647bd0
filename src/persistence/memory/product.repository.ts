import { createProduct, withQuantity } from '../../domain/product.js';
import type { ProductInput } from '../../domain/schemas.js';
import type { Product } from '../../domain/types.js';
import type { ProductRepository } from '../../ports/product.repository.js';

/**
 * In-memory implementation of ProductRepository.
 * `addProduct`/`removeProduct` stand in for external catalog management.
 */
export class InMemoryProductRepository implements ProductRepository {
  private products: Map<string, Product> = new Map();

  constructor(seed: readonly ProductInput[] = []) {
    for (const input of seed) {
      this.addProduct(input);
    }
  }

  async getProduct(id: string): Promise<Product | null> {
    return this.products.get(id) ?? null;
  }

  async listProducts(): Promise<Product[]> {
    return [...this.products.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  async updateQuantity(id: string, availableQuantity: number): Promise<void> {
    const product = this.products.get(id);
    if (!product) {
      throw new Error(`Cannot update quantity of unknown product '${id}'`);
    }
    this.products.set(id, withQuantity(product, availableQuantity));
  }

  addProduct(input: ProductInput): Product {
    const product = createProduct(input);
    this.products.set(product.id, product);
    return product;
  }

  removeProduct(id: string): boolean {
    return this.products.delete(id);
  }

  clear(): void {
    this.products.clear();
  }
}
