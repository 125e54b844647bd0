/**
 * stockline Global Configuration
 */

import type { LogLevel } from './logging/logger.js';
import type { LogFormatter } from './logging/formatters/types.js';
import type { OperationMiddleware } from './middleware/types.js';
import type { LockMode } from './utils/lock.js';

/**
 * Global configuration options
 */
export interface StocklineConfiguration {
  /** Threshold given to products the catalog supplies without one */
  defaultLowStockThreshold: number;

  /** Lock granularity around stock read-modify-write */
  lockMode: LockMode;

  /** Number of entries in `topProducts` of the sales metrics */
  topProductsLimit: number;

  // Logging
  logger?: {
    output?: NodeJS.WritableStream;
    formatter?: LogFormatter;
    progname?: string;
    level?: LogLevel;
    enabled?: boolean;
  };

  // Registries
  middlewares: MiddlewareRegistry;
}

/**
 * Middleware registry. Middlewares wrap every engine operation in
 * registration order; the first registered is the outermost.
 */
export class MiddlewareRegistry {
  private _middlewares: OperationMiddleware[] = [];

  get registry(): readonly OperationMiddleware[] {
    return this._middlewares;
  }

  register(middleware: OperationMiddleware): void {
    this._middlewares.push(middleware);
  }

  deregister(middleware: OperationMiddleware): boolean {
    const index = this._middlewares.indexOf(middleware);
    if (index !== -1) {
      this._middlewares.splice(index, 1);
      return true;
    }
    return false;
  }

  clear(): void {
    this._middlewares = [];
  }
}

export const DEFAULT_LOW_STOCK_THRESHOLD = 10;
export const DEFAULT_TOP_PRODUCTS_LIMIT = 5;

/**
 * Default configuration
 */
function createDefaultConfiguration(): StocklineConfiguration {
  return {
    defaultLowStockThreshold: DEFAULT_LOW_STOCK_THRESHOLD,
    lockMode: 'per-product',
    topProductsLimit: DEFAULT_TOP_PRODUCTS_LIMIT,
    middlewares: new MiddlewareRegistry(),
  };
}

/**
 * Global configuration instance
 */
let configuration: StocklineConfiguration = createDefaultConfiguration();

/**
 * Get the current configuration
 */
export function getConfiguration(): StocklineConfiguration {
  return configuration;
}

/**
 * Configure stockline globally
 */
export function configure(fn: (config: StocklineConfiguration) => void): void {
  fn(configuration);
}

/**
 * Reset configuration to defaults
 */
export function resetConfiguration(): void {
  configuration = createDefaultConfiguration();
}

/**
 * Stockline namespace for global operations
 */
export const Stockline = {
  get configuration(): StocklineConfiguration {
    return configuration;
  },

  configure,

  resetConfiguration,
};

export default Stockline;
