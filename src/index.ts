/**
 * stockline - Order and inventory consistency engine
 *
 * @example
 * ```typescript
 * import {
 *   CommerceEngine,
 *   InMemoryOrderRepository,
 *   InMemoryProductRepository,
 * } from 'stockline';
 *
 * const engine = new CommerceEngine({
 *   products: new InMemoryProductRepository([
 *     { id: 'WIDGET', name: 'Widget', price: 2.5, availableQuantity: 5, lowStockThreshold: 2 },
 *   ]),
 *   orders: new InMemoryOrderRepository(),
 * });
 *
 * const ctx = { actor: 'alice', role: 'customer' } as const;
 * const result = await engine.placeOrder(ctx, 'alice', { WIDGET: 4 });
 *
 * result.on('failed', (r) => {
 *   if (r.failed) console.warn(r.code, r.reason);
 * });
 * ```
 */

// Engine
export {
  CommerceEngine,
  createEngine,
  type CommerceEngineOptions,
} from './engine.js';

// Result
export {
  SuccessResult,
  FailedResult,
  successResult,
  failedResult,
  type Result,
  type Status,
  type HandlerType,
  type ResultHandler,
  type ResultMetadata,
  type ResultJSON,
} from './result.js';

// Errors
export {
  CommerceError,
  NotFoundError,
  InvalidCartError,
  InsufficientStockError,
  IllegalTransitionError,
  InvalidQuantityError,
  PersistenceError,
  ErrorCollection,
  isCommerceError,
  type ErrorCode,
  type EntityKind,
} from './errors.js';

// Domain
export {
  ORDER_STATUSES,
  isOrderStatus,
  matchesOrderFilter,
  type Product,
  type Order,
  type OrderItem,
  type OrderStatus,
  type OrderFilter,
  type InventoryTransaction,
  type InventoryTransactionKind,
  type JournalFilter,
  type StockLine,
  type UserRole,
  type RequestContext,
} from './domain/types.js';
export { createProduct, withQuantity } from './domain/product.js';
export { createOrder, buildOrderItems, withStatus, orderLines } from './domain/order.js';
export { ProductInputSchema, CartLineSchema, CartLinesSchema, type ProductInput, type CartLine } from './domain/schemas.js';
export { roundAmount, multiplyAmount, sumAmounts } from './domain/money.js';

// Components
export {
  StockLedger,
  SYSTEM_ACTOR,
  mergeLines,
  type StockLevels,
  type MovementOptions,
  type StockLedgerOptions,
} from './ledger/stock-ledger.js';
export { InventoryJournal, type JournalEntryInput } from './ledger/inventory-journal.js';
export {
  OrderLifecycle,
  type OrderLifecycleOptions,
  type TransitionOptions,
} from './lifecycle/order-lifecycle.js';
export {
  ORDER_TRANSITIONS,
  canTransition,
  allowedTransitions,
  isTerminal,
  holdsReservation,
  countsAsRevenue,
} from './lifecycle/order-status.js';
export { CancellationCoordinator, type ReleaseOptions } from './cancellation/cancellation-coordinator.js';
export {
  CheckoutCoordinator,
  type CheckoutCoordinatorOptions,
  type PlaceOrderOptions,
} from './checkout/checkout-coordinator.js';
export { Cart, parseCart, type CartInput } from './checkout/cart.js';
export { LowStockMonitor, isLowStock, findLowStock } from './monitoring/low-stock-monitor.js';
export {
  MetricsAggregator,
  aggregateMetrics,
  type MetricsOptions,
  type OrderMetrics,
  type ProductRevenue,
} from './metrics/metrics-aggregator.js';

// Ports and adapters
export type { ProductRepository, OrderRepository, JournalRepository } from './ports/index.js';
export {
  InMemoryProductRepository,
  InMemoryOrderRepository,
  InMemoryJournalRepository,
} from './persistence/memory/index.js';

// Concurrency
export { KeyedLock, LockHandle, productKey, orderKey, type LockMode } from './utils/lock.js';

// Configuration
export {
  Stockline,
  configure,
  getConfiguration,
  resetConfiguration,
  MiddlewareRegistry,
  DEFAULT_LOW_STOCK_THRESHOLD,
  DEFAULT_TOP_PRODUCTS_LIMIT,
  type StocklineConfiguration,
} from './config.js';

// Middleware
export {
  RuntimeMiddleware,
  CorrelateMiddleware,
  applyMiddlewares,
  type Operation,
  type OperationMiddleware,
} from './middleware/index.js';

// Logging
export {
  Logger,
  logger,
  createLogger,
  LineFormatter,
  JsonFormatter,
  KeyValueFormatter,
  type LogLevel,
  type LogEntry,
  type LoggerOptions,
  type LogFormatter,
} from './logging/index.js';

// Utilities
export { generateUUID, generateTimeOrderedUUID, generateId } from './utils/uuid.js';

// Default export
export { default } from './config.js';
