/**
 * stockline Middleware
 *
 * Built-in middleware for common cross-cutting concerns.
 */

export { CorrelateMiddleware } from './correlate.js';
export { RuntimeMiddleware } from './runtime.js';
export { applyMiddlewares, type Operation, type OperationMiddleware } from './types.js';
