/**
 * Middleware types
 */

import type { RequestContext } from '../domain/types.js';
import type { Result } from '../result.js';

/**
 * Descriptor of the engine operation being run
 */
export interface Operation {
  readonly name: string;
  readonly context: RequestContext;
}

/**
 * Wraps an engine operation. Must return `next()`'s result or a copy of it
 * (results are immutable, use `withMetadata`).
 */
export type OperationMiddleware = <T>(
  operation: Operation,
  next: () => Promise<Result<T>>
) => Promise<Result<T>>;

/**
 * Compose middlewares around `run`, the first one outermost.
 */
export function applyMiddlewares<T>(
  middlewares: readonly OperationMiddleware[],
  operation: Operation,
  run: () => Promise<Result<T>>
): Promise<Result<T>> {
  const dispatch = (index: number): Promise<Result<T>> => {
    const middleware = middlewares[index];
    if (!middleware) {
      return run();
    }
    return middleware(operation, () => dispatch(index + 1));
  };

  return dispatch(0);
}
