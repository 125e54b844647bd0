/**
 * Runtime Middleware - Track operation execution time
 */

import { performance } from 'node:perf_hooks';
import type { Result } from '../result.js';
import type { Operation } from './types.js';

/**
 * Middleware that records the operation's execution time in milliseconds,
 * measured on a monotonic clock, as `metadata.runtime`.
 *
 * @example
 * ```typescript
 * configure((config) => {
 *   config.middlewares.register(RuntimeMiddleware);
 * });
 * ```
 */
export async function RuntimeMiddleware<T>(
  _operation: Operation,
  next: () => Promise<Result<T>>
): Promise<Result<T>> {
  const startTime = performance.now();
  const result = await next();
  const runtime = Math.round(performance.now() - startTime);

  return result.withMetadata({ runtime });
}
