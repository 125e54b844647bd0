/**
 * Correlate Middleware - Add correlation IDs for tracing
 */

import { generateTimeOrderedUUID } from '../utils/uuid.js';
import type { Result } from '../result.js';
import type { Operation } from './types.js';

/**
 * Middleware that stamps `metadata.correlationId` on the result. The id comes
 * from the request context when the caller supplied one, otherwise a
 * time-ordered UUID is generated.
 */
export async function CorrelateMiddleware<T>(
  operation: Operation,
  next: () => Promise<Result<T>>
): Promise<Result<T>> {
  const correlationId = operation.context.correlationId ?? generateTimeOrderedUUID();
  const result = await next();

  return result.withMetadata({ correlationId });
}
