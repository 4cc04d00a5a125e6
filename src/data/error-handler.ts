/**
 * Store Error Handler
 *
 * Wraps activity store operations so that failures come back as values.
 * The engagement components never let a store exception cross their
 * boundary; they log here and report the failure in their own result.
 *
 * ```typescript
 * const result = await withStoreErrorHandling(
 *   () => store.query(sessionId),
 *   { operationName: 'queryActivities', sessionId, backend: store.backend },
 *   logger
 * );
 * if (!result.ok) {
 *   return emptyListing(describeFailure(result.failure));
 * }
 * ```
 */

import type { AppLogger } from '../monitoring/logger';
import { classifyFailure, StoreFailure } from '../errors/classify';
import type { StorageBackend } from './types';

export type StoreResult<T> =
  | { ok: true; value: T }
  | { ok: false; failure: StoreFailure };

/**
 * Options for store operation wrapper
 */
export interface StoreOperationOptions {
  operationName: string;
  sessionId?: string;
  backend?: StorageBackend;
  /** Expected failures (a primary outage with a fallback) log at warn */
  logLevel?: 'error' | 'warn';
}

export async function withStoreErrorHandling<T>(
  operation: () => Promise<T>,
  options: StoreOperationOptions,
  logger: AppLogger
): Promise<StoreResult<T>> {
  const { operationName, sessionId, backend, logLevel = 'error' } = options;

  try {
    return { ok: true, value: await operation() };
  } catch (error) {
    const failure = classifyFailure(error);

    const logContext = {
      sessionId,
      event: 'store_operation_failed',
      operation: operationName,
      backend,
      failureKind: failure.kind,
      errorCode: failure.code,
      error: failure.message,
    };

    if (logLevel === 'error') {
      logger.error(`Store operation failed: ${operationName}`, logContext);
    } else {
      logger.warn(`Store operation failed: ${operationName}`, logContext);
    }

    return { ok: false, failure };
  }
}
