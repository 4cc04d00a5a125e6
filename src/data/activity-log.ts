/**
 * Activity Log
 *
 * The single source of truth for engagement data: a primary store with an
 * optional fallback that takes over while the primary is unreachable. Only a
 * `StoreUnavailable` failure switches to the fallback; a store that answers
 * with an error is reported as it is.
 */

import type { AppLogger } from '../monitoring/logger';
import { StoreResult, withStoreErrorHandling } from './error-handler';
import type { ActivityRecord, ActivityStore, StorageBackend } from './types';

export interface AppendResult {
  backend: StorageBackend;
  /** True when the fallback store accepted the write */
  degraded: boolean;
}

export interface ReadResult {
  records: ActivityRecord[];
  backend: StorageBackend;
  degraded: boolean;
}

export class ActivityLog {
  constructor(
    private readonly primary: ActivityStore,
    private readonly fallback: ActivityStore | undefined,
    private readonly logger: AppLogger
  ) {}

  get primaryBackend(): StorageBackend {
    return this.primary.backend;
  }

  get fallbackBackend(): StorageBackend | undefined {
    return this.fallback?.backend;
  }

  async append(record: ActivityRecord): Promise<StoreResult<AppendResult>> {
    return this.withFallback(
      'appendActivity',
      record.sessionId,
      async (store) => {
        await store.put(record);
        return { backend: store.backend, degraded: store !== this.primary };
      }
    );
  }

  async read(sessionId: string): Promise<StoreResult<ReadResult>> {
    return this.withFallback('queryActivities', sessionId, async (store) => ({
      records: await store.query(sessionId),
      backend: store.backend,
      degraded: store !== this.primary,
    }));
  }

  /**
   * Reachability of the primary store. Stores without a probe count as reachable.
   */
  async pingPrimary(): Promise<void> {
    if (this.primary.ping) {
      await this.primary.ping();
    }
  }

  destroy(): void {
    this.primary.destroy?.();
    this.fallback?.destroy?.();
  }

  private async withFallback<T>(
    operationName: string,
    sessionId: string,
    operation: (store: ActivityStore) => Promise<T>
  ): Promise<StoreResult<T>> {
    const fallback = this.fallback;
    const primaryResult = await withStoreErrorHandling(
      () => operation(this.primary),
      {
        operationName,
        sessionId,
        backend: this.primary.backend,
        logLevel: fallback ? 'warn' : 'error',
      },
      this.logger
    );

    if (primaryResult.ok || !fallback || primaryResult.failure.kind !== 'StoreUnavailable') {
      return primaryResult;
    }

    this.logger.warn('Primary activity store unavailable, using fallback', {
      sessionId,
      event: 'activity_store_degraded',
      operation: operationName,
      primary: this.primary.backend,
      fallback: fallback.backend,
    });

    return withStoreErrorHandling(
      () => operation(fallback),
      { operationName, sessionId, backend: fallback.backend },
      this.logger
    );
  }
}
