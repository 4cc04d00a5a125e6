/**
 * Graceful Shutdown Handler
 *
 * On SIGTERM or SIGINT: report unhealthy, stop accepting connections, wait
 * for in-flight requests up to a timeout, then release the AWS clients.
 */

import type { HealthCheck } from '../monitoring/health';
import type { AppLogger } from '../monitoring/logger';

/**
 * Graceful shutdown timeout in milliseconds (30 seconds)
 */
const GRACEFUL_SHUTDOWN_TIMEOUT_MS = 30000;

export interface ShutdownTargets {
  /** http.Server satisfies this */
  server: { close(callback: (error?: Error) => void): unknown };
  healthCheck: Pick<HealthCheck, 'markShuttingDown'>;
  destroy(): void;
}

export class ShutdownHandler {
  private shuttingDown: boolean = false;

  constructor(
    private readonly targets: ShutdownTargets,
    private readonly logger: AppLogger,
    private readonly timeoutMs: number = GRACEFUL_SHUTDOWN_TIMEOUT_MS
  ) {}

  public async shutdown(): Promise<void> {
    if (this.shuttingDown) {
      return;
    }
    const startTime = Date.now();
    this.shuttingDown = true;

    this.logger.info('Starting graceful shutdown', { event: 'shutdown_started' });
    this.targets.healthCheck.markShuttingDown();

    try {
      await this.closeServer();

      const shutdownTime = Date.now() - startTime;
      this.logger.info('Graceful shutdown completed', {
        event: 'shutdown_completed',
        shutdownTime,
        withinTimeout: shutdownTime <= this.timeoutMs,
      });
    } finally {
      this.targets.destroy();
    }
  }

  private closeServer(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.logger.warn('Graceful shutdown timeout reached', {
          event: 'shutdown_timeout',
          timeoutMs: this.timeoutMs,
        });
        resolve();
      }, this.timeoutMs);
      timer.unref();

      this.targets.server.close((error?: Error) => {
        clearTimeout(timer);
        if (error) {
          reject(error);
          return;
        }
        this.logger.info('HTTP server closed', { event: 'http_server_closed' });
        resolve();
      });
    });
  }
}
