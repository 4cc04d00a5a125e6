import { Request, Response } from 'express';
import type { AppLogger } from './logger';

export interface InferenceStatus {
  connected: boolean;
  status: string;
}

export interface HealthCheckResult {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  checks: {
    [key: string]: {
      status: 'pass' | 'fail';
      critical: boolean;
      message?: string;
    };
  };
  inference?: InferenceStatus;
}

export interface HealthCheckOptions {
  /** Only critical checks turn the service unhealthy. Defaults to true. */
  critical?: boolean;
}

interface RegisteredCheck {
  run: () => Promise<boolean>;
  critical: boolean;
}

export class HealthCheck {
  private isShuttingDown: boolean = false;
  private healthChecks: Map<string, RegisteredCheck> = new Map();
  private inferenceProbe?: () => Promise<InferenceStatus>;
  private logger: AppLogger;

  constructor(logger: AppLogger) {
    this.logger = logger;
    this.registerCheck('server', async () => true);
  }

  registerCheck(name: string, checkFn: () => Promise<boolean>, options: HealthCheckOptions = {}): void {
    this.healthChecks.set(name, { run: checkFn, critical: options.critical ?? true });
    this.logger.debug(`Health check registered: ${name}`);
  }

  /**
   * Report model connectivity alongside the checks. The probe never decides
   * the overall status.
   */
  setInferenceProbe(probe: () => Promise<InferenceStatus>): void {
    this.inferenceProbe = probe;
  }

  markShuttingDown(): void {
    this.isShuttingDown = true;
    this.logger.info('Service marked as shutting down');
  }

  isServiceShuttingDown(): boolean {
    return this.isShuttingDown;
  }

  async performHealthChecks(): Promise<HealthCheckResult> {
    const result: HealthCheckResult = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      checks: {},
    };

    if (this.isShuttingDown) {
      result.status = 'unhealthy';
      result.checks.shutdown = {
        status: 'fail',
        critical: true,
        message: 'Service is shutting down',
      };
      return result;
    }

    for (const [name, check] of this.healthChecks.entries()) {
      try {
        const passed = await check.run();
        result.checks[name] = { status: passed ? 'pass' : 'fail', critical: check.critical };

        if (!passed && check.critical) {
          result.status = 'unhealthy';
        }
      } catch (error) {
        result.checks[name] = {
          status: 'fail',
          critical: check.critical,
          message: error instanceof Error ? error.message : 'Unknown error',
        };
        if (check.critical) {
          result.status = 'unhealthy';
        }

        this.logger.error(
          `Health check failed: ${name}`,
          { event: 'health_check_failed', checkName: name },
          error instanceof Error ? error : new Error(String(error))
        );
      }
    }

    if (this.inferenceProbe) {
      result.inference = await this.inferenceProbe();
    }

    return result;
  }

  /**
   * Express handler for the health check endpoint
   */
  async handleHealthCheck(_req: Request, res: Response): Promise<void> {
    const result = await this.performHealthChecks();

    const statusCode = result.status === 'healthy' ? 200 : 503;

    res.status(statusCode).json(result);

    this.logger.debug('Health check performed', {
      event: 'health_check',
      status: result.status,
      statusCode,
    });
  }
}

export default HealthCheck;
