import {
  CloudWatchClient,
  PutMetricDataCommand,
  MetricDatum,
  StandardUnit,
} from '@aws-sdk/client-cloudwatch';
import type { AppLogger } from './logger';

export interface MetricData {
  metricName: string;
  value: number;
  unit: StandardUnit;
  dimensions?: Record<string, string>;
  timestamp?: Date;
}

export type CloudWatchSender = Pick<CloudWatchClient, 'send' | 'destroy'>;

export interface MetricsEmitterConfig {
  region: string;
  namespace?: string;
  enabled?: boolean;
}

/**
 * The metrics the engagement and chat components emit.
 */
export type MetricsSink = Pick<
  MetricsEmitter,
  'emitActivityTracked' | 'emitModelLatency' | 'emitError'
>;

export class MetricsEmitter {
  private cloudWatchClient: CloudWatchSender;
  private namespace: string;
  private enabled: boolean;
  private logger: AppLogger;

  constructor(config: MetricsEmitterConfig, logger: AppLogger, client?: CloudWatchSender) {
    this.cloudWatchClient = client ?? new CloudWatchClient({ region: config.region });
    this.namespace = config.namespace ?? 'WorkshopAssistant/Backend';
    this.enabled = config.enabled ?? true;
    this.logger = logger;
  }

  /**
   * Emit a single metric to CloudWatch. Failures are logged, never thrown.
   */
  async emitMetric(metric: MetricData): Promise<void> {
    if (!this.enabled) {
      this.logger.debug('Metrics disabled, skipping metric emission', {
        metricName: metric.metricName,
      });
      return;
    }

    try {
      const metricDatum: MetricDatum = {
        MetricName: metric.metricName,
        Value: metric.value,
        Unit: metric.unit,
        Timestamp: metric.timestamp ?? new Date(),
      };

      if (metric.dimensions) {
        metricDatum.Dimensions = Object.entries(metric.dimensions).map(([name, value]) => ({
          Name: name,
          Value: value,
        }));
      }

      await this.cloudWatchClient.send(
        new PutMetricDataCommand({
          Namespace: this.namespace,
          MetricData: [metricDatum],
        })
      );

      this.logger.debug('Metric emitted successfully', {
        event: 'metric_emitted',
        metricName: metric.metricName,
        value: metric.value,
        unit: metric.unit,
      });
    } catch (error) {
      this.logger.error(
        'Failed to emit metric',
        { event: 'metric_emission_failed', metricName: metric.metricName },
        error instanceof Error ? error : new Error(String(error))
      );
    }
  }

  /**
   * Emit one tracked activity, dimensioned by the store that accepted it
   */
  async emitActivityTracked(storage: string): Promise<void> {
    await this.emitMetric({
      metricName: 'ActivityTracked',
      value: 1,
      unit: StandardUnit.Count,
      dimensions: { Storage: storage },
    });
  }

  async emitModelLatency(latencyMs: number, modelId?: string): Promise<void> {
    await this.emitMetric({
      metricName: 'ModelLatency',
      value: latencyMs,
      unit: StandardUnit.Milliseconds,
      dimensions: modelId ? { ModelId: modelId } : undefined,
    });
  }

  async emitError(errorCode?: string): Promise<void> {
    await this.emitMetric({
      metricName: 'Errors',
      value: 1,
      unit: StandardUnit.Count,
      dimensions: errorCode ? { ErrorCode: errorCode } : undefined,
    });
  }

  destroy(): void {
    this.cloudWatchClient.destroy();
  }
}
