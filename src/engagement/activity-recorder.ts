/**
 * Activity Recorder
 *
 * Appends one activity record per call. Failures come back as a
 * `TrackFailure`; nothing is thrown to the caller. There is no idempotency
 * key, so a caller that retries a successful call records the activity twice.
 */

import type { ActivityLog } from '../data/activity-log';
import { ActivityRecord, DEFAULT_SESSION_ID } from '../data/types';
import { classifyFailure, describeFailure } from '../errors/classify';
import type { AppLogger } from '../monitoring/logger';
import type { MetricsSink } from '../monitoring/metrics';
import type { Clock, TrackOutcome } from './types';

export class ActivityRecorder {
  private lastTimestampMs = 0;

  constructor(
    private readonly activityLog: ActivityLog,
    private readonly logger: AppLogger,
    private readonly metrics?: MetricsSink,
    private readonly clock: Clock = () => new Date()
  ) {}

  async track(
    participant: string,
    activityType: string,
    details: string = '',
    sessionId: string = DEFAULT_SESSION_ID
  ): Promise<TrackOutcome> {
    const base = { participant, activityType, sessionId };

    try {
      const record: ActivityRecord = {
        sessionId,
        timestamp: this.nextTimestamp(),
        participant,
        activityType,
        details,
      };

      const result = await this.activityLog.append(record);
      if (!result.ok) {
        return {
          ...base,
          tracked: false,
          failure: result.failure,
          error: `Failed to track activity: ${describeFailure(result.failure)}`,
        };
      }

      this.logger.info('Activity tracked', {
        sessionId,
        event: 'activity_tracked',
        participant,
        activityType,
        storage: result.value.backend,
        degraded: result.value.degraded,
      });

      await this.metrics?.emitActivityTracked(result.value.backend);

      return {
        ...base,
        tracked: true,
        record,
        storage: result.value.backend,
        degraded: result.value.degraded,
      };
    } catch (error) {
      const failure = classifyFailure(error);
      this.logger.error('Activity tracking failed', {
        sessionId,
        event: 'activity_tracking_failed',
        participant,
        activityType,
        error: failure.message,
      });
      return {
        ...base,
        tracked: false,
        failure,
        error: `Failed to track activity: ${describeFailure(failure)}`,
      };
    }
  }

  /**
   * Timestamps from one recorder strictly increase, so two records of the same
   * session never share a sort key.
   */
  private nextTimestamp(): string {
    const now = this.clock().getTime();
    this.lastTimestampMs = now > this.lastTimestampMs ? now : this.lastTimestampMs + 1;
    return new Date(this.lastTimestampMs).toISOString();
  }
}
