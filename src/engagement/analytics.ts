/**
 * Analytics Aggregator
 *
 * Computes the engagement report of a session from its raw activity. Reads
 * the log on its own rather than sharing the reconstructor's read.
 */

import type { ActivityLog } from '../data/activity-log';
import { ACTIVITY_TYPES, ActivityRecord } from '../data/types';
import { describeFailure } from '../errors/classify';
import type { AppLogger } from '../monitoring/logger';
import { sortChronologically } from './ordering';
import { generateRecommendations } from './recommendations';
import type { Clock, EngagementReport, ParticipantActivityCount } from './types';

export const TOP_PARTICIPANT_LIMIT = 5;
export const MAX_ENGAGEMENT_SCORE = 100;

export function calculateEngagementScore(
  totalActivities: number,
  uniqueParticipants: number
): number {
  return Math.min(MAX_ENGAGEMENT_SCORE, totalActivities * 2 + uniqueParticipants * 10);
}

export function rankParticipants(
  perParticipant: ReadonlyMap<string, number>,
  limit: number = TOP_PARTICIPANT_LIMIT
): ParticipantActivityCount[] {
  // Map iteration follows first-seen order and Array.prototype.sort is stable
  return Array.from(perParticipant, ([name, activityCount]) => ({ name, activityCount }))
    .sort((a, b) => b.activityCount - a.activityCount)
    .slice(0, limit);
}

type ReportCounts = Omit<EngagementReport, 'sessionId' | 'timestamp' | 'storage' | 'error'>;

export function computeEngagementReport(records: readonly ActivityRecord[]): ReportCounts {
  const activityTypes = new Map<string, number>();
  const participantActivity = new Map<string, number>();

  for (const record of sortChronologically(records)) {
    activityTypes.set(record.activityType, (activityTypes.get(record.activityType) ?? 0) + 1);
    participantActivity.set(
      record.participant,
      (participantActivity.get(record.participant) ?? 0) + 1
    );
  }

  const totalActivities = records.length;
  const uniqueParticipants = participantActivity.size;
  const engagementScore = calculateEngagementScore(totalActivities, uniqueParticipants);

  return {
    totalActivities,
    uniqueParticipants,
    engagementScore,
    activityBreakdown: Object.fromEntries(activityTypes),
    topParticipants: rankParticipants(participantActivity),
    recommendations: generateRecommendations({
      engagementScore,
      questionCount: activityTypes.get(ACTIVITY_TYPES.QUESTION) ?? 0,
      chatCount: activityTypes.get(ACTIVITY_TYPES.CHAT_MESSAGE) ?? 0,
    }),
  };
}

export class AnalyticsAggregator {
  constructor(
    private readonly activityLog: ActivityLog,
    private readonly logger: AppLogger,
    private readonly clock: Clock = () => new Date()
  ) {}

  async analyze(sessionId: string): Promise<EngagementReport> {
    const timestamp = this.clock().toISOString();
    const result = await this.activityLog.read(sessionId);

    if (!result.ok) {
      return {
        sessionId,
        totalActivities: 0,
        uniqueParticipants: 0,
        engagementScore: 0,
        activityBreakdown: {},
        topParticipants: [],
        recommendations: [],
        timestamp,
        error: `Analytics generation failed: ${describeFailure(result.failure)}`,
      };
    }

    const report = computeEngagementReport(result.value.records);

    this.logger.info('Engagement analytics computed', {
      sessionId,
      event: 'engagement_analyzed',
      totalActivities: report.totalActivities,
      uniqueParticipants: report.uniqueParticipants,
      engagementScore: report.engagementScore,
      storage: result.value.backend,
    });

    return {
      sessionId,
      ...report,
      timestamp,
      storage: result.value.backend,
    };
  }
}
