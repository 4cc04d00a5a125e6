/**
 * Workshop Stats
 *
 * A point-in-time snapshot of one session for the facilitator dashboard,
 * combining the participant listing and the engagement report.
 */

import { ACTIVITY_TYPES, StorageBackend } from '../data/types';
import type { AnalyticsAggregator } from './analytics';
import { compareTimestamps } from './ordering';
import type { ParticipantReconstructor } from './participants';
import type { Clock } from './types';

export interface WorkshopStats {
  sessionInfo: {
    sessionId: string;
    startTime: string;
    currentTime: string;
    durationMinutes: number;
    status: 'active';
  };
  participation: {
    currentlyJoined: number;
    totalParticipants: number;
    /** Everyone seen so far; there is no attendance timeline */
    peakAttendance: number;
  };
  engagement: {
    totalActivities: number;
    questionsAsked: number;
    chatMessages: number;
    engagementScore: number;
  };
  storage: {
    backend: StorageBackend | 'unavailable';
    dataCollection: 'active';
  };
  errors?: string[];
}

export class WorkshopStatsService {
  constructor(
    private readonly reconstructor: ParticipantReconstructor,
    private readonly aggregator: AnalyticsAggregator,
    private readonly clock: Clock = () => new Date()
  ) {}

  async getWorkshopStats(sessionId: string): Promise<WorkshopStats> {
    const listing = await this.reconstructor.listParticipants(sessionId);
    const report = await this.aggregator.analyze(sessionId);
    const now = this.clock();

    const joinTimes = listing.participants
      .map((p) => p.joinTime)
      .sort(compareTimestamps);
    const earliestJoin = joinTimes[0];

    let durationMinutes = 0;
    if (earliestJoin !== undefined) {
      const startedAt = Date.parse(earliestJoin);
      if (!Number.isNaN(startedAt)) {
        durationMinutes = Math.max(0, Math.floor((now.getTime() - startedAt) / 60000));
      }
    }

    const errors = [listing.error, report.error].filter(
      (error): error is string => error !== undefined
    );

    const stats: WorkshopStats = {
      sessionInfo: {
        sessionId,
        startTime: earliestJoin ?? now.toISOString(),
        currentTime: now.toISOString(),
        durationMinutes,
        status: 'active',
      },
      participation: {
        currentlyJoined: listing.activeCount,
        totalParticipants: listing.totalParticipants,
        peakAttendance: listing.totalParticipants,
      },
      engagement: {
        totalActivities: report.totalActivities,
        questionsAsked: report.activityBreakdown[ACTIVITY_TYPES.QUESTION] ?? 0,
        chatMessages: report.activityBreakdown[ACTIVITY_TYPES.CHAT_MESSAGE] ?? 0,
        engagementScore: report.engagementScore,
      },
      storage: {
        backend: report.storage ?? listing.storage ?? 'unavailable',
        dataCollection: 'active',
      },
    };

    if (errors.length > 0) {
      stats.errors = errors;
    }

    return stats;
  }
}
