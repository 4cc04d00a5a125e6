/**
 * Participant Reconstructor
 *
 * Replays a session's activity records into one summary per participant
 * name. Names are taken as written; "Alice" and "alice" are two participants.
 */

import type { ActivityLog } from '../data/activity-log';
import type { ActivityRecord } from '../data/types';
import { describeFailure } from '../errors/classify';
import type { AppLogger } from '../monitoring/logger';
import { sortChronologically } from './ordering';
import type { Clock, ParticipantListing, ParticipantSummary } from './types';

/**
 * Fold records into summaries. The result lists participants in the order
 * they first appeared.
 */
export function reconstructParticipants(records: readonly ActivityRecord[]): ParticipantSummary[] {
  const participants = new Map<string, ParticipantSummary>();

  for (const record of sortChronologically(records)) {
    const existing = participants.get(record.participant);
    if (existing) {
      existing.activityCount += 1;
      existing.lastActivity = record.timestamp;
    } else {
      participants.set(record.participant, {
        name: record.participant,
        status: 'active',
        joinTime: record.timestamp,
        lastActivity: record.timestamp,
        activityCount: 1,
      });
    }
  }

  return Array.from(participants.values());
}

export class ParticipantReconstructor {
  constructor(
    private readonly activityLog: ActivityLog,
    private readonly logger: AppLogger,
    private readonly clock: Clock = () => new Date()
  ) {}

  async listParticipants(sessionId: string): Promise<ParticipantListing> {
    const timestamp = this.clock().toISOString();
    const result = await this.activityLog.read(sessionId);

    if (!result.ok) {
      return {
        sessionId,
        totalParticipants: 0,
        participants: [],
        activeCount: 0,
        timestamp,
        error: `Failed to get participants: ${describeFailure(result.failure)}`,
      };
    }

    const participants = reconstructParticipants(result.value.records);
    const activeCount = participants.filter((p) => p.status === 'active').length;

    this.logger.debug('Participants reconstructed', {
      sessionId,
      event: 'participants_listed',
      records: result.value.records.length,
      participants: participants.length,
      storage: result.value.backend,
    });

    return {
      sessionId,
      totalParticipants: participants.length,
      participants,
      activeCount,
      timestamp,
      storage: result.value.backend,
    };
  }
}
