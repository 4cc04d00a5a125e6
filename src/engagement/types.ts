/**
 * Derived engagement structures. None of these are persisted; each request
 * recomputes them from the activity log.
 */

import type { StoreFailure } from '../errors/classify';
import type { ActivityRecord, StorageBackend } from '../data/types';

/**
 * Always "active": there is no heartbeat or timeout model for participants.
 */
export type ParticipantStatus = 'active';

export interface ParticipantSummary {
  name: string;
  status: ParticipantStatus;
  joinTime: string;
  lastActivity: string;
  activityCount: number;
}

export interface ParticipantListing {
  sessionId: string;
  totalParticipants: number;
  participants: ParticipantSummary[];
  activeCount: number;
  timestamp: string;
  storage?: StorageBackend;
  error?: string;
}

export interface ParticipantActivityCount {
  name: string;
  activityCount: number;
}

export interface EngagementReport {
  sessionId: string;
  totalActivities: number;
  uniqueParticipants: number;
  /** min(100, totalActivities * 2 + uniqueParticipants * 10) */
  engagementScore: number;
  activityBreakdown: Record<string, number>;
  /** At most five, most active first, ties in first-seen order */
  topParticipants: ParticipantActivityCount[];
  recommendations: string[];
  timestamp: string;
  storage?: StorageBackend;
  error?: string;
}

interface TrackOutcomeBase {
  participant: string;
  activityType: string;
  sessionId: string;
}

export interface TrackSuccess extends TrackOutcomeBase {
  tracked: true;
  record: ActivityRecord;
  storage: StorageBackend;
  degraded: boolean;
}

export interface TrackFailure extends TrackOutcomeBase {
  tracked: false;
  error: string;
  failure: StoreFailure;
}

export type TrackOutcome = TrackSuccess | TrackFailure;

export type Clock = () => Date;
