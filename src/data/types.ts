/**
 * Type definitions for activity records and the stores that hold them
 */

/**
 * Activity tags written by the chat orchestrator. Callers of the activity API
 * may use any other tag.
 */
export const ACTIVITY_TYPES = {
  CHAT_MESSAGE: 'chat_message',
  QUESTION: 'question',
  TECHNICAL_SUPPORT: 'technical_support',
} as const;

export const DEFAULT_SESSION_ID = 'default';

/**
 * One timestamped, immutable fact about a participant action.
 * Partition key `sessionId`, sort key `timestamp`.
 */
export interface ActivityRecord {
  readonly sessionId: string;
  readonly timestamp: string; // ISO 8601
  readonly participant: string;
  readonly activityType: string;
  readonly details: string;
}

/**
 * Attribute layout shared by the DynamoDB table and the log-stream messages
 */
export type ActivityItem = {
  session_id: string;
  timestamp: string;
  participant: string;
  activity: string;
  details: string;
};

export type StorageBackend = 'DynamoDB' | 'CloudWatch Logs' | 'memory';

/**
 * Append-only, time-ordered activity log for one backend.
 */
export interface ActivityStore {
  readonly backend: StorageBackend;

  put(record: ActivityRecord): Promise<void>;

  /**
   * All records of a session in sort-key order
   */
  query(sessionId: string): Promise<ActivityRecord[]>;

  /**
   * Cheap reachability probe for health checks
   */
  ping?(): Promise<void>;

  destroy?(): void;
}

export function toActivityItem(record: ActivityRecord): ActivityItem {
  return {
    session_id: record.sessionId,
    timestamp: record.timestamp,
    participant: record.participant,
    activity: record.activityType,
    details: record.details,
  };
}

/**
 * Read a stored item back into a record. Items without a session or timestamp
 * are not activity records and yield null; a missing participant or activity
 * reads as "unknown".
 */
export function fromActivityItem(item: Record<string, unknown>): ActivityRecord | null {
  const { session_id: sessionId, timestamp, participant, activity, details } = item;

  if (typeof sessionId !== 'string' || typeof timestamp !== 'string') {
    return null;
  }

  return {
    sessionId,
    timestamp,
    participant: typeof participant === 'string' ? participant : 'unknown',
    activityType: typeof activity === 'string' ? activity : 'unknown',
    details: typeof details === 'string' ? details : '',
  };
}
