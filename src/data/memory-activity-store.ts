/**
 * In-memory activity store
 *
 * Suitable for local runs and tests: records live as long as the process.
 */

import { ActivityRecord, ActivityStore, StorageBackend } from './types';

export class InMemoryActivityStore implements ActivityStore {
  readonly backend: StorageBackend = 'memory';

  private sessions: Map<string, ActivityRecord[]> = new Map();

  async put(record: ActivityRecord): Promise<void> {
    const records = this.sessions.get(record.sessionId) ?? [];
    records.push({ ...record });
    this.sessions.set(record.sessionId, records);
  }

  async query(sessionId: string): Promise<ActivityRecord[]> {
    return (this.sessions.get(sessionId) ?? []).map((record) => ({ ...record }));
  }

  async ping(): Promise<void> {
    // Always reachable
  }
}
