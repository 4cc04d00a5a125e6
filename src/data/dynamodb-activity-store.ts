/**
 * Activity store on a DynamoDB table keyed by (session_id HASH, timestamp RANGE).
 */

import type { DynamoDBClientWrapper } from './dynamodb';
import {
  ActivityRecord,
  ActivityStore,
  StorageBackend,
  fromActivityItem,
  toActivityItem,
} from './types';

export type ActivityTableClient = Pick<
  DynamoDBClientWrapper,
  'putItem' | 'query' | 'describeTable' | 'destroy'
>;

export class DynamoDBActivityStore implements ActivityStore {
  readonly backend: StorageBackend = 'DynamoDB';

  constructor(
    private readonly client: ActivityTableClient,
    private readonly tableName: string
  ) {}

  async put(record: ActivityRecord): Promise<void> {
    await this.client.putItem(this.tableName, toActivityItem(record));
  }

  async query(sessionId: string): Promise<ActivityRecord[]> {
    const items = await this.client.query(
      this.tableName,
      '#sid = :sid',
      { ':sid': sessionId },
      { '#sid': 'session_id' }
    );

    const records: ActivityRecord[] = [];
    for (const item of items) {
      const record = fromActivityItem(item);
      if (record) {
        records.push(record);
      }
    }
    return records;
  }

  async ping(): Promise<void> {
    await this.client.describeTable(this.tableName);
  }

  destroy(): void {
    this.client.destroy();
  }
}
