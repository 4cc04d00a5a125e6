/**
 * Fallback activity store on CloudWatch Logs.
 *
 * One log group for the workshop, one log stream per session. Each event's
 * message is the JSON activity item, so a stream read back from the head is
 * the session's activity in write order.
 */

import {
  CloudWatchLogsClient,
  CreateLogGroupCommand,
  CreateLogStreamCommand,
  DescribeLogGroupsCommand,
  GetLogEventsCommand,
  PutLogEventsCommand,
} from '@aws-sdk/client-cloudwatch-logs';
import type { AppLogger } from '../monitoring/logger';
import { isRecord } from '../utils/validation';
import {
  ActivityRecord,
  ActivityStore,
  StorageBackend,
  fromActivityItem,
  toActivityItem,
} from './types';

export type CloudWatchLogsSender = Pick<CloudWatchLogsClient, 'send' | 'destroy'>;

export interface CloudWatchLogStoreConfig {
  region: string;
  logGroupName: string;
}

function hasErrorName(error: unknown, name: string): boolean {
  return error instanceof Error && error.name === name;
}

/**
 * Log stream names may not contain ':' or '*'. The mapping is not injective
 * ("room:1" and "room_1" share a stream), so reads filter on the item's
 * session id.
 */
export function toLogStreamName(sessionId: string): string {
  return sessionId.replace(/[:*]/g, '_');
}

export class CloudWatchLogStore implements ActivityStore {
  readonly backend: StorageBackend = 'CloudWatch Logs';

  private client: CloudWatchLogsSender;
  private logGroupName: string;
  private logger: AppLogger;

  constructor(config: CloudWatchLogStoreConfig, logger: AppLogger, client?: CloudWatchLogsSender) {
    this.client = client ?? new CloudWatchLogsClient({ region: config.region });
    this.logGroupName = config.logGroupName;
    this.logger = logger;
  }

  async put(record: ActivityRecord): Promise<void> {
    const logStreamName = toLogStreamName(record.sessionId);
    await this.ensureLogStream(logStreamName);

    const parsedTime = Date.parse(record.timestamp);
    await this.client.send(
      new PutLogEventsCommand({
        logGroupName: this.logGroupName,
        logStreamName,
        logEvents: [
          {
            timestamp: Number.isNaN(parsedTime) ? Date.now() : parsedTime,
            message: JSON.stringify(toActivityItem(record)),
          },
        ],
      })
    );

    this.logger.debug('Activity written to log stream', {
      sessionId: record.sessionId,
      logGroupName: this.logGroupName,
      logStreamName,
    });
  }

  async query(sessionId: string): Promise<ActivityRecord[]> {
    const logStreamName = toLogStreamName(sessionId);
    const records: ActivityRecord[] = [];
    let nextToken: string | undefined;

    try {
      for (;;) {
        const result = await this.client.send(
          new GetLogEventsCommand({
            logGroupName: this.logGroupName,
            logStreamName,
            startFromHead: true,
            nextToken,
          })
        );

        for (const event of result.events ?? []) {
          const record = this.parseMessage(event.message, sessionId);
          if (record) {
            records.push(record);
          }
        }

        // The forward token repeats once the end of the stream is reached
        if (!result.nextForwardToken || result.nextForwardToken === nextToken) {
          break;
        }
        nextToken = result.nextForwardToken;
      }
    } catch (error) {
      if (hasErrorName(error, 'ResourceNotFoundException')) {
        // No stream yet: the session has no fallback activity
        return [];
      }
      throw error;
    }

    return records;
  }

  async ping(): Promise<void> {
    await this.client.send(
      new DescribeLogGroupsCommand({ logGroupNamePrefix: this.logGroupName, limit: 1 })
    );
  }

  destroy(): void {
    this.client.destroy();
  }

  private async ensureLogStream(logStreamName: string): Promise<void> {
    try {
      await this.client.send(new CreateLogGroupCommand({ logGroupName: this.logGroupName }));
    } catch (error) {
      if (!hasErrorName(error, 'ResourceAlreadyExistsException')) {
        throw error;
      }
    }

    try {
      await this.client.send(
        new CreateLogStreamCommand({ logGroupName: this.logGroupName, logStreamName })
      );
    } catch (error) {
      if (!hasErrorName(error, 'ResourceAlreadyExistsException')) {
        throw error;
      }
    }
  }

  private parseMessage(message: string | undefined, sessionId: string): ActivityRecord | null {
    if (!message) {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(message);
    } catch (error) {
      this.logger.debug('Skipping log event that is not JSON', {
        sessionId,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }

    if (!isRecord(parsed)) {
      return null;
    }
    const record = fromActivityItem(parsed);
    return record && record.sessionId === sessionId ? record : null;
  }
}
