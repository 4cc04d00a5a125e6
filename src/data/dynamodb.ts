/**
 * DynamoDB Client Wrapper
 *
 * Provides a simplified interface for the item operations the activity log
 * needs. Retries and timeouts stay with the SDK client; this wrapper makes
 * every call exactly once.
 */

import {
  DynamoDBClient,
  PutItemCommand,
  QueryCommand,
  DescribeTableCommand,
  PutItemCommandInput,
  QueryCommandInput,
  AttributeValue,
} from '@aws-sdk/client-dynamodb';
import { marshall, unmarshall, NativeAttributeValue } from '@aws-sdk/util-dynamodb';
import { NodeHttpHandler } from '@smithy/node-http-handler';
import type { AppLogger } from '../monitoring/logger';

/**
 * DynamoDB client configuration
 */
export interface DynamoDBClientConfig {
  region: string;
  maxConnections?: number;
  requestTimeout?: number;
  connectionTimeout?: number;
}

export type DynamoItem = Record<string, NativeAttributeValue>;

/**
 * The part of the SDK client the wrapper calls; tests hand in a fake.
 */
export type DynamoDBSender = Pick<DynamoDBClient, 'send' | 'destroy'>;

/**
 * DynamoDB client wrapper with connection pooling
 */
export class DynamoDBClientWrapper {
  private client: DynamoDBSender;
  private logger: AppLogger;

  constructor(config: DynamoDBClientConfig, logger: AppLogger, client?: DynamoDBSender) {
    const {
      region,
      maxConnections = 50,
      requestTimeout = 30000,
      connectionTimeout = 5000,
    } = config;

    this.logger = logger;
    this.client =
      client ??
      new DynamoDBClient({
        region,
        requestHandler: new NodeHttpHandler({
          requestTimeout,
          connectionTimeout,
          httpAgent: { maxSockets: maxConnections },
          httpsAgent: { maxSockets: maxConnections },
        }),
      });

    this.logger.info('DynamoDB client initialized', {
      region,
      maxConnections,
      requestTimeout,
      connectionTimeout,
    });
  }

  /**
   * Put item into table
   */
  async putItem(tableName: string, item: DynamoItem): Promise<void> {
    const params: PutItemCommandInput = {
      TableName: tableName,
      Item: marshall(item, { removeUndefinedValues: true }),
    };

    await this.client.send(new PutItemCommand(params));
    this.logger.debug('Item put successfully', { tableName });
  }

  /**
   * Query every page of a key condition
   */
  async query(
    tableName: string,
    keyConditionExpression: string,
    expressionAttributeValues: DynamoItem,
    expressionAttributeNames?: Record<string, string>
  ): Promise<DynamoItem[]> {
    const items: DynamoItem[] = [];
    let exclusiveStartKey: Record<string, AttributeValue> | undefined;
    let pages = 0;

    do {
      const params: QueryCommandInput = {
        TableName: tableName,
        KeyConditionExpression: keyConditionExpression,
        ExpressionAttributeValues: marshall(expressionAttributeValues, {
          removeUndefinedValues: true,
        }),
        ExclusiveStartKey: exclusiveStartKey,
      };

      if (expressionAttributeNames) {
        params.ExpressionAttributeNames = expressionAttributeNames;
      }

      const result = await this.client.send(new QueryCommand(params));
      for (const item of result.Items ?? []) {
        items.push(unmarshall(item));
      }

      exclusiveStartKey = result.LastEvaluatedKey;
      pages++;
    } while (exclusiveStartKey);

    this.logger.debug('Query completed', { tableName, count: items.length, pages });
    return items;
  }

  /**
   * Confirm the table exists and is reachable
   */
  async describeTable(tableName: string): Promise<string | undefined> {
    const result = await this.client.send(new DescribeTableCommand({ TableName: tableName }));
    return result.Table?.TableStatus;
  }

  /**
   * Close client connection
   */
  destroy(): void {
    this.client.destroy();
    this.logger.info('DynamoDB client destroyed');
  }
}
