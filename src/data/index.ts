/**
 * Data module exports
 */

export * from './types';
export * from './dynamodb';
export * from './dynamodb-activity-store';
export * from './cloudwatch-log-store';
export * from './memory-activity-store';
export * from './activity-log';
export * from './error-handler';
