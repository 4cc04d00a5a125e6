import * as dotenv from 'dotenv';
import { isLogLevel, LogLevel } from '../monitoring/logger';

// Load environment variables from .env file
dotenv.config();

export type ActivityStoreMode = 'dynamodb' | 'memory';

export interface Config {
  aws: {
    region: string;
    engagementTable: string;
    engagementLogGroup: string;
    activityStore: ActivityStoreMode;
    dynamodbRequestTimeout: number;
    dynamodbConnectionTimeout: number;
    snsTopicArn?: string;
  };
  model: {
    modelId: string;
    maxTokens: number;
    healthCheck: boolean;
  };
  server: {
    port: number;
    logLevel: LogLevel;
    logFile?: string;
    nodeEnv: string;
  };
  workshop: {
    title?: string;
    contentDirectory?: string;
  };
  monitoring: {
    metricsEnabled: boolean;
    cloudwatchNamespace: string;
  };
}

type Env = Record<string, string | undefined>;

function getEnvVar(env: Env, name: string, defaultValue: string): string {
  return env[name] || defaultValue;
}

function getOptionalEnvVar(env: Env, name: string): string | undefined {
  return env[name] || undefined;
}

function getEnvVarAsInt(env: Env, name: string, defaultValue: number): number {
  const value = env[name];

  if (!value) {
    return defaultValue;
  }

  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || String(parsed) !== value.trim()) {
    throw new Error(`Environment variable ${name} must be a valid integer, got: ${value}`);
  }

  return parsed;
}

function getEnvVarAsBoolean(env: Env, name: string, defaultValue: boolean = false): boolean {
  const value = env[name];

  if (!value) {
    return defaultValue;
  }

  return value.toLowerCase() === 'true';
}

function parseLogLevel(value: string): LogLevel {
  const upper = value.toUpperCase();
  if (!isLogLevel(upper)) {
    throw new Error(`Invalid LOG_LEVEL: ${value}. Must be one of: DEBUG, INFO, WARN, ERROR`);
  }
  return upper;
}

function parseActivityStore(value: string): ActivityStoreMode {
  if (value === 'dynamodb' || value === 'memory') {
    return value;
  }
  throw new Error(`Invalid ACTIVITY_STORE: ${value}. Must be one of: dynamodb, memory`);
}

export function validateConfig(config: Config): void {
  if (config.server.port < 1 || config.server.port > 65535) {
    throw new Error(`Invalid PORT: ${config.server.port}. Must be between 1 and 65535.`);
  }

  if (config.model.maxTokens < 1) {
    throw new Error('BEDROCK_MAX_TOKENS must be at least 1');
  }

  if (config.aws.dynamodbRequestTimeout < 1) {
    throw new Error('DYNAMODB_REQUEST_TIMEOUT must be at least 1');
  }

  if (config.aws.dynamodbConnectionTimeout < 1) {
    throw new Error('DYNAMODB_CONNECTION_TIMEOUT must be at least 1');
  }

  if (config.aws.activityStore === 'dynamodb' && !config.aws.engagementTable) {
    throw new Error('ENGAGEMENT_TABLE is required when ACTIVITY_STORE is dynamodb');
  }
}

export function loadConfig(env: Env = process.env): Config {
  const config: Config = {
    aws: {
      region: getEnvVar(env, 'AWS_REGION', 'us-east-1'),
      engagementTable: getEnvVar(env, 'ENGAGEMENT_TABLE', 'workshop-assistant-engagement'),
      engagementLogGroup: getEnvVar(
        env,
        'ENGAGEMENT_LOG_GROUP',
        '/aws/workshop-assistant/engagement'
      ),
      activityStore: parseActivityStore(getEnvVar(env, 'ACTIVITY_STORE', 'dynamodb')),
      dynamodbRequestTimeout: getEnvVarAsInt(env, 'DYNAMODB_REQUEST_TIMEOUT', 30000),
      dynamodbConnectionTimeout: getEnvVarAsInt(env, 'DYNAMODB_CONNECTION_TIMEOUT', 5000),
      snsTopicArn: getOptionalEnvVar(env, 'SNS_TOPIC_ARN'),
    },
    model: {
      modelId: getEnvVar(env, 'BEDROCK_MODEL_ID', 'anthropic.claude-3-sonnet-20240229-v1:0'),
      maxTokens: getEnvVarAsInt(env, 'BEDROCK_MAX_TOKENS', 1000),
      healthCheck: getEnvVarAsBoolean(env, 'HEALTH_CHECK_MODEL', false),
    },
    server: {
      port: getEnvVarAsInt(env, 'PORT', 8000),
      logLevel: parseLogLevel(getEnvVar(env, 'LOG_LEVEL', 'INFO')),
      logFile: env.LOG_FILE,
      nodeEnv: getEnvVar(env, 'NODE_ENV', 'development'),
    },
    workshop: {
      title: getOptionalEnvVar(env, 'WORKSHOP_TITLE'),
      contentDirectory: getOptionalEnvVar(env, 'WORKSHOP_CONTENT_DIR'),
    },
    monitoring: {
      metricsEnabled: getEnvVarAsBoolean(env, 'METRICS_ENABLED', true),
      cloudwatchNamespace: getEnvVar(env, 'METRICS_NAMESPACE', 'WorkshopAssistant/Backend'),
    },
  };

  validateConfig(config);

  return config;
}
