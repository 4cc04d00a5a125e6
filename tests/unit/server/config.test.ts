import { loadConfig } from '../../../src/server/config';

describe('loadConfig', () => {
  it('should apply defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config.aws).toEqual({
      region: 'us-east-1',
      engagementTable: 'workshop-assistant-engagement',
      engagementLogGroup: '/aws/workshop-assistant/engagement',
      activityStore: 'dynamodb',
      dynamodbRequestTimeout: 30000,
      dynamodbConnectionTimeout: 5000,
      snsTopicArn: undefined,
    });
    expect(config.model.maxTokens).toBe(1000);
    expect(config.model.healthCheck).toBe(false);
    expect(config.server.port).toBe(8000);
    expect(config.server.logLevel).toBe('INFO');
    expect(config.monitoring.metricsEnabled).toBe(true);
  });

  it('should read overrides', () => {
    const config = loadConfig({
      AWS_REGION: 'eu-west-1',
      ACTIVITY_STORE: 'memory',
      PORT: '3000',
      LOG_LEVEL: 'debug',
      BEDROCK_MAX_TOKENS: '500',
      HEALTH_CHECK_MODEL: 'TRUE',
      METRICS_ENABLED: 'false',
      SNS_TOPIC_ARN: 'arn:aws:sns:eu-west-1:000000000000:announcements',
      WORKSHOP_TITLE: 'Serverless Basics',
      NODE_ENV: 'production',
    });

    expect(config.aws.region).toBe('eu-west-1');
    expect(config.aws.activityStore).toBe('memory');
    expect(config.aws.snsTopicArn).toBe('arn:aws:sns:eu-west-1:000000000000:announcements');
    expect(config.server.port).toBe(3000);
    expect(config.server.logLevel).toBe('DEBUG');
    expect(config.model.maxTokens).toBe(500);
    expect(config.model.healthCheck).toBe(true);
    expect(config.monitoring.metricsEnabled).toBe(false);
    expect(config.workshop.title).toBe('Serverless Basics');
    expect(config.server.nodeEnv).toBe('production');
  });

  it('should reject an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(
      'Invalid LOG_LEVEL: verbose. Must be one of: DEBUG, INFO, WARN, ERROR'
    );
  });

  it('should reject an unknown activity store', () => {
    expect(() => loadConfig({ ACTIVITY_STORE: 'redis' })).toThrow(
      'Invalid ACTIVITY_STORE: redis. Must be one of: dynamodb, memory'
    );
  });

  it('should reject integers with trailing text', () => {
    expect(() => loadConfig({ PORT: '80abc' })).toThrow(
      'Environment variable PORT must be a valid integer, got: 80abc'
    );
  });

  it('should reject a port out of range', () => {
    expect(() => loadConfig({ PORT: '70000' })).toThrow(
      'Invalid PORT: 70000. Must be between 1 and 65535.'
    );
  });

  it('should reject a zero token limit', () => {
    expect(() => loadConfig({ BEDROCK_MAX_TOKENS: '0' })).toThrow(
      'BEDROCK_MAX_TOKENS must be at least 1'
    );
  });
});
