/**
 * Composition root: builds every store, client and service once and hands
 * them to the HTTP layer. `destroy()` releases the AWS clients.
 */

import { BedrockModelClient } from '../chat/model-client';
import { ChatOrchestrator } from '../chat/orchestrator';
import { TroubleshootingGuide } from '../chat/troubleshooting-guide';
import { loadTroubleshootingData } from '../content/troubleshooting-data';
import { loadWorkshopContent, WorkshopContentIndex } from '../content/workshop-content';
import { ActivityLog } from '../data/activity-log';
import { CloudWatchLogStore } from '../data/cloudwatch-log-store';
import { DynamoDBClientWrapper } from '../data/dynamodb';
import { DynamoDBActivityStore } from '../data/dynamodb-activity-store';
import { InMemoryActivityStore } from '../data/memory-activity-store';
import type { ActivityStore } from '../data/types';
import { ActivityRecorder } from '../engagement/activity-recorder';
import { AnalyticsAggregator } from '../engagement/analytics';
import { ParticipantReconstructor } from '../engagement/participants';
import { WorkshopStatsService } from '../engagement/workshop-stats';
import { HealthCheck } from '../monitoring/health';
import type { AppLogger } from '../monitoring/logger';
import { MetricsEmitter } from '../monitoring/metrics';
import { SnsNotifier } from '../notifications/sns-notifier';
import type { Config } from './config';

export interface Services {
  activityLog: ActivityLog;
  contentIndex: WorkshopContentIndex;
  troubleshootingGuide: TroubleshootingGuide;
  recorder: ActivityRecorder;
  reconstructor: ParticipantReconstructor;
  aggregator: AnalyticsAggregator;
  stats: WorkshopStatsService;
  chat: ChatOrchestrator;
  notifier: SnsNotifier;
  healthCheck: HealthCheck;
  defaultTopicArn?: string;
  destroy(): void;
}

function createActivityLog(config: Config, logger: AppLogger): ActivityLog {
  if (config.aws.activityStore === 'memory') {
    logger.info('Using in-memory activity store', { event: 'activity_store_selected' });
    return new ActivityLog(new InMemoryActivityStore(), undefined, logger);
  }

  const dynamoClient = new DynamoDBClientWrapper(
    {
      region: config.aws.region,
      requestTimeout: config.aws.dynamodbRequestTimeout,
      connectionTimeout: config.aws.dynamodbConnectionTimeout,
    },
    logger
  );
  const primary: ActivityStore = new DynamoDBActivityStore(
    dynamoClient,
    config.aws.engagementTable
  );
  const fallback: ActivityStore = new CloudWatchLogStore(
    { region: config.aws.region, logGroupName: config.aws.engagementLogGroup },
    logger
  );

  logger.info('Using DynamoDB activity store with CloudWatch Logs fallback', {
    event: 'activity_store_selected',
    table: config.aws.engagementTable,
    logGroup: config.aws.engagementLogGroup,
  });
  return new ActivityLog(primary, fallback, logger);
}

export function createServices(config: Config, logger: AppLogger): Services {
  const troubleshootingData = loadTroubleshootingData();
  const contentIndex = loadWorkshopContent(
    {
      contentDirectory: config.workshop.contentDirectory,
      workshopTitle: config.workshop.title,
      relatedMaterials: troubleshootingData.relatedMaterials,
    },
    logger
  );
  const troubleshootingGuide = new TroubleshootingGuide(troubleshootingData);

  const metrics = new MetricsEmitter(
    {
      region: config.aws.region,
      namespace: config.monitoring.cloudwatchNamespace,
      enabled: config.monitoring.metricsEnabled,
    },
    logger
  );

  const activityLog = createActivityLog(config, logger);
  const recorder = new ActivityRecorder(activityLog, logger, metrics);
  const reconstructor = new ParticipantReconstructor(activityLog, logger);
  const aggregator = new AnalyticsAggregator(activityLog, logger);
  const stats = new WorkshopStatsService(reconstructor, aggregator);

  const modelClient = new BedrockModelClient(
    { region: config.aws.region, modelId: config.model.modelId },
    logger
  );
  const chat = new ChatOrchestrator({
    contentIndex,
    troubleshootingGuide,
    modelClient,
    recorder,
    logger,
    metrics,
    maxTokens: config.model.maxTokens,
    modelId: config.model.modelId,
  });

  const notifier = new SnsNotifier({ region: config.aws.region }, logger);

  const healthCheck = new HealthCheck(logger);
  healthCheck.registerCheck(
    'activity_store',
    async () => {
      await activityLog.pingPrimary();
      return true;
    },
    // The fallback keeps recording while the primary is down.
    { critical: activityLog.fallbackBackend === undefined }
  );
  if (config.model.healthCheck) {
    healthCheck.setInferenceProbe(() => modelClient.checkConnection());
  }

  return {
    activityLog,
    contentIndex,
    troubleshootingGuide,
    recorder,
    reconstructor,
    aggregator,
    stats,
    chat,
    notifier,
    healthCheck,
    defaultTopicArn: config.aws.snsTopicArn,
    destroy(): void {
      activityLog.destroy();
      modelClient.destroy();
      notifier.destroy();
      metrics.destroy();
      logger.info('Services destroyed', { event: 'services_destroyed' });
    },
  };
}
