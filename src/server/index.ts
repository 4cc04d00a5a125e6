import { createServer } from 'http';
import { createLogger, Logger } from '../monitoring/logger';
import { createApp } from './app';
import { loadConfig } from './config';
import { createServices } from './services';
import { ShutdownHandler } from './shutdown';

async function main(): Promise<void> {
  const config = loadConfig();

  const logger = createLogger(config.server.logLevel, {
    logFile: config.server.logFile,
    errorLogFile: config.server.nodeEnv === 'production' ? 'logs/error.log' : undefined,
  });

  logger.info('Workshop assistant starting...', { event: 'server_starting' });
  logger.info('Configuration validated successfully', {
    event: 'config_loaded',
    nodeEnv: config.server.nodeEnv,
    region: config.aws.region,
    port: config.server.port,
    activityStore: config.aws.activityStore,
    modelId: config.model.modelId,
  });

  const services = createServices(config, logger);
  const app = createApp({ ...services, logger });
  const httpServer = createServer(app);

  const shutdownHandler = new ShutdownHandler(
    { server: httpServer, healthCheck: services.healthCheck, destroy: () => services.destroy() },
    logger
  );

  const shutdown = (signal: string): void => {
    logger.info(`${signal} received, shutting down gracefully...`, {
      event: 'shutdown_initiated',
      signal,
    });
    shutdownHandler
      .shutdown()
      .then(() => closeAndExit(logger, 0))
      .catch((error: unknown) => {
        logger.error(
          'Error during shutdown',
          { event: 'shutdown_error' },
          error instanceof Error ? error : new Error(String(error))
        );
        closeAndExit(logger, 1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  await new Promise<void>((resolve) => {
    httpServer.listen(config.server.port, () => resolve());
  });

  logger.info('Workshop assistant started successfully', {
    event: 'server_started',
    port: config.server.port,
    workshop: services.contentIndex.workshopTitle,
    documents: services.contentIndex.documentCount,
  });
}

function closeAndExit(logger: Logger, code: number): void {
  logger.close();
  process.exit(code);
}

main().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
