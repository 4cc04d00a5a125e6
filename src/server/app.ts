import express, { Express, NextFunction, Request, Response } from 'express';
import * as path from 'path';
import { ERROR_CODES, getErrorMessage } from '../errors/codes';
import { ValidationError } from '../errors/types';
import type { HealthCheck } from '../monitoring/health';
import type { AppLogger } from '../monitoring/logger';
import { ChatRouteDeps, createChatRouter } from './routes/chat';
import { createEngagementRouter, EngagementRouteDeps } from './routes/engagement';
import { createSupportRouter, SupportRouteDeps } from './routes/support';

export const PUBLIC_DIR = path.join(__dirname, '../../public');

export interface AppDependencies extends ChatRouteDeps, EngagementRouteDeps, SupportRouteDeps {
  healthCheck: Pick<HealthCheck, 'handleHealthCheck'>;
  logger: AppLogger;
  publicDir?: string;
}

function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err)) {
    return undefined;
  }
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export function createApp(deps: AppDependencies): Express {
  const { logger } = deps;
  const app = express();

  app.use(express.json());

  // Returns 200 when healthy, 503 when a critical check fails or during shutdown
  app.get('/health', (req: Request, res: Response, next: NextFunction) => {
    deps.healthCheck.handleHealthCheck(req, res).catch(next);
  });

  app.use(express.static(deps.publicDir ?? PUBLIC_DIR));

  app.use(createChatRouter(deps));
  app.use('/api', createEngagementRouter(deps));
  app.use('/api', createSupportRouter(deps));

  app.use((_req: Request, res: Response) => {
    res.status(404).type('text/plain').send(getErrorMessage(ERROR_CODES.NOT_FOUND));
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ValidationError) {
      res.status(400).json({ error: err.message, errorCode: err.code });
      return;
    }

    const message = err instanceof Error ? err.message : String(err);

    // body-parser rejects malformed JSON with a 4xx status
    const clientStatus = clientErrorStatus(err);
    if (clientStatus) {
      res.status(clientStatus).type('text/plain').send(message);
      return;
    }

    logger.error(
      'Unhandled request error',
      { event: 'request_failed', method: req.method, path: req.path },
      err instanceof Error ? err : new Error(message)
    );
    res.status(500).type('text/plain').send(message);
  });

  return app;
}
