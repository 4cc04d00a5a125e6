/**
 * Engagement routes: activity tracking and per-session reads.
 *
 * The engagement services never throw; failures arrive inside the payload
 * (`error`), and the status code follows from it.
 */

import { Request, Response, Router } from 'express';
import { DEFAULT_SESSION_ID } from '../../data/types';
import type { ActivityRecorder } from '../../engagement/activity-recorder';
import type { AnalyticsAggregator } from '../../engagement/analytics';
import type { ParticipantReconstructor } from '../../engagement/participants';
import type { WorkshopStatsService } from '../../engagement/workshop-stats';
import { ValidationError } from '../../errors/types';
import { readString } from '../../utils/validation';
import { asyncRoute } from './async-route';

export interface EngagementRouteDeps {
  recorder: Pick<ActivityRecorder, 'track'>;
  reconstructor: Pick<ParticipantReconstructor, 'listParticipants'>;
  aggregator: Pick<AnalyticsAggregator, 'analyze'>;
  stats: Pick<WorkshopStatsService, 'getWorkshopStats'>;
}

export function createEngagementRouter(deps: EngagementRouteDeps): Router {
  const router = Router();

  router.post(
    '/activities',
    asyncRoute(async (req: Request, res: Response) => {
      const participant = readString(req.body, 'participant');
      const activityType = readString(req.body, 'activity_type');
      if (!participant || !activityType) {
        throw new ValidationError('Missing required fields: participant, activity_type');
      }

      const details = readString(req.body, 'details') ?? '';
      const sessionId = readString(req.body, 'session_id') ?? DEFAULT_SESSION_ID;

      const outcome = await deps.recorder.track(participant, activityType, details, sessionId);
      res.status(outcome.tracked ? 201 : 503).json(outcome);
    })
  );

  router.get(
    '/sessions/:id/participants',
    asyncRoute(async (req: Request, res: Response) => {
      const listing = await deps.reconstructor.listParticipants(req.params.id);
      res.json(listing);
    })
  );

  router.get(
    '/sessions/:id/analytics',
    asyncRoute(async (req: Request, res: Response) => {
      const report = await deps.aggregator.analyze(req.params.id);
      res.json(report);
    })
  );

  router.get(
    '/sessions/:id/stats',
    asyncRoute(async (req: Request, res: Response) => {
      const stats = await deps.stats.getWorkshopStats(req.params.id);
      res.json(stats);
    })
  );

  return router;
}
