/**
 * Facilitator support routes: troubleshooting lookups and announcements.
 */

import { Request, Response, Router } from 'express';
import type { TroubleshootingGuide } from '../../chat/troubleshooting-guide';
import { ERROR_CODES, getErrorMessage } from '../../errors/codes';
import { ValidationError } from '../../errors/types';
import type { SnsNotifier } from '../../notifications/sns-notifier';
import { isValidPhoneNumber, readString, readStringArray } from '../../utils/validation';
import { asyncRoute } from './async-route';

export interface SupportRouteDeps {
  troubleshootingGuide: Pick<TroubleshootingGuide, 'getSteps'>;
  notifier: Pick<SnsNotifier, 'sendWorkshopMessage'>;
  defaultTopicArn?: string;
}

export function createSupportRouter(deps: SupportRouteDeps): Router {
  const router = Router();

  router.get('/troubleshooting/:issueType', (req: Request, res: Response) => {
    const errorMessage = typeof req.query.error === 'string' ? req.query.error : '';
    res.json(deps.troubleshootingGuide.getSteps(req.params.issueType, errorMessage));
  });

  router.post(
    '/notifications',
    asyncRoute(async (req: Request, res: Response) => {
      const message = readString(req.body, 'message');
      if (!message) {
        throw new ValidationError('Missing required field: message');
      }

      const topicArn = readString(req.body, 'topic_arn') ?? deps.defaultTopicArn;
      const recipients = readStringArray(req.body, 'recipients') ?? [];

      if (!topicArn && recipients.length === 0) {
        throw new ValidationError(
          getErrorMessage(ERROR_CODES.NOTIFICATION_NO_RECIPIENTS),
          ERROR_CODES.NOTIFICATION_NO_RECIPIENTS
        );
      }

      const invalid = recipients.filter((recipient) => !isValidPhoneNumber(recipient));
      if (!topicArn && invalid.length > 0) {
        throw new ValidationError(`Invalid phone numbers: ${invalid.join(', ')}`);
      }

      const result = await deps.notifier.sendWorkshopMessage(message, { topicArn, recipients });
      res.status(result.status === 'sent' ? 200 : 502).json(result);
    })
  );

  return router;
}
