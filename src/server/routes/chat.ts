/**
 * Chat routes: direct questions to the assistant and raw meeting chat lines.
 */

import { Request, Response, Router } from 'express';
import type { ChatOrchestrator } from '../../chat/orchestrator';
import { DEFAULT_PARTICIPANT } from '../../chat/orchestrator';
import { DEFAULT_SESSION_ID } from '../../data/types';
import { ValidationError } from '../../errors/types';
import { readString } from '../../utils/validation';
import { asyncRoute } from './async-route';

export interface ChatRouteDeps {
  chat: Pick<ChatOrchestrator, 'processMessage' | 'processChatEvent'>;
}

export function createChatRouter(deps: ChatRouteDeps): Router {
  const router = Router();

  router.post(
    '/chat',
    asyncRoute(async (req: Request, res: Response) => {
      const message = readString(req.body, 'message');
      if (!message) {
        throw new ValidationError('Missing required field: message');
      }

      const sessionId = readString(req.body, 'session_id') ?? DEFAULT_SESSION_ID;
      const participant = readString(req.body, 'participant') ?? DEFAULT_PARTICIPANT;

      const reply = await deps.chat.processMessage(message, sessionId, participant);
      res.json({ response: reply.response, session_id: sessionId });
    })
  );

  router.post(
    '/api/chat-events',
    asyncRoute(async (req: Request, res: Response) => {
      const participant = readString(req.body, 'participant');
      const message = readString(req.body, 'message');
      if (!participant || !message) {
        throw new ValidationError('Missing required fields: participant, message');
      }

      const sessionId = readString(req.body, 'session_id') ?? DEFAULT_SESSION_ID;
      const reply = await deps.chat.processChatEvent(participant, message, sessionId);

      res.json({
        session_id: sessionId,
        responded: reply !== null,
        response: reply ? reply.response : null,
      });
    })
  );

  return router;
}
