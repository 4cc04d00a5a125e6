/**
 * Chat Orchestrator
 *
 * Decides whether a participant message is a technical issue or a general
 * question, records the activity, and produces the reply: troubleshooting
 * steps for technical issues, a model answer grounded in the workshop
 * catalog for everything else.
 *
 * Failures surface as reply text, so callers cannot tell a declined answer
 * from an unreachable model without reading the string.
 */

import type { WorkshopContentIndex } from '../content/workshop-content';
import { ACTIVITY_TYPES, DEFAULT_SESSION_ID } from '../data/types';
import type { ActivityRecorder } from '../engagement/activity-recorder';
import { ERROR_CODES } from '../errors/codes';
import type { AppLogger } from '../monitoring/logger';
import type { MetricsSink } from '../monitoring/metrics';
import {
  classifyIntent,
  classifyIssueType,
  isAddressedToBot,
  MessageIntent,
} from './intent-classifier';
import type { ModelClient } from './model-client';
import { buildQuestionPrompt } from './prompt-builder';
import { formatTroubleshootingResponse, TroubleshootingGuide } from './troubleshooting-guide';

export const DEFAULT_PARTICIPANT = 'Anonymous';
export const DEFAULT_MAX_TOKENS = 1000;

export interface ChatOrchestratorDeps {
  contentIndex: WorkshopContentIndex;
  troubleshootingGuide: TroubleshootingGuide;
  modelClient: ModelClient;
  recorder: ActivityRecorder;
  logger: AppLogger;
  metrics?: MetricsSink;
  maxTokens?: number;
  modelId?: string;
}

export interface ChatReply {
  response: string;
  intent: MessageIntent;
}

export function modelFailureResponse(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return `I'm having trouble processing your request. Error: ${message}`;
}

export class ChatOrchestrator {
  private readonly deps: ChatOrchestratorDeps;
  private readonly maxTokens: number;

  constructor(deps: ChatOrchestratorDeps) {
    this.deps = deps;
    this.maxTokens = deps.maxTokens ?? DEFAULT_MAX_TOKENS;
  }

  /**
   * Answer a message sent directly to the assistant.
   */
  async processMessage(
    message: string,
    sessionId: string = DEFAULT_SESSION_ID,
    participant: string = DEFAULT_PARTICIPANT
  ): Promise<ChatReply> {
    const intent = classifyIntent(message);
    const { recorder, logger } = this.deps;

    logger.info('Processing chat message', {
      sessionId,
      event: 'chat_message_received',
      participant,
      intent,
      preview: message.slice(0, 50),
    });

    const activityType =
      intent === 'technical_issue' ? ACTIVITY_TYPES.TECHNICAL_SUPPORT : ACTIVITY_TYPES.QUESTION;
    const outcome = await recorder.track(participant, activityType, message, sessionId);
    if (!outcome.tracked) {
      logger.warn('Chat activity not recorded', {
        sessionId,
        event: 'chat_activity_not_recorded',
        error: outcome.error,
      });
    }

    const response =
      intent === 'technical_issue'
        ? this.answerTechnicalIssue(participant, message)
        : await this.answerQuestion(participant, message, sessionId);

    return { response, intent };
  }

  /**
   * Handle a line from the meeting chat. Every line counts as a chat message;
   * only lines addressed to the assistant get a reply.
   */
  async processChatEvent(
    participant: string,
    message: string,
    sessionId: string = DEFAULT_SESSION_ID
  ): Promise<ChatReply | null> {
    const outcome = await this.deps.recorder.track(
      participant,
      ACTIVITY_TYPES.CHAT_MESSAGE,
      message,
      sessionId
    );
    if (!outcome.tracked) {
      this.deps.logger.warn('Chat line not recorded', {
        sessionId,
        event: 'chat_activity_not_recorded',
        error: outcome.error,
      });
    }

    if (!isAddressedToBot(message)) {
      return null;
    }
    return this.processMessage(message, sessionId, participant);
  }

  private answerTechnicalIssue(participant: string, message: string): string {
    const { contentIndex, troubleshootingGuide } = this.deps;
    const issueType = classifyIssueType(message);
    const plan = troubleshootingGuide.getSteps(issueType, message);
    return formatTroubleshootingResponse(
      participant,
      plan,
      contentIndex.getTroubleshootingContext(issueType)
    );
  }

  private async answerQuestion(
    participant: string,
    question: string,
    sessionId: string
  ): Promise<string> {
    const { contentIndex, modelClient, logger, metrics, modelId } = this.deps;

    const prompt = buildQuestionPrompt({
      workshopTitle: contentIndex.workshopTitle,
      relevantContent: contentIndex.getRelevantContent(question),
      workshopOverview: contentIndex.getWorkshopContext(),
      question,
      participant: participant === DEFAULT_PARTICIPANT ? undefined : participant,
    });

    const startTime = Date.now();
    try {
      const answer = await modelClient.complete(prompt, this.maxTokens);
      await metrics?.emitModelLatency(Date.now() - startTime, modelId);
      return answer;
    } catch (error) {
      logger.error(
        'Error processing message',
        { sessionId, event: 'model_call_failed', participant },
        error instanceof Error ? error : new Error(String(error))
      );
      await metrics?.emitError(ERROR_CODES.MODEL_BACKEND_ERROR);
      return modelFailureResponse(error);
    }
  }
}
