/**
 * AWS SNS Workshop Notifier
 *
 * Publishes facilitator announcements to a topic or to individual phone
 * numbers.
 */

import { PublishCommand, PublishCommandInput, SNSClient } from '@aws-sdk/client-sns';
import { ERROR_CODES, getErrorMessage } from '../errors/codes';
import type { AppLogger } from '../monitoring/logger';

export type SnsSender = Pick<SNSClient, 'send' | 'destroy'>;

export type NotificationTarget = { topicArn: string } | { phoneNumber: string };

export interface WorkshopMessageOptions {
  topicArn?: string;
  recipients?: readonly string[];
}

export type NotificationMethod = 'SNS Topic' | 'Individual SNS';

export type NotificationResult =
  | {
      status: 'sent';
      method: NotificationMethod;
      messageIds: string[];
      recipients: number;
    }
  | { status: 'error'; error: string };

export const NOTIFICATION_SUBJECT = 'Workshop Notification';

export interface SnsNotifierConfig {
  region: string;
}

export class SnsNotifier {
  private client: SnsSender;
  private logger: AppLogger;

  constructor(config: SnsNotifierConfig, logger: AppLogger, client?: SnsSender) {
    this.client = client ?? new SNSClient({ region: config.region });
    this.logger = logger;
  }

  /**
   * Publish one message and return the SNS message id
   */
  async publish(message: string, target: NotificationTarget): Promise<string> {
    const input: PublishCommandInput =
      'topicArn' in target
        ? { TopicArn: target.topicArn, Message: message, Subject: NOTIFICATION_SUBJECT }
        : { PhoneNumber: target.phoneNumber, Message: message };

    const response = await this.client.send(new PublishCommand(input));
    return response.MessageId ?? '';
  }

  /**
   * Send an announcement to a topic, or to each recipient in turn when no
   * topic is given. Never throws.
   */
  async sendWorkshopMessage(
    message: string,
    options: WorkshopMessageOptions
  ): Promise<NotificationResult> {
    try {
      if (options.topicArn) {
        const messageId = await this.publish(message, { topicArn: options.topicArn });
        this.logger.info('Workshop notification published', {
          event: 'notification_sent',
          method: 'SNS Topic',
          messageId,
        });
        return { status: 'sent', method: 'SNS Topic', messageIds: [messageId], recipients: 1 };
      }

      const recipients = options.recipients ?? [];
      if (recipients.length === 0) {
        return { status: 'error', error: getErrorMessage(ERROR_CODES.NOTIFICATION_NO_RECIPIENTS) };
      }

      const messageIds: string[] = [];
      for (const recipient of recipients) {
        try {
          messageIds.push(await this.publish(message, { phoneNumber: recipient }));
        } catch (error) {
          this.logger.warn('Failed to notify recipient', {
            event: 'notification_recipient_failed',
            recipient,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      }

      this.logger.info('Workshop notification sent to recipients', {
        event: 'notification_sent',
        method: 'Individual SNS',
        delivered: messageIds.length,
        requested: recipients.length,
      });
      return {
        status: 'sent',
        method: 'Individual SNS',
        messageIds,
        recipients: messageIds.length,
      };
    } catch (error) {
      this.logger.error(
        'Failed to send workshop notification',
        { event: 'notification_failed' },
        error instanceof Error ? error : new Error(String(error))
      );
      return {
        status: 'error',
        error: `Failed to send workshop message: ${
          error instanceof Error ? error.message : String(error)
        }`,
      };
    }
  }

  destroy(): void {
    this.client.destroy();
  }
}
