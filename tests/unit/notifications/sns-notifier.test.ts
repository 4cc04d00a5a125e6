/**
 * Tests for the SNS workshop notifier
 */

import { PublishCommand } from '@aws-sdk/client-sns';
import { SnsNotifier } from '../../../src/notifications/sns-notifier';
import { createMockLogger } from '../../helpers/logger';

const TOPIC_ARN = 'arn:aws:sns:us-east-1:000000000000:workshop-test';

function createNotifier() {
  const sender = { send: jest.fn(), destroy: jest.fn() };
  const logger = createMockLogger();
  return { sender, logger, notifier: new SnsNotifier({ region: 'us-east-1' }, logger, sender) };
}

describe('SnsNotifier', () => {
  describe('publish', () => {
    it('should publish to a topic with the workshop subject', async () => {
      const { sender, notifier } = createNotifier();
      sender.send.mockResolvedValue({ MessageId: 'msg-1' });

      const messageId = await notifier.publish('Break in 5 minutes', { topicArn: TOPIC_ARN });

      expect(messageId).toBe('msg-1');
      const command = sender.send.mock.calls[0][0];
      expect(command).toBeInstanceOf(PublishCommand);
      expect(command.input).toEqual({
        TopicArn: TOPIC_ARN,
        Message: 'Break in 5 minutes',
        Subject: 'Workshop Notification',
      });
    });

    it('should publish directly to a phone number', async () => {
      const { sender, notifier } = createNotifier();
      sender.send.mockResolvedValue({ MessageId: 'msg-2' });

      await notifier.publish('Lab 4 starts now', { phoneNumber: '+15550000000' });

      expect(sender.send.mock.calls[0][0].input).toEqual({
        PhoneNumber: '+15550000000',
        Message: 'Lab 4 starts now',
      });
    });
  });

  describe('sendWorkshopMessage', () => {
    it('should prefer the topic when one is given', async () => {
      const { sender, notifier } = createNotifier();
      sender.send.mockResolvedValue({ MessageId: 'msg-1' });

      const result = await notifier.sendWorkshopMessage('Break', {
        topicArn: TOPIC_ARN,
        recipients: ['+15550000000'],
      });

      expect(result).toEqual({
        status: 'sent',
        method: 'SNS Topic',
        messageIds: ['msg-1'],
        recipients: 1,
      });
      expect(sender.send).toHaveBeenCalledTimes(1);
    });

    it('should skip recipients that fail', async () => {
      const { sender, logger, notifier } = createNotifier();
      sender.send
        .mockResolvedValueOnce({ MessageId: 'msg-1' })
        .mockRejectedValueOnce(new Error('Invalid parameter: PhoneNumber'))
        .mockResolvedValueOnce({ MessageId: 'msg-3' });

      const result = await notifier.sendWorkshopMessage('Break', {
        recipients: ['+15550000001', '+15550000002', '+15550000003'],
      });

      expect(result).toEqual({
        status: 'sent',
        method: 'Individual SNS',
        messageIds: ['msg-1', 'msg-3'],
        recipients: 2,
      });
      expect(logger.warn).toHaveBeenCalledWith('Failed to notify recipient', {
        event: 'notification_recipient_failed',
        recipient: '+15550000002',
        error: 'Invalid parameter: PhoneNumber',
      });
    });

    it('should report an error when there is nobody to notify', async () => {
      const { sender, notifier } = createNotifier();

      const result = await notifier.sendWorkshopMessage('Break', {});

      expect(result).toEqual({
        status: 'error',
        error: 'No recipients specified (topic_arn or recipients required)',
      });
      expect(sender.send).not.toHaveBeenCalled();
    });

    it('should return an error instead of throwing when the topic publish fails', async () => {
      const { sender, logger, notifier } = createNotifier();
      sender.send.mockRejectedValue(new Error('AuthorizationError'));

      const result = await notifier.sendWorkshopMessage('Break', { topicArn: TOPIC_ARN });

      expect(result).toEqual({
        status: 'error',
        error: 'Failed to send workshop message: AuthorizationError',
      });
      expect(logger.error).toHaveBeenCalledTimes(1);
    });
  });
});
