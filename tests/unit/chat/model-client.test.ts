/**
 * Tests for the Bedrock model client
 */

import { ConverseCommand } from '@aws-sdk/client-bedrock-runtime';
import { BedrockModelClient } from '../../../src/chat/model-client';
import { BackendError } from '../../../src/errors';
import { createMockLogger } from '../../helpers/logger';

function createClient() {
  const sender = { send: jest.fn(), destroy: jest.fn() };
  const logger = createMockLogger();
  const client = new BedrockModelClient(
    { region: 'us-east-1', modelId: 'test-model' },
    logger,
    sender
  );
  return { sender, logger, client };
}

describe('BedrockModelClient', () => {
  it('should send one user message with the token limit', async () => {
    const { sender, client } = createClient();
    sender.send.mockResolvedValue({
      output: { message: { role: 'assistant', content: [{ text: 'Lab 3 ' }, { text: 'covers HTTPS.' }] } },
      stopReason: 'end_turn',
    });

    const answer = await client.complete('What is lab 3?', 256);

    expect(answer).toBe('Lab 3 covers HTTPS.');
    const command = sender.send.mock.calls[0][0];
    expect(command).toBeInstanceOf(ConverseCommand);
    expect(command.input).toEqual({
      modelId: 'test-model',
      messages: [{ role: 'user', content: [{ text: 'What is lab 3?' }] }],
      inferenceConfig: { maxTokens: 256 },
    });
  });

  it('should raise a BackendError when the model returns no text', async () => {
    const { sender, client } = createClient();
    sender.send.mockResolvedValue({
      output: { message: { role: 'assistant', content: [] } },
      stopReason: 'content_filtered',
    });

    const failure = client.complete('hello', 10);

    await expect(failure).rejects.toBeInstanceOf(BackendError);
    await expect(failure).rejects.toThrow('Model returned no text content');
  });

  it('should propagate service errors', async () => {
    const { sender, client } = createClient();
    sender.send.mockRejectedValue(new Error('AccessDeniedException'));

    await expect(client.complete('hello', 10)).rejects.toThrow('AccessDeniedException');
  });

  describe('checkConnection', () => {
    it('should report a reachable model', async () => {
      const { sender, client } = createClient();
      sender.send.mockResolvedValue({
        output: { message: { role: 'assistant', content: [{ text: 'Hi' }] } },
      });

      expect(await client.checkConnection()).toEqual({ connected: true, status: 'Connected' });
      expect(sender.send.mock.calls[0][0].input.inferenceConfig).toEqual({ maxTokens: 10 });
    });

    it('should report the error text when the model is unreachable', async () => {
      const { sender, logger, client } = createClient();
      sender.send.mockRejectedValue(new Error('Could not resolve host'));

      expect(await client.checkConnection()).toEqual({
        connected: false,
        status: 'Could not resolve host',
      });
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });
  });

  it('should destroy the SDK client', () => {
    const { sender, client } = createClient();
    client.destroy();
    expect(sender.destroy).toHaveBeenCalledTimes(1);
  });
});
