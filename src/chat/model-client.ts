/**
 * Bedrock Model Client
 *
 * Single request/response text completion through the Bedrock Converse API.
 */

import { BedrockRuntimeClient, ConverseCommand } from '@aws-sdk/client-bedrock-runtime';
import { ERROR_CODES } from '../errors/codes';
import { BackendError } from '../errors/types';
import type { AppLogger } from '../monitoring/logger';

/**
 * Text completion capability the chat orchestrator depends on
 */
export interface ModelClient {
  complete(prompt: string, maxTokens: number): Promise<string>;
}

export interface ModelConnectionStatus {
  connected: boolean;
  status: string;
}

export type BedrockRuntimeSender = Pick<BedrockRuntimeClient, 'send' | 'destroy'>;

export interface BedrockModelClientConfig {
  region: string;
  modelId: string;
}

export class BedrockModelClient implements ModelClient {
  readonly modelId: string;
  private client: BedrockRuntimeSender;
  private logger: AppLogger;

  constructor(config: BedrockModelClientConfig, logger: AppLogger, client?: BedrockRuntimeSender) {
    this.modelId = config.modelId;
    this.client = client ?? new BedrockRuntimeClient({ region: config.region });
    this.logger = logger;

    this.logger.info('Bedrock model client initialized', {
      region: config.region,
      modelId: config.modelId,
    });
  }

  async complete(prompt: string, maxTokens: number): Promise<string> {
    const startTime = Date.now();

    const response = await this.client.send(
      new ConverseCommand({
        modelId: this.modelId,
        messages: [
          {
            role: 'user',
            content: [{ text: prompt }],
          },
        ],
        inferenceConfig: {
          maxTokens,
        },
      })
    );

    const text = (response.output?.message?.content ?? [])
      .map((block) => block.text ?? '')
      .join('');

    this.logger.debug('Model response received', {
      modelId: this.modelId,
      responseLength: text.length,
      durationMs: Date.now() - startTime,
      stopReason: response.stopReason,
    });

    if (!text) {
      throw new BackendError(
        'Model returned no text content',
        ERROR_CODES.MODEL_EMPTY_RESPONSE,
        response.stopReason
      );
    }

    return text;
  }

  /**
   * Minimal completion used by the debug health check
   */
  async checkConnection(): Promise<ModelConnectionStatus> {
    try {
      await this.complete('Hello', 10);
      return { connected: true, status: 'Connected' };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn('Model connection test failed', {
        event: 'model_connection_failed',
        modelId: this.modelId,
        error: message,
      });
      return { connected: false, status: message };
    }
  }

  destroy(): void {
    this.client.destroy();
  }
}
