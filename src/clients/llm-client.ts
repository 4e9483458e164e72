/**
 * LLM Client - text completions through the Anthropic API
 */

import Anthropic from '@anthropic-ai/sdk';
import type { LlmConfig } from '../types';
import { ExponentialBackoff } from '../utils/backoff';
import { getLogger } from '../utils/logger';
import { ClientError, type CompletionRequest, type LanguageModel } from './types';

/**
 * Classify an HTTP status returned by the API
 */
export function llmErrorFromStatus(status: number | undefined, message: string): ClientError {
  if (status === 429) {
    return new ClientError('RATE_LIMITED', 'Rate limit exceeded', { retryable: true, status });
  }

  if (status === 529) {
    return new ClientError('API_OVERLOADED', 'API is temporarily overloaded', { retryable: true, status });
  }

  if (status === undefined || status >= 500) {
    return new ClientError('API_ERROR', `API error: ${message}`, { retryable: true, status });
  }

  return new ClientError('API_ERROR', message, { retryable: false, status });
}

/**
 * Convert anything the SDK threw into a ClientError
 */
export function toLlmError(error: unknown): ClientError {
  if (error instanceof ClientError) {
    return error;
  }

  if (error instanceof Anthropic.APIConnectionError) {
    return new ClientError('CONNECTION_ERROR', error.message, { retryable: true, cause: error });
  }

  if (error instanceof Anthropic.APIError) {
    return llmErrorFromStatus(error.status, error.message);
  }

  if (error instanceof Error) {
    return new ClientError('UNKNOWN_ERROR', error.message, { cause: error });
  }

  return new ClientError('UNKNOWN_ERROR', 'An unknown error occurred');
}

export class LlmClient implements LanguageModel {
  private client: Anthropic;
  private config: LlmConfig;

  constructor(config: LlmConfig) {
    this.config = config;

    // Retried in complete()
    this.client = new Anthropic({
      apiKey: config.apiKey,
      maxRetries: 0,
    });
  }

  async complete(request: CompletionRequest): Promise<string> {
    const logger = getLogger();
    const backoff = new ExponentialBackoff({ maxRetries: this.config.maxRetries });

    return backoff.execute(
      () => this.send(request),
      (error) => toLlmError(error).retryable,
      (error, attempt, delayMs) => {
        const llmError = toLlmError(error);
        logger.warn('LLM request failed, retrying', {
          attempt,
          maxRetries: this.config.maxRetries,
          delayMs: Math.round(delayMs),
          code: llmError.code,
          error: llmError.message,
        });
      }
    );
  }

  private async send(request: CompletionRequest): Promise<string> {
    const startTime = Date.now();

    try {
      const response = await this.client.messages.create({
        model: this.config.model,
        max_tokens: request.maxTokens ?? this.config.maxTokens,
        temperature: this.config.temperature,
        system: request.system,
        messages: [
          {
            role: 'user',
            content: request.prompt,
          },
        ],
      });

      const text = response.content
        .filter((block): block is Anthropic.TextBlock => block.type === 'text')
        .map((block) => block.text)
        .join('\n')
        .trim();

      getLogger().debug('LLM completion received', {
        model: this.config.model,
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        durationMs: Date.now() - startTime,
      });

      if (!text) {
        throw new ClientError('EMPTY_RESPONSE', 'Model returned no text');
      }

      return text;
    } catch (error) {
      throw toLlmError(error);
    }
  }
}
