import OpenAI from 'openai';

import type { LlmConfig } from '../config/env';
import { describeError, type Logger } from '../config/logger';
import { getStatus, LlmError, type ScreeningStep } from '../util/errors';
import { exponentialBackoff, isRetryableStatus } from '../util/retry';

type ChatCompletionRequest = OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming;

// The subset of a chat completion the client reads.
export type ChatCompletionReply = {
  choices: { message?: { content?: string | null } }[];
};

export type ChatCompletionCreate = (request: ChatCompletionRequest) => Promise<ChatCompletionReply>;

export interface ScreeningLlm {
  completeJson(step: ScreeningStep, prompt: string, input: Record<string, unknown>): Promise<unknown>;
}

const buildUserInput = (input: Record<string, unknown>): string => JSON.stringify(input, null, 2);

export class OpenAiScreeningLlm implements ScreeningLlm {
  private create: ChatCompletionCreate | null;

  constructor(
    private readonly config: LlmConfig,
    private readonly logger: Logger,
    create?: ChatCompletionCreate,
  ) {
    this.create = create ?? null;
  }

  private getCreate(): ChatCompletionCreate {
    if (this.create) {
      return this.create;
    }

    const { apiKey } = this.config;

    if (!apiKey) {
      throw new Error('LLM API key not configured. Set OPENAI_API_KEY to your provider token.');
    }

    // Retries are handled by exponentialBackoff below, not by the SDK.
    const client = new OpenAI({
      apiKey,
      baseURL: this.config.baseUrl,
      maxRetries: 0,
    });

    this.create = (request) => client.chat.completions.create(request);

    return this.create;
  }

  async completeJson(step: ScreeningStep, prompt: string, input: Record<string, unknown>): Promise<unknown> {
    const create = this.getCreate();
    const { model, temperature, maxAttempts, initialDelayMs, backoffFactor } = this.config;
    const startedAt = Date.now();

    const response = await exponentialBackoff(
      () =>
        create({
          model,
          temperature,
          response_format: { type: 'json_object' },
          messages: [
            { role: 'system', content: prompt },
            { role: 'user', content: buildUserInput(input) },
          ],
        }),
      {
        maxAttempts,
        initialDelayMs,
        factor: backoffFactor,
        logger: this.logger,
        shouldRetry: (error) => isRetryableStatus(error),
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn('llm.call.retry', {
            step,
            attempt,
            delayMs,
            status: getStatus(error),
            error: describeError(error),
          });
        },
      },
    );

    const content = response.choices[0]?.message?.content;

    if (!content || !content.trim()) {
      throw new LlmError(step, 'response did not contain any content', { rawResponse: content ?? '' });
    }

    let parsed: unknown;

    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new LlmError(step, `failed to parse JSON response: ${describeError(error)}`, {
        cause: error,
        rawResponse: content,
      });
    }

    this.logger.info('llm.call.completed', {
      step,
      model,
      latencyMs: Date.now() - startedAt,
    });

    return parsed;
  }
}
