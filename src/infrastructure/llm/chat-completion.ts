import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeCause, extractHttpStatus, ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../logger.js';
import type { ChatCompletionClient, LLMProvider, LLMRequestOptions, LLMResponse } from './types.js';

const DEFAULT_MAX_TOKENS = 4096;
const DEFAULT_TEMPERATURE = 0.1;

/** Chat completion over any OpenAI-compatible client, with status codes mapped to AppErrors. */
export abstract class ChatCompletionProvider implements LLMProvider {
  abstract readonly name: string;
  readonly temperature: number;
  protected readonly client: ChatCompletionClient;
  protected readonly model: string;

  protected constructor(client: ChatCompletionClient, model: string, temperature = DEFAULT_TEMPERATURE) {
    this.client = client;
    this.model = model;
    this.temperature = temperature;
  }

  private get log() {
    return logger.child({ module: `llm-${this.name}` });
  }

  async chat(
    systemPrompt: string,
    userMessage: string,
    options?: LLMRequestOptions,
  ): Promise<Result<LLMResponse, AppError>> {
    const startTime = Date.now();
    const ctx = { model: this.model };

    this.log.debug(ctx, 'Calling chat completion');

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userMessage },
        ],
        temperature: options?.temperature ?? this.temperature,
        max_tokens: options?.maxTokens ?? DEFAULT_MAX_TOKENS,
        ...(options?.responseFormat === 'json' && {
          response_format: { type: 'json_object' },
        }),
      });

      const latencyMs = Date.now() - startTime;
      const choice = response.choices[0];
      const content = choice?.message?.content;

      if (!content) {
        this.log.error(
          { ...ctx, latencyMs, finishReason: choice?.finish_reason, errorCode: ErrorCode.LLM_MALFORMED_RESPONSE, retryable: false },
          'Chat completion returned empty content',
        );
        return err(
          createAppError(ErrorCode.LLM_MALFORMED_RESPONSE, `${this.name} returned empty response content`, false),
        );
      }

      const usage = response.usage;
      const result: LLMResponse = {
        content,
        model: response.model,
        usage: {
          promptTokens: usage?.prompt_tokens ?? 0,
          completionTokens: usage?.completion_tokens ?? 0,
          totalTokens: usage?.total_tokens ?? 0,
        },
        latencyMs,
      };

      this.log.info(
        {
          ...ctx,
          latencyMs,
          promptTokens: result.usage.promptTokens,
          completionTokens: result.usage.completionTokens,
          finishReason: choice?.finish_reason,
        },
        'Chat completion succeeded',
      );

      return ok(result);
    } catch (cause) {
      return this.mapError(cause, Date.now() - startTime);
    }
  }

  private mapError(cause: unknown, latencyMs: number): Result<never, AppError> {
    const details = describeCause(cause);
    const status = extractHttpStatus(cause);
    const ctx = { model: this.model, latencyMs, status, details };

    if (status === 401 || status === 403) {
      this.log.error({ ...ctx, errorCode: ErrorCode.LLM_AUTH_ERROR, retryable: false }, 'Authentication failed');
      return err(createAppError(ErrorCode.LLM_AUTH_ERROR, `${this.name} API authentication failed`, false, details));
    }

    if (status === 429) {
      this.log.warn({ ...ctx, errorCode: ErrorCode.LLM_RATE_LIMITED, retryable: true }, 'Rate limited');
      return err(createAppError(ErrorCode.LLM_RATE_LIMITED, `${this.name} API rate limited`, true, details));
    }

    if (status !== undefined && status >= 500) {
      this.log.error({ ...ctx, errorCode: ErrorCode.LLM_API_ERROR, retryable: true }, 'Server error');
      return err(createAppError(ErrorCode.LLM_API_ERROR, `${this.name} API returned ${status}`, true, details));
    }

    this.log.error({ ...ctx, errorCode: ErrorCode.LLM_API_ERROR, retryable: true }, 'API call failed');
    return err(createAppError(ErrorCode.LLM_API_ERROR, `${this.name} API call failed`, true, details));
  }
}
