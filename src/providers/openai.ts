import OpenAI from 'openai';
import type { Logger } from 'pino';
import type {
  ChatTurn,
  GenerationClient,
  GenerationClientOptions,
  GenerationResult,
  TokenUsage,
} from './types.js';
import { DEFAULT_MAX_RETRIES, DEFAULT_MAX_TOKENS, RETRY_DELAY_MS, RETRY_STATUS_CODES } from './constants.js';
import { GenerationError, errorMessage } from '../utils/errors.js';

/**
 * Chat completions against any OpenAI-compatible endpoint.
 *
 * The SDK's own retries are disabled so that backoff, the retryable status
 * set and the empty-reply rule live in one place.
 */
export class OpenAICompatibleClient implements GenerationClient {
  public readonly name = 'openai-compatible';
  public readonly model: string;

  private client: OpenAI;
  private timeoutMs: number;
  private maxTokens: number;
  private maxRetries: number;
  private retryDelayMs: number;
  private logger: Logger;

  constructor(options: GenerationClientOptions, logger: Logger) {
    this.model = options.model;
    this.timeoutMs = options.timeoutMs;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryDelayMs = options.retryDelayMs ?? RETRY_DELAY_MS;
    this.logger = logger.child({ component: 'llm-client', model: options.model });

    this.client = new OpenAI({
      apiKey: options.apiKey,
      maxRetries: 0,
      ...(options.baseUrl && { baseURL: options.baseUrl }),
    });
  }

  async generate(turns: ChatTurn[]): Promise<GenerationResult> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxRetries + 1; attempt++) {
      const started = Date.now();
      try {
        const response = await this.client.chat.completions.create(
          {
            model: this.model,
            messages: turns.map((turn) => this.formatTurn(turn)),
            max_tokens: this.maxTokens,
          },
          { timeout: this.timeoutMs }
        );
        return this.formatResponse(response, Date.now() - started);
      } catch (error) {
        lastError = error;

        if (!this.isRetryable(error) || attempt > this.maxRetries) {
          break;
        }

        const delayMs = this.retryDelayMs * Math.pow(2, attempt - 1);
        this.logger.warn({ attempt, delayMs, error: errorMessage(error) }, 'LLM request failed, retrying');
        await this.delay(delayMs);
      }
    }

    this.logger.error({ error: errorMessage(lastError) }, 'LLM request failed');
    throw new GenerationError('LLM request failed', lastError);
  }

  private formatTurn(turn: ChatTurn): OpenAI.ChatCompletionMessageParam {
    switch (turn.role) {
      case 'system':
        return { role: 'system', content: turn.content };
      case 'assistant':
        return { role: 'assistant', content: turn.content };
      case 'user':
        return { role: 'user', content: turn.content };
    }
  }

  private formatResponse(response: OpenAI.ChatCompletion, latencyMs: number): GenerationResult {
    const text = (response.choices[0]?.message.content ?? '').trim();
    if (!text) {
      throw new GenerationError('Empty response from LLM');
    }

    const tokenUsage: TokenUsage | null = response.usage
      ? {
          promptTokens: response.usage.prompt_tokens,
          completionTokens: response.usage.completion_tokens,
          totalTokens: response.usage.total_tokens,
        }
      : null;

    return {
      text,
      metadata: {
        model: response.model,
        latencyMs,
        tokenUsage,
        requestId: response.id || null,
      },
    };
  }

  /**
   * Connection failures (timeouts included), rate limits and gateway-class
   * statuses are worth another attempt; anything else is final.
   */
  private isRetryable(error: unknown): boolean {
    if (error instanceof OpenAI.APIConnectionError || error instanceof OpenAI.RateLimitError) {
      return true;
    }
    if (error instanceof OpenAI.APIError) {
      return error.status !== undefined && RETRY_STATUS_CODES.includes(error.status);
    }
    return false;
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
