/**
 * Language-model provider contract.
 *
 * The response generator and the router only ever need a single
 * non-streaming chat completion, so the contract stays that small.
 */

import type { Logger } from '../types/index.js';

export type MessageRole = 'system' | 'user' | 'assistant';

export interface Message {
  role: MessageRole;
  content: string;
}

export interface CompletionRequest {
  messages: Message[];
  /** Overrides the provider's default model */
  model?: string | undefined;
  maxTokens?: number | undefined;
  temperature?: number | undefined;
  timeoutMs?: number | undefined;
}

export type FinishReason = 'stop' | 'length' | 'content_filter' | 'error';

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface CompletionResponse {
  /** Null when the model produced no text */
  content: string | null;
  model: string;
  usage?: TokenUsage | undefined;
  finishReason?: FinishReason | undefined;
}

export interface LLMProvider {
  readonly name: string;
  isAvailable(): boolean;
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

/**
 * Provider failure. `retryable` marks transient faults (rate limits,
 * timeouts, 5xx) that are worth another attempt.
 */
export class LLMError extends Error {
  readonly statusCode?: number | undefined;
  readonly retryable: boolean;

  constructor(
    message: string,
    readonly provider: string,
    options: { statusCode?: number | undefined; retryable?: boolean | undefined } = {}
  ) {
    super(message);
    this.name = 'LLMError';
    this.statusCode = options.statusCode;
    this.retryable = options.retryable ?? false;
  }
}

/**
 * Shared timing and debug logging around `doComplete()`.
 */
export abstract class BaseLLMProvider implements LLMProvider {
  abstract readonly name: string;
  protected readonly logger?: Logger | undefined;
  private requests = 0;

  constructor(logger?: Logger) {
    this.logger = logger?.child({ component: 'llm' });
  }

  abstract isAvailable(): boolean;

  protected abstract doComplete(request: CompletionRequest): Promise<CompletionResponse>;

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const requestId = ++this.requests;
    const started = Date.now();
    this.logger?.debug(
      { requestId, provider: this.name, model: request.model, messages: request.messages.length },
      'Completion requested'
    );

    try {
      const response = await this.doComplete(request);
      this.logger?.debug(
        {
          requestId,
          model: response.model,
          durationMs: Date.now() - started,
          finishReason: response.finishReason,
          totalTokens: response.usage?.totalTokens,
        },
        'Completion received'
      );
      return response;
    } catch (error) {
      this.logger?.error(
        {
          requestId,
          provider: this.name,
          durationMs: Date.now() - started,
          error: error instanceof Error ? error.message : String(error),
          retryable: error instanceof LLMError && error.retryable,
        },
        'Completion failed'
      );
      throw error;
    }
  }
}
