/**
 * LLM provider on the Vercel AI SDK (`ai` v5).
 *
 * OpenRouter is reached through @openrouter/ai-sdk-provider, local
 * OpenAI-compatible servers (LM Studio, Ollama, vLLM) through the chat model
 * of @ai-sdk/openai.
 */

import { createOpenRouter } from '@openrouter/ai-sdk-provider';
import { createOpenAI } from '@ai-sdk/openai';
import { generateText } from 'ai';
import type { LanguageModel, ModelMessage } from 'ai';
import type { Logger } from '../types/index.js';
import type { CompletionRequest, CompletionResponse, FinishReason, Message } from './provider.js';
import { BaseLLMProvider, LLMError } from './provider.js';

export interface VercelAIOpenRouterConfig {
  apiKey: string;
  model?: string | undefined;
  /** Sent as X-Title so runs show up by name on the OpenRouter dashboard */
  appName?: string | undefined;
}

export interface VercelAILocalConfig {
  /** e.g. http://localhost:1234/v1 */
  baseUrl: string;
  model: string;
}

export type VercelAIProviderConfig = VercelAIOpenRouterConfig | VercelAILocalConfig;

export interface VercelAIRequestOptions {
  timeoutMs?: number | undefined;
  /** Attempts after the first one */
  maxRetries?: number | undefined;
  retryDelayMs?: number | undefined;
}

const DEFAULT_OPENROUTER_MODEL = 'anthropic/claude-3.5-haiku';
const DEFAULT_TIMEOUT_MS = 60_000;
const DEFAULT_MAX_RETRIES = 2;
const DEFAULT_RETRY_DELAY_MS = 1000;

function isOpenRouter(config: VercelAIProviderConfig): config is VercelAIOpenRouterConfig {
  return 'apiKey' in config;
}

function statusCodeOf(error: unknown): number | undefined {
  // APICallError carries the HTTP status as `statusCode`
  if (error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

/**
 * Map an SDK failure onto an LLMError, deciding whether it is worth retrying.
 */
export function classifyFailure(error: unknown, provider: string): LLMError {
  if (error instanceof LLMError) return error;

  const message = error instanceof Error ? error.message : String(error);
  const statusCode = statusCodeOf(error);

  if (statusCode === 429) {
    return new LLMError(`Rate limit: ${message}`, provider, { statusCode, retryable: true });
  }
  if (statusCode !== undefined && statusCode >= 500) {
    return new LLMError(`Server error: ${message}`, provider, { statusCode, retryable: true });
  }
  if (statusCode === 408) {
    return new LLMError(`Request timeout: ${message}`, provider, { statusCode, retryable: true });
  }
  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return new LLMError('Request timed out', provider, { retryable: true });
  }
  if (statusCode === undefined && /rate limit/i.test(message)) {
    return new LLMError(`Rate limit: ${message}`, provider, { statusCode: 429, retryable: true });
  }
  return new LLMError(message, provider, { statusCode, retryable: false });
}

/**
 * Wait before retry `attempt` (0-based): doubling for rate limits, linear otherwise.
 */
export function retryDelay(attempt: number, baseMs: number, rateLimited: boolean): number {
  return rateLimited ? baseMs * 2 ** (attempt + 1) : baseMs * (attempt + 1);
}

function toFinishReason(reason: string | undefined): FinishReason {
  switch (reason) {
    case 'stop':
    case 'length':
      return reason;
    case 'content-filter':
      return 'content_filter';
    default:
      return 'error';
  }
}

function toModelMessage({ role, content }: Message): ModelMessage {
  switch (role) {
    case 'system':
      return { role, content };
    case 'user':
      return { role, content };
    case 'assistant':
      return { role, content };
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Non-streaming completions through generateText().
 *
 * The SDK's own retries are switched off (`maxRetries: 0`); this class retries
 * transient failures itself so every attempt is logged.
 */
export class VercelAIProvider extends BaseLLMProvider {
  readonly name: string;
  private readonly config: VercelAIProviderConfig;
  private readonly providerLogger?: Logger | undefined;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(config: VercelAIProviderConfig, logger?: Logger, options: VercelAIRequestOptions = {}) {
    super(logger);
    this.config = config;
    this.name = isOpenRouter(config) ? 'openrouter' : 'local';
    this.providerLogger = logger?.child({ component: 'vercel-ai-provider', provider: this.name });
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;

    this.providerLogger?.info(
      {
        model: this.defaultModel,
        ...(isOpenRouter(config) ? {} : { baseUrl: config.baseUrl }),
      },
      'LLM provider ready'
    );
  }

  isAvailable(): boolean {
    return isOpenRouter(this.config)
      ? this.config.apiKey !== ''
      : this.config.baseUrl !== '' && this.config.model !== '';
  }

  private get defaultModel(): string {
    return isOpenRouter(this.config)
      ? (this.config.model ?? DEFAULT_OPENROUTER_MODEL)
      : this.config.model;
  }

  private model(modelId: string): LanguageModel {
    if (isOpenRouter(this.config)) {
      return createOpenRouter({ apiKey: this.config.apiKey })(modelId);
    }
    // Local servers ignore the key, but the client insists on one
    return createOpenAI({ baseURL: this.config.baseUrl, apiKey: 'local' }).chat(modelId);
  }

  private headers(): Record<string, string> | undefined {
    if (!isOpenRouter(this.config) || !this.config.appName) return undefined;
    return {
      'X-Title': this.config.appName,
      'User-Agent': `${this.config.appName}/1.0`,
    };
  }

  protected async doComplete(request: CompletionRequest): Promise<CompletionResponse> {
    if (!this.isAvailable()) {
      throw new LLMError('VercelAIProvider not configured', this.name);
    }
    const modelId = request.model ?? this.defaultModel;

    for (let attempt = 0; ; attempt++) {
      try {
        return await this.attempt(request, modelId);
      } catch (error) {
        const failure = classifyFailure(error, this.name);
        if (!failure.retryable || attempt >= this.maxRetries) {
          this.providerLogger?.error(
            { attempts: attempt + 1, statusCode: failure.statusCode, message: failure.message },
            failure.retryable ? 'Retries exhausted' : 'Non-retryable LLM error'
          );
          throw failure;
        }

        const delayMs = retryDelay(attempt, this.retryDelayMs, failure.statusCode === 429);
        this.providerLogger?.warn(
          { attempt: attempt + 1, maxRetries: this.maxRetries, delayMs, message: failure.message },
          'Retrying LLM request'
        );
        await sleep(delayMs);
      }
    }
  }

  private async attempt(request: CompletionRequest, modelId: string): Promise<CompletionResponse> {
    const headers = this.headers();
    const result = await generateText({
      model: this.model(modelId),
      messages: request.messages.map(toModelMessage),
      ...(request.temperature !== undefined && { temperature: request.temperature }),
      ...(request.maxTokens !== undefined && { maxOutputTokens: request.maxTokens }),
      ...(headers && { headers }),
      maxRetries: 0,
      abortSignal: AbortSignal.timeout(request.timeoutMs ?? this.timeoutMs),
    });

    return {
      content: result.text || null,
      model: modelId,
      finishReason: toFinishReason(result.finishReason),
      usage: {
        promptTokens: result.usage.inputTokens ?? 0,
        completionTokens: result.usage.outputTokens ?? 0,
        totalTokens: result.usage.totalTokens ?? 0,
      },
    };
  }
}

export function createVercelAIProvider(
  config: VercelAIProviderConfig,
  logger?: Logger,
  options?: VercelAIRequestOptions
): VercelAIProvider {
  return new VercelAIProvider(config, logger, options);
}
