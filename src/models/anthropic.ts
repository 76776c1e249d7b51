import Anthropic from '@anthropic-ai/sdk';
import type { Context } from '../context/types';
import { ModelError, ModelMalformedError, ModelRateLimitedError, ModelTimeoutError } from './errors';
import { splitSystemPrompt } from './messages';
import type { Completion, CompletionOptions, ModelClient } from './types';

const DEFAULT_MODEL = 'claude-sonnet-4-20250514';
const DEFAULT_MAX_TOKENS = 4000;

export interface AnthropicClientOptions {
  provider?: string;
  apiKey: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
  /** Pre-built SDK instance, primarily for testing */
  sdk?: Anthropic;
}

export class AnthropicClient implements ModelClient {
  private sdk: Anthropic;
  private provider: string;
  private model: string;

  constructor(private options: AnthropicClientOptions) {
    this.provider = options.provider ?? 'claude';
    this.model = options.model ?? DEFAULT_MODEL;
    // Retries belong to the router and the agents, not the SDK
    this.sdk = options.sdk ?? new Anthropic({ apiKey: options.apiKey, maxRetries: 0, timeout: options.timeoutMs });
  }

  async complete(context: Context, options: CompletionOptions): Promise<Completion> {
    const { system, messages } = splitSystemPrompt(context);
    if (messages.length === 0) {
      throw new ModelError(`${this.provider}: context has no user message`, this.provider);
    }

    let response: Anthropic.Message;
    try {
      response = await this.sdk.messages.create(
        {
          model: this.model,
          max_tokens: options.maxTokens ?? this.options.maxTokens ?? DEFAULT_MAX_TOKENS,
          temperature: options.temperature ?? this.options.temperature,
          system: system || undefined,
          messages,
        },
        { signal: options.signal },
      );
    } catch (error) {
      throw this.mapError(error);
    }

    const text = response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('')
      .trim();
    if (!text) {
      throw new ModelMalformedError(this.provider, 'response contained no text content');
    }
    return { text, raw: response };
  }

  private mapError(error: unknown): ModelError {
    if (error instanceof Anthropic.RateLimitError) {
      return new ModelRateLimitedError(this.provider, undefined, { cause: error });
    }
    if (error instanceof Anthropic.APIConnectionTimeoutError || error instanceof Anthropic.APIUserAbortError) {
      return new ModelTimeoutError(this.provider, { cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new ModelError(`${this.provider}: ${message}`, this.provider, 'MODEL_ERROR', { cause: error });
  }
}
