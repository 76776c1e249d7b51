import axios, { AxiosError, AxiosInstance } from 'axios';
import { z } from 'zod';
import type { Context } from '../context/types';
import { ModelError, ModelMalformedError, ModelRateLimitedError, ModelTimeoutError } from './errors';
import { toChatMessages } from './messages';
import type { Completion, CompletionOptions, ModelClient } from './types';

export interface OpenAICompatibleOptions {
  /** Label used in errors and routing decisions, e.g. "kimi" */
  provider: string;
  apiKey: string;
  baseUrl: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
  /** Transport timeout; agents enforce their own per-call timeout on top */
  timeoutMs?: number;
  /** Pre-built axios instance, primarily for testing */
  http?: AxiosInstance;
}

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      }),
    )
    .nonempty(),
});

/**
 * Client for any endpoint speaking the OpenAI chat-completions protocol
 * (OpenAI, Groq, Moonshot/Kimi).
 */
export class OpenAICompatibleClient implements ModelClient {
  private http: AxiosInstance;

  constructor(private options: OpenAICompatibleOptions) {
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs ?? 60000,
        headers: {
          Authorization: `Bearer ${options.apiKey}`,
          'Content-Type': 'application/json',
        },
      });
  }

  async complete(context: Context, options: CompletionOptions): Promise<Completion> {
    let data: unknown;
    try {
      const response = await this.http.post<unknown>(
        '/chat/completions',
        {
          model: this.options.model,
          messages: toChatMessages(context),
          temperature: options.temperature ?? this.options.temperature,
          max_tokens: options.maxTokens ?? this.options.maxTokens,
        },
        { signal: options.signal },
      );
      data = response.data;
    } catch (error) {
      throw this.mapError(error);
    }

    const parsed = chatResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ModelMalformedError(this.options.provider, parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', '));
    }

    const text = parsed.data.choices[0].message.content;
    if (!text.trim()) {
      throw new ModelMalformedError(this.options.provider, 'empty completion text');
    }
    return { text, raw: data };
  }

  private mapError(error: unknown): ModelError {
    const provider = this.options.provider;
    if (!(error instanceof AxiosError)) {
      return new ModelError(`${provider}: ${error instanceof Error ? error.message : String(error)}`, provider, 'MODEL_ERROR', { cause: error });
    }

    if (error.code === AxiosError.ECONNABORTED || error.code === AxiosError.ETIMEDOUT || error.code === AxiosError.ERR_CANCELED) {
      return new ModelTimeoutError(provider, { cause: error });
    }

    const status = error.response?.status;
    if (status === 429) {
      const retryAfter = Number(error.response?.headers['retry-after']);
      return new ModelRateLimitedError(provider, Number.isFinite(retryAfter) ? retryAfter * 1000 : undefined, { cause: error });
    }

    const label = status ? `HTTP ${status}` : 'network error';
    return new ModelError(`${provider}: ${label}: ${error.message}`, provider, 'MODEL_ERROR', { cause: error });
  }
}
