import { AxiosError, AxiosHeaders } from 'axios';
import type { AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { OpenAICompatibleClient } from '../../../src/models/openai-compatible';
import { ModelError, ModelMalformedError, ModelRateLimitedError, ModelTimeoutError } from '../../../src/models/errors';
import type { Context } from '../../../src/context/types';

const CONTEXT: Context = {
  stage: 'planner',
  entries: [
    { role: 'system', content: 'You plan.', pinned: true },
    { role: 'assistant', content: 'Classification: complex', pinned: false },
    { role: 'tool', content: 'Step 1 (success): search\nresults', pinned: false },
    { role: 'user', content: 'Request:\nplan a trip', pinned: true },
  ],
  size: 0,
  budget: 1000,
  dropped: 0,
};

function createClient(post: jest.Mock): OpenAICompatibleClient {
  const http = { post } as unknown as AxiosInstance;
  return new OpenAICompatibleClient({ provider: 'kimi', apiKey: 'test-secret', baseUrl: 'http://localhost', model: 'kimi-test', temperature: 0.7, maxTokens: 4000, http });
}

function httpError(status: number, headers: Record<string, string> = {}): AxiosError {
  const config = { headers: new AxiosHeaders() } as InternalAxiosRequestConfig;
  const response = { status, statusText: '', headers, config, data: {} } as AxiosResponse;
  return new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_REQUEST, config, undefined, response);
}

describe('OpenAICompatibleClient', () => {
  it('should post the chat request and return the completion text', async () => {
    const post = jest.fn().mockResolvedValue({ data: { choices: [{ message: { content: 'a plan' } }] } });
    const client = createClient(post);
    const controller = new AbortController();

    const completion = await client.complete(CONTEXT, { temperature: 0.2, signal: controller.signal });

    expect(completion.text).toBe('a plan');
    expect(post).toHaveBeenCalledWith(
      '/chat/completions',
      {
        model: 'kimi-test',
        messages: [
          { role: 'system', content: 'You plan.' },
          { role: 'assistant', content: 'Classification: complex' },
          { role: 'user', content: '[tool result]\nStep 1 (success): search\nresults' },
          { role: 'user', content: 'Request:\nplan a trip' },
        ],
        temperature: 0.2,
        max_tokens: 4000,
      },
      { signal: controller.signal },
    );
  });

  it('should reject a body without choices as malformed', async () => {
    const client = createClient(jest.fn().mockResolvedValue({ data: { choices: [] } }));
    await expect(client.complete(CONTEXT, {})).rejects.toBeInstanceOf(ModelMalformedError);
  });

  it('should reject blank completion text as malformed', async () => {
    const client = createClient(jest.fn().mockResolvedValue({ data: { choices: [{ message: { content: '  ' } }] } }));
    await expect(client.complete(CONTEXT, {})).rejects.toThrow('kimi: malformed response: empty completion text');
  });

  it('should map HTTP 429 to a rate-limit error with retry-after', async () => {
    const client = createClient(jest.fn().mockRejectedValue(httpError(429, { 'retry-after': '2' })));

    const error = await client.complete(CONTEXT, {}).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ModelRateLimitedError);
    expect((error as ModelRateLimitedError).retryAfterMs).toBe(2000);
  });

  it('should map timeouts and cancellations to ModelTimeoutError', async () => {
    const timeout = new AxiosError('timeout of 100ms exceeded', AxiosError.ECONNABORTED);
    const canceled = new AxiosError('canceled', AxiosError.ERR_CANCELED);

    await expect(createClient(jest.fn().mockRejectedValue(timeout)).complete(CONTEXT, {})).rejects.toBeInstanceOf(ModelTimeoutError);
    await expect(createClient(jest.fn().mockRejectedValue(canceled)).complete(CONTEXT, {})).rejects.toBeInstanceOf(ModelTimeoutError);
  });

  it('should map other HTTP failures to a generic ModelError', async () => {
    const client = createClient(jest.fn().mockRejectedValue(httpError(500)));

    const error = await client.complete(CONTEXT, {}).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ModelError);
    expect(error).not.toBeInstanceOf(ModelTimeoutError);
    expect((error as ModelError).message).toBe('kimi: HTTP 500: Request failed with status code 500');
    expect((error as ModelError).code).toBe('MODEL_ERROR');
  });
});
