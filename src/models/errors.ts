import { SequentError } from '../utils/errors';
import type { RouteFailure } from './types';

export class ModelError extends SequentError {
  constructor(
    message: string,
    public provider?: string,
    code = 'MODEL_ERROR',
    options?: { cause?: unknown },
  ) {
    super(message, code, options);
    this.name = 'ModelError';
  }
}

export class ModelTimeoutError extends ModelError {
  constructor(provider: string, options?: { cause?: unknown }) {
    super(`${provider}: request timed out`, provider, 'MODEL_TIMEOUT', options);
    this.name = 'ModelTimeoutError';
  }
}

export class ModelRateLimitedError extends ModelError {
  constructor(
    provider: string,
    public retryAfterMs?: number,
    options?: { cause?: unknown },
  ) {
    super(`${provider}: rate limit exceeded`, provider, 'MODEL_RATE_LIMITED', options);
    this.name = 'ModelRateLimitedError';
  }
}

export class ModelMalformedError extends ModelError {
  constructor(provider: string, detail: string) {
    super(`${provider}: malformed response: ${detail}`, provider, 'MODEL_MALFORMED');
    this.name = 'ModelMalformedError';
  }
}

/** Every fallback entry for a logical model failed, or none is registered */
export class ModelUnavailableError extends ModelError {
  constructor(
    public logicalName: string,
    public failures: RouteFailure[] = [],
  ) {
    const tried = failures.map((f) => `${f.entryId} (${f.code}: ${f.message})`).join('; ');
    super(failures.length ? `Model "${logicalName}" unavailable, all fallbacks failed: ${tried}` : `Model "${logicalName}" has no registered clients`, undefined, 'MODEL_UNAVAILABLE');
    this.name = 'ModelUnavailableError';
  }
}
