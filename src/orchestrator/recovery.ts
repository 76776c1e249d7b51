import { AgentTimeoutError, FatalAgentFailure, RetryableAgentFailure } from '../agents/errors';
import { ModelRateLimitedError, ModelTimeoutError, ModelUnavailableError } from '../models/errors';
import { CapabilityNotFoundError, SequentError, errorMessage } from '../utils/errors';

/** Severity classification for errors */
export type ErrorSeverity = 'retryable' | 'fatal';

/** Structured classification of an error raised inside an agent call */
export interface ErrorClassification {
  severity: ErrorSeverity;
  code: string;
  message: string;
  details?: string;
}

/**
 * RecoveryManager decides whether a failed agent call is worth repeating.
 *
 *  - Timeouts, rate limits, transient network errors and explicit
 *    RetryableAgentFailure are retried with the same context.
 *  - ModelUnavailable (every fallback exhausted), missing capabilities,
 *    explicit FatalAgentFailure and anything unrecognised abort the run.
 */
export class RecoveryManager {
  constructor(
    private maxRetries: number = 3,
    private retryDelayMs: number = 0,
    private backoffMultiplier: number = 1,
  ) {}

  classify(error: unknown): ErrorClassification {
    const message = errorMessage(error);
    const details = error instanceof Error ? error.stack : undefined;

    if (error instanceof ModelUnavailableError || error instanceof CapabilityNotFoundError || error instanceof FatalAgentFailure) {
      return { severity: 'fatal', code: error.code, message, details };
    }

    if (error instanceof RetryableAgentFailure || error instanceof AgentTimeoutError || error instanceof ModelTimeoutError || error instanceof ModelRateLimitedError) {
      return { severity: 'retryable', code: error.code, message, details };
    }

    if (RecoveryManager.isTransient(message)) {
      return { severity: 'retryable', code: 'TRANSIENT_ERROR', message, details };
    }

    const code = error instanceof SequentError ? error.code : 'UNRECOVERABLE_ERROR';
    return { severity: 'fatal', code, message, details };
  }

  /** `retriesSoFar` counts repeats already made, not the first attempt */
  shouldRetry(retriesSoFar: number, classification: ErrorClassification): boolean {
    if (classification.severity === 'fatal') return false;
    return retriesSoFar < this.maxRetries;
  }

  /** Delay before repeat number `retry` (1-based); 0 unless configured */
  delayFor(retry: number): number {
    return Math.round(this.retryDelayMs * Math.pow(this.backoffMultiplier, Math.max(0, retry - 1)));
  }

  getMaxRetries(): number {
    return this.maxRetries;
  }

  // ── Private Helpers ─────────────────────────────────────────────────

  private static isTransient(message: string): boolean {
    const patterns = ['rate limit', 'timeout', 'timed out', 'ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'socket hang up', 'network error', 'status 429', 'status 503', 'status 502', 'HTTP 502', 'HTTP 503'];
    const lower = message.toLowerCase();
    return patterns.some((p) => lower.includes(p.toLowerCase()));
  }
}
