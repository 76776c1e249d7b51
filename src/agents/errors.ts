import { SequentError } from '../utils/errors';

export class AgentFailure extends SequentError {
  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, code, options);
    this.name = 'AgentFailure';
  }
}

/** Worth another attempt with the same context (bad sample, transient outage) */
export class RetryableAgentFailure extends AgentFailure {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'RETRYABLE_AGENT_FAILURE', options);
    this.name = 'RetryableAgentFailure';
  }
}

/** Aborts the run */
export class FatalAgentFailure extends AgentFailure {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'FATAL_AGENT_FAILURE', options);
    this.name = 'FatalAgentFailure';
  }
}

export class AgentTimeoutError extends AgentFailure {
  constructor(
    public role: string,
    public timeoutMs: number,
  ) {
    super(`${role} agent timed out after ${timeoutMs}ms`, 'AGENT_TIMEOUT');
    this.name = 'AgentTimeoutError';
  }
}
