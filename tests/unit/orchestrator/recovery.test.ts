import { RecoveryManager } from '../../../src/orchestrator/recovery';
import { AgentTimeoutError, FatalAgentFailure, RetryableAgentFailure } from '../../../src/agents/errors';
import { ModelMalformedError, ModelRateLimitedError, ModelTimeoutError, ModelUnavailableError } from '../../../src/models/errors';
import { CapabilityNotFoundError } from '../../../src/utils/errors';

describe('RecoveryManager', () => {
  const recovery = new RecoveryManager(3);

  it.each([
    ['retryable agent failure', new RetryableAgentFailure('bad json'), 'RETRYABLE_AGENT_FAILURE'],
    ['agent timeout', new AgentTimeoutError('planner', 100), 'AGENT_TIMEOUT'],
    ['model timeout', new ModelTimeoutError('kimi'), 'MODEL_TIMEOUT'],
    ['rate limit', new ModelRateLimitedError('kimi'), 'MODEL_RATE_LIMITED'],
    ['transient network error', new Error('read ECONNRESET'), 'TRANSIENT_ERROR'],
  ])('should classify a %s as retryable', (_label, error, code) => {
    expect(recovery.classify(error)).toMatchObject({ severity: 'retryable', code });
  });

  it.each([
    ['fatal agent failure', new FatalAgentFailure('nope'), 'FATAL_AGENT_FAILURE'],
    ['unavailable model', new ModelUnavailableError('default'), 'MODEL_UNAVAILABLE'],
    ['missing capability', new CapabilityNotFoundError('search', 'tool'), 'CAPABILITY_NOT_FOUND'],
    ['malformed reply that escaped the router', new ModelMalformedError('kimi', 'empty'), 'MODEL_MALFORMED'],
    ['unknown error', new Error('Cannot read properties of undefined'), 'UNRECOVERABLE_ERROR'],
  ])('should classify a %s as fatal', (_label, error, code) => {
    expect(recovery.classify(error)).toMatchObject({ severity: 'fatal', code });
  });

  it('should classify non-Error values by message', () => {
    expect(recovery.classify('socket hang up')).toMatchObject({ severity: 'retryable', message: 'socket hang up' });
  });

  it('should allow retries up to the maximum', () => {
    const retryable = recovery.classify(new RetryableAgentFailure('x'));
    expect(recovery.shouldRetry(0, retryable)).toBe(true);
    expect(recovery.shouldRetry(2, retryable)).toBe(true);
    expect(recovery.shouldRetry(3, retryable)).toBe(false);
    expect(recovery.shouldRetry(0, recovery.classify(new FatalAgentFailure('x')))).toBe(false);
  });

  it('should compute no delay by default and exponential backoff when configured', () => {
    expect(recovery.delayFor(1)).toBe(0);

    const backoff = new RecoveryManager(3, 100, 2);
    expect([1, 2, 3].map((n) => backoff.delayFor(n))).toEqual([100, 200, 400]);
  });
});
