import { BaseAgent, type AgentOptions, type AttemptScope } from '../../../src/agents/base-agent';
import { FatalAgentFailure, RetryableAgentFailure } from '../../../src/agents/errors';
import type { Context } from '../../../src/context/types';
import { ModelUnavailableError } from '../../../src/models/errors';
import { createAgentState, snapshot, type AgentStateView, type StateDelta } from '../../../src/orchestrator/data-flow';
import { ScriptedModelClient, routerFor, sequence } from '../../helpers/scripted-model';

type Behaviour = (scope: AttemptScope, context: Context) => Promise<StateDelta>;

class TestAgent extends BaseAgent {
  readonly role = 'planner' as const;

  constructor(
    private behaviour: Behaviour,
    options: Partial<AgentOptions> = {},
    client = new ScriptedModelClient(sequence('reply')),
  ) {
    super({ router: routerFor(client), modelName: 'default' }, { timeoutMs: 1000, maxRetries: 2, ...options });
  }

  protected execute(_view: AgentStateView, context: Context, scope: AttemptScope): Promise<StateDelta> {
    return this.behaviour(scope, context);
  }
}

const VIEW = snapshot(createAgentState('task'));
const CONTEXT: Context = { stage: 'planner', entries: [], size: 0, budget: 1000, dropped: 0 };

describe('BaseAgent', () => {
  it('should return the payload of a successful attempt', async () => {
    const agent = new TestAgent(async () => ({ plan: [] }));

    const result = await agent.run(VIEW, CONTEXT);

    expect(result).toEqual({ status: 'success', payload: { plan: [] }, diagnostics: [], routes: [], attempts: 1 });
  });

  it('should retry retryable failures with the same context', async () => {
    const seen: Context[] = [];
    let calls = 0;
    const agent = new TestAgent(async (_scope, context) => {
      seen.push(context);
      calls++;
      if (calls < 3) throw new RetryableAgentFailure(`bad sample ${calls}`);
      return {};
    });

    const result = await agent.run(VIEW, CONTEXT);

    expect(result.status).toBe('success');
    expect(result.attempts).toBe(3);
    expect(result.diagnostics).toEqual(['attempt 1: bad sample 1', 'attempt 2: bad sample 2']);
    expect(seen.every((c) => c === CONTEXT)).toBe(true);
  });

  it('should turn exhausted retries into a fatal failure', async () => {
    const behaviour = jest.fn().mockRejectedValue(new RetryableAgentFailure('still bad'));
    const agent = new TestAgent(behaviour, { maxRetries: 2 });

    const result = await agent.run(VIEW, CONTEXT);

    expect(behaviour).toHaveBeenCalledTimes(3);
    expect(result.status).toBe('fatal_failure');
    if (result.status === 'success') throw new Error('expected failure');
    expect(result.error).toEqual({ code: 'RETRIES_EXHAUSTED', message: 'planner agent failed after 3 attempt(s): still bad' });
    expect(result.diagnostics).toHaveLength(3);
  });

  it('should not retry fatal failures', async () => {
    const behaviour = jest.fn().mockRejectedValue(new FatalAgentFailure('unrecoverable'));
    const agent = new TestAgent(behaviour);

    const result = await agent.run(VIEW, CONTEXT);

    expect(behaviour).toHaveBeenCalledTimes(1);
    expect(result).toMatchObject({ status: 'fatal_failure', error: { code: 'FATAL_AGENT_FAILURE', message: 'unrecoverable' }, attempts: 1 });
  });

  it('should treat an unavailable model as fatal', async () => {
    const agent = new TestAgent(async () => {
      throw new ModelUnavailableError('default');
    });

    const result = await agent.run(VIEW, CONTEXT);

    expect(result).toMatchObject({ status: 'fatal_failure', error: { code: 'MODEL_UNAVAILABLE' } });
  });

  it('should abort a timed-out attempt and retry it', async () => {
    const signals: AbortSignal[] = [];
    let calls = 0;
    const agent = new TestAgent(
      (scope) => {
        signals.push(scope.signal);
        calls++;
        if (calls === 1) return new Promise<StateDelta>(() => undefined);
        return Promise.resolve({ plan: [] });
      },
      { timeoutMs: 20, maxRetries: 1 },
    );

    const result = await agent.run(VIEW, CONTEXT);

    expect(result.status).toBe('success');
    expect(result.attempts).toBe(2);
    expect(result.diagnostics).toEqual(['attempt 1: planner agent timed out after 20ms']);
    expect(signals[0]?.aborted).toBe(true);
    expect(signals[1]?.aborted).toBe(false);
  });

  it('should report a timeout on the last attempt as exhausted retries', async () => {
    const agent = new TestAgent(() => new Promise<StateDelta>(() => undefined), { timeoutMs: 10, maxRetries: 0 });

    const result = await agent.run(VIEW, CONTEXT);

    expect(result).toMatchObject({ status: 'fatal_failure', error: { code: 'RETRIES_EXHAUSTED' }, attempts: 1 });
  });

  it('should collect the routing decision of every model call', async () => {
    const client = new ScriptedModelClient(sequence('one', 'two'));
    const agent = new TestAgent(
      async (scope, context) => {
        await scope.complete(context);
        await scope.complete(context);
        return {};
      },
      {},
      client,
    );

    const result = await agent.run(VIEW, CONTEXT);

    expect(result.routes.map((r) => r.entryId)).toEqual(['scripted-1', 'scripted-1']);
    expect(client.options[0]?.signal).toBeInstanceOf(AbortSignal);
  });

  it('should wait the configured delay between attempts', async () => {
    jest.useFakeTimers();
    try {
      let calls = 0;
      const agent = new TestAgent(
        async () => {
          calls++;
          if (calls === 1) throw new RetryableAgentFailure('transient');
          return {};
        },
        { retryDelayMs: 500, timeoutMs: 60000 },
      );

      const pending = agent.run(VIEW, CONTEXT);
      await jest.advanceTimersByTimeAsync(499);
      expect(calls).toBe(1);
      await jest.advanceTimersByTimeAsync(1);

      await expect(pending).resolves.toMatchObject({ status: 'success', attempts: 2 });
    } finally {
      jest.useRealTimers();
    }
  });
});
