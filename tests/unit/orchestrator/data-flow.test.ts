import { applyDelta, createAgentState, finalizeOutput, resetForRetry, snapshot, withPlan } from '../../../src/orchestrator/data-flow';

describe('data-flow', () => {
  it('should create a state with deduplicated capability sets', () => {
    const state = createAgentState('task', ['a', 'b', 'a'], ['s', 's']);

    expect(state).toEqual({ input: 'task', plan: [], actions: [], results: [], retryCount: 0, availableTools: ['a', 'b'], availableSkills: ['s'] });
  });

  it('should snapshot by deep copy', () => {
    const state = createAgentState('task', ['a']);
    const view = snapshot(state);
    state.availableTools.push('b');

    expect(view.availableTools).toEqual(['a']);
  });

  describe('applyDelta', () => {
    const classification = { complexity: 'complex' as const, requiresPlanning: true, routing: 'full_pipeline' as const };

    it('should replace the plan and append results and actions', () => {
      let state = createAgentState('task');
      state = applyDelta(state, { plan: [{ index: 1, description: 'a', arguments: {}, revision: 0 }] });
      state = applyDelta(state, { plan: [{ index: 1, description: 'b', arguments: {}, revision: 0 }] });
      state = applyDelta(state, { results: [{ step: 1, description: 'b', status: 'success', output: 'x' }] });
      state = applyDelta(state, { results: [{ step: 2, description: 'c', status: 'success', output: 'y' }] });

      expect(state.plan.map((s) => s.description)).toEqual(['b']);
      expect(state.results.map((r) => r.step)).toEqual([1, 2]);
    });

    it('should overwrite validation', () => {
      let state = applyDelta(createAgentState('task'), { validation: { verdict: 'fail', diagnostics: [{ message: 'x' }] } });
      state = applyDelta(state, { validation: { verdict: 'pass', diagnostics: [] } });

      expect(state.validation).toEqual({ verdict: 'pass', diagnostics: [] });
    });

    it('should set classification once', () => {
      const state = applyDelta(createAgentState('task'), { classification });

      expect(applyDelta(state, { classification }).classification).toEqual(classification);
      expect(() => applyDelta(state, { classification: { complexity: 'simple', requiresPlanning: false, routing: 'skip_planning' } })).toThrow('Classification is already committed for this run');
    });

    it('should not mutate its input', () => {
      const state = createAgentState('task');
      applyDelta(state, { classification });

      expect(state.classification).toBeUndefined();
    });
  });

  it('should increment retryCount and clear the failed pass on retry', () => {
    const state = createAgentState('task');
    state.results = [{ step: 1, description: 'a', status: 'failed', error: 'x' }];
    state.actions = [{ step: 1, kind: 'model', name: 'm', startedAt: 'now', durationMs: 1 }];
    state.validation = { verdict: 'fail', diagnostics: [{ message: 'x' }] };

    const next = resetForRetry(state);

    expect(next.retryCount).toBe(1);
    expect(next.results).toEqual([]);
    expect(next.actions).toEqual([]);
    expect(next.validation).toEqual(state.validation);
    expect(resetForRetry(next).retryCount).toBe(2);
  });

  it('should replace the plan without touching the given state', () => {
    const state = createAgentState('task', ['search']);
    state.plan = [{ index: 1, description: 'old', arguments: {}, revision: 0 }];
    const step = { index: 1, description: 'Answer directly', arguments: {}, revision: 2 };

    const next = withPlan(state, [step]);
    step.description = 'changed afterwards';

    expect(next.plan).toEqual([{ index: 1, description: 'Answer directly', arguments: {}, revision: 2 }]);
    expect(next.availableTools).toEqual(['search']);
    expect(state.plan).toEqual([{ index: 1, description: 'old', arguments: {}, revision: 0 }]);
  });

  it('should finalize with the last successful step output', () => {
    const state = createAgentState('task');
    state.results = [
      { step: 1, description: 'a', status: 'success', output: 'first' },
      { step: 2, description: 'b', status: 'success', output: 'second' },
      { step: 3, description: 'c', status: 'failed', error: 'x' },
    ];

    expect(finalizeOutput(state).output).toBe('second');
    expect(finalizeOutput(createAgentState('task')).output).toBe('');
  });
});
