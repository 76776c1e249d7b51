import { PlannerAgent } from '../../../src/agents/planner';
import { ContextManager } from '../../../src/context/context-manager';
import { createAgentState, snapshot, type AgentState } from '../../../src/orchestrator/data-flow';
import { ScriptedModelClient, json, routerFor, sequence } from '../../helpers/scripted-model';

function createAgent(client: ScriptedModelClient): PlannerAgent {
  return new PlannerAgent({ router: routerFor(client), modelName: 'default' }, { timeoutMs: 1000, maxRetries: 1 });
}

const TWO_STEPS = json({
  plan: [
    { step: 1, action: 'Search for flights', tool: 'flight_search', inputs: { from: 'AMS' }, expected_output: 'flight list' },
    { step: 2, action: 'Pick the cheapest flight', tool: 'none' },
  ],
});

function baseState(): AgentState {
  const state = createAgentState('Find me a flight', ['flight_search'], []);
  state.classification = { complexity: 'complex', requiresPlanning: true, routing: 'full_pipeline' };
  return state;
}

describe('PlannerAgent', () => {
  it('should turn the model plan into indexed plan steps', async () => {
    const view = snapshot(baseState());
    const result = await createAgent(new ScriptedModelClient(sequence(TWO_STEPS))).run(view, ContextManager.build('planner', view, 8192));

    expect(result.status).toBe('success');
    if (result.status !== 'success') return;
    expect(result.payload.plan).toEqual([
      { index: 1, description: 'Search for flights', capability: { kind: 'tool', name: 'flight_search' }, arguments: { from: 'AMS' }, expectedOutput: 'flight list', revision: 0 },
      { index: 2, description: 'Pick the cheapest flight', arguments: {}, revision: 0 },
    ]);
  });

  it('should re-sample a plan that names an unavailable tool', async () => {
    const bad = json({ plan: [{ action: 'Browse', tool: 'web_browser' }] });
    const good = json({ plan: [{ action: 'Answer from memory' }] });
    const client = new ScriptedModelClient(sequence(bad, good));
    const view = snapshot(baseState());

    const result = await createAgent(client).run(view, ContextManager.build('planner', view, 8192));

    expect(result).toMatchObject({ status: 'success', attempts: 2, diagnostics: ['attempt 1: PlannerAgent: step references unavailable tool "web_browser"'] });
  });

  it('should reject an empty plan', async () => {
    const client = new ScriptedModelClient(sequence(json({ plan: [] })));
    const view = snapshot(baseState());

    const result = await createAgent(client).run(view, ContextManager.build('planner', view, 8192));

    expect(result.status).toBe('fatal_failure');
  });

  it('should append remediation steps when a retry reproduces the rejected plan', async () => {
    const state = baseState();
    state.retryCount = 1;
    state.plan = [
      { index: 1, description: 'Search for flights', capability: { kind: 'tool', name: 'flight_search' }, arguments: { from: 'AMS' }, expectedOutput: 'flight list', revision: 0 },
      { index: 2, description: 'Pick the cheapest flight', arguments: {}, revision: 0 },
    ];
    state.validation = { verdict: 'fail', diagnostics: [{ step: 2, message: 'price was not compared' }, { message: 'answer lacks dates' }] };
    const view = snapshot(state);

    const result = await createAgent(new ScriptedModelClient(sequence(TWO_STEPS))).run(view, ContextManager.build('planner', view, 8192));

    expect(result.status).toBe('success');
    if (result.status !== 'success') return;
    const plan = result.payload.plan ?? [];
    expect(plan).toHaveLength(4);
    expect(plan.slice(2)).toEqual([
      { index: 3, description: 'Address validator feedback on step 2: price was not compared', arguments: {}, revision: 1 },
      { index: 4, description: 'Address validator feedback: answer lacks dates', arguments: {}, revision: 1 },
    ]);
    expect(plan.every((s) => s.revision === 1)).toBe(true);
  });

  it('should keep a genuinely revised plan as it is', async () => {
    const state = baseState();
    state.retryCount = 1;
    state.plan = [{ index: 1, description: 'Guess', arguments: {}, revision: 0 }];
    state.validation = { verdict: 'fail', diagnostics: [{ message: 'be precise' }] };
    const view = snapshot(state);

    const result = await createAgent(new ScriptedModelClient(sequence(TWO_STEPS))).run(view, ContextManager.build('planner', view, 8192));

    expect(result).toMatchObject({ status: 'success' });
    if (result.status !== 'success') return;
    expect(result.payload.plan).toHaveLength(2);
  });
});
