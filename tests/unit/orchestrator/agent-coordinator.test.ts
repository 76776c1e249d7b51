import { AgentCoordinator, createAgentCoordinator } from '../../../src/orchestrator/agent-coordinator';
import { createAgentState } from '../../../src/orchestrator/data-flow';
import type { Agent, AgentResult } from '../../../src/agents/types';
import { routerFor, ScriptedModelClient, sequence, testConfig } from '../../helpers/scripted-model';

const SUCCESS: AgentResult = { status: 'success', payload: {}, diagnostics: [], routes: [], attempts: 1 };

describe('AgentCoordinator', () => {
  it('should run the registered agent with a snapshot and a bounded context', async () => {
    const run = jest.fn().mockResolvedValue(SUCCESS);
    const agent: Agent = { role: 'planner', run };
    const coordinator = new AgentCoordinator(512).register(agent);
    const state = createAgentState('task');

    const result = await coordinator.invoke('planner', state);

    expect(result).toBe(SUCCESS);
    const [view, context] = run.mock.calls[0] as Parameters<Agent['run']>;
    expect(view).toEqual(state);
    expect(view).not.toBe(state);
    expect(context.stage).toBe('planner');
    expect(context.budget).toBe(512);
  });

  it('should throw when no agent is registered for a role', async () => {
    await expect(new AgentCoordinator(512).invoke('validator', createAgentState('task'))).rejects.toThrow('No agent registered for role: validator');
  });

  it('should wire all four agents from configuration', () => {
    const coordinator = createAgentCoordinator(testConfig(), routerFor(new ScriptedModelClient(sequence('x'))));

    expect(coordinator.getRegisteredRoles().sort()).toEqual(['executor', 'orchestrator', 'planner', 'validator']);
    expect(coordinator.has('executor')).toBe(true);
  });
});
