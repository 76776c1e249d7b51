import { ExecutorAgent } from '../agents/executor';
import { OrchestratorAgent } from '../agents/orchestrator';
import { PlannerAgent } from '../agents/planner';
import type { AgentRole } from '../agents/roles';
import type { Agent, AgentResult } from '../agents/types';
import { ValidatorAgent } from '../agents/validator';
import { CapabilityRegistry } from '../capabilities/registry';
import type { Config } from '../config/validator';
import { ContextManager } from '../context/context-manager';
import type { ModelRouter } from '../models/router';
import { silentLogger, type WorkflowLogger } from '../utils/logger';
import { snapshot, type AgentState } from './data-flow';

/**
 * AgentCoordinator maps each pipeline role to the agent that plays it and
 * prepares what the agent sees: a read-only snapshot of the state and a
 * context bounded by the configured budget.
 *
 * Agents are registered externally, real ones in production or scripted
 * stand-ins in tests, so the coordinator has no hard dependency on
 * concrete implementations.
 */
export class AgentCoordinator {
  private agents = new Map<AgentRole, Agent>();

  constructor(private contextBudget: number) {}

  /** Register the agent for its role, replacing any previous one */
  register(agent: Agent): this {
    this.agents.set(agent.role, agent);
    return this;
  }

  has(role: AgentRole): boolean {
    return this.agents.has(role);
  }

  getRegisteredRoles(): AgentRole[] {
    return [...this.agents.keys()];
  }

  /**
   * Run the agent registered for `role` against the current state.
   * @throws Error if no agent is registered for the role
   */
  async invoke(role: AgentRole, state: AgentState): Promise<AgentResult> {
    const agent = this.agents.get(role);
    if (!agent) {
      throw new Error(`No agent registered for role: ${role}`);
    }
    const view = snapshot(state);
    return agent.run(view, ContextManager.build(role, view, this.contextBudget));
  }
}

/** Coordinator with the four standard agents wired to the router and config */
export function createAgentCoordinator(config: Config, router: ModelRouter, registry: CapabilityRegistry = new CapabilityRegistry(), logger: WorkflowLogger = silentLogger): AgentCoordinator {
  const model = {
    router,
    modelName: config.model.name,
    temperature: config.model.temperature,
    maxTokens: config.model.max_tokens,
  };
  const options = {
    timeoutMs: config.agent.timeout_ms,
    maxRetries: config.agent.max_retries,
    retryDelayMs: config.agent.retry_delay_ms,
    backoffMultiplier: config.agent.backoff_multiplier,
    logger,
  };

  return new AgentCoordinator(config.context.size)
    .register(new OrchestratorAgent(model, options))
    .register(new PlannerAgent(model, options))
    .register(new ExecutorAgent(model, options, registry))
    .register(new ValidatorAgent(model, options));
}
