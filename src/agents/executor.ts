import type { CapabilityRegistry } from '../capabilities/registry';
import { ContextManager } from '../context/context-manager';
import type { Context } from '../context/types';
import type { ActionRecord, AgentStateView, CapabilityRef, PlanStep, StateDelta, StepResult } from '../orchestrator/data-flow';
import { CapabilityNotFoundError, errorMessage } from '../utils/errors';
import { BaseAgent, type AgentModelSettings, type AgentOptions, type AttemptScope } from './base-agent';

/**
 * Runs the plan one step at a time. Capability steps go through the registry;
 * steps without a capability are answered by the model with the results of
 * the earlier steps in context. A failing capability marks its step failed
 * and execution moves on; model and lookup errors abort the attempt.
 */
export class ExecutorAgent extends BaseAgent {
  readonly role = 'executor' as const;

  constructor(
    model: AgentModelSettings,
    options: AgentOptions,
    private registry: CapabilityRegistry,
  ) {
    super(model, options);
  }

  protected async execute(view: AgentStateView, context: Context, scope: AttemptScope): Promise<StateDelta> {
    const actions: ActionRecord[] = [];
    const results: StepResult[] = [];

    for (const step of view.plan) {
      if (scope.signal.aborted) break;

      const startedAt = new Date().toISOString();
      const began = Date.now();
      this.logger.debug(`Executing step ${step.index}/${view.plan.length}`, { capability: step.capability?.name ?? 'model' });

      const result = step.capability
        ? await this.runCapability(step, step.capability, view, scope.signal)
        : await this.runModelStep(step, { ...view, results: [...view.results, ...results] }, context.budget, scope);

      results.push(result);
      actions.push({
        step: step.index,
        kind: step.capability?.kind ?? 'model',
        name: step.capability?.name ?? result.model ?? 'model',
        startedAt,
        durationMs: Date.now() - began,
      });

      if (result.status === 'failed') {
        this.logger.warn(`Step ${step.index} failed`, { error: result.error });
      }
    }

    return { actions, results };
  }

  private async runCapability(step: PlanStep, ref: CapabilityRef, view: AgentStateView, signal: AbortSignal): Promise<StepResult> {
    const available = ref.kind === 'tool' ? view.availableTools : view.availableSkills;
    if (!available.includes(ref.name) || !this.registry.has(ref.kind, ref.name)) {
      throw new CapabilityNotFoundError(ref.name, ref.kind);
    }

    const base = { step: step.index, description: step.description, capability: ref };
    try {
      const outcome = await this.registry.invoke(ref, step.arguments, view, signal);
      if (outcome.status === 'failed') {
        return { ...base, status: 'failed', error: renderPayload(outcome.payload) || `${ref.kind} ${ref.name} reported failure` };
      }
      return { ...base, status: 'success', output: renderPayload(outcome.payload) };
    } catch (error) {
      if (error instanceof CapabilityNotFoundError) throw error;
      return { ...base, status: 'failed', error: errorMessage(error) };
    }
  }

  private async runModelStep(step: PlanStep, view: AgentStateView, budget: number, scope: AttemptScope): Promise<StepResult> {
    const stepContext = ContextManager.build('executor', view, budget, { step });
    const { text, route } = await scope.complete(stepContext);
    return { step: step.index, description: step.description, status: 'success', output: text, model: route.entryId };
  }
}

function renderPayload(payload: unknown): string {
  if (payload === undefined || payload === null) return '';
  if (typeof payload === 'string') return payload;
  return JSON.stringify(payload);
}
