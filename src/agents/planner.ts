import { z } from 'zod';
import type { Context } from '../context/types';
import type { AgentStateView, CapabilityRef, PlanStep, StateDelta } from '../orchestrator/data-flow';
import { comparePlans, remediationSteps } from '../orchestrator/plan-revision';
import { BaseAgent, type AttemptScope } from './base-agent';
import { RetryableAgentFailure } from './errors';
import { parseModelJson } from './json';

const RawStepSchema = z
  .object({
    action: z.string().optional(),
    description: z.string().optional(),
    tool: z.string().nullish(),
    skill: z.string().nullish(),
    inputs: z.record(z.unknown()).optional(),
    arguments: z.record(z.unknown()).optional(),
    expected_output: z.string().optional(),
  })
  .refine((s) => Boolean((s.action ?? s.description)?.trim()), { message: 'step needs an action' });

const RawPlanSchema = z.object({
  plan: z.array(RawStepSchema).min(1),
});

type RawStep = z.infer<typeof RawStepSchema>;

/**
 * Turns the request into an ordered plan. On a feedback retry the validator
 * diagnostics are in the context, and the plan is guaranteed to differ from
 * the rejected one.
 */
export class PlannerAgent extends BaseAgent {
  readonly role = 'planner' as const;

  protected async execute(view: AgentStateView, context: Context, scope: AttemptScope): Promise<StateDelta> {
    const { text } = await scope.complete(context);
    const raw = parseModelJson('PlannerAgent', text, RawPlanSchema);

    let plan = raw.plan.map((step, i) => toPlanStep(step, i + 1, view));

    const diagnostics = view.validation?.verdict === 'fail' ? view.validation.diagnostics : [];
    if (view.retryCount > 0 && diagnostics.length > 0 && !comparePlans(view.plan, plan).changed) {
      this.logger.warn('Planner reproduced the rejected plan; appending remediation steps', { diagnostics: diagnostics.length });
      plan = [...plan, ...remediationSteps(plan, diagnostics, view.retryCount)];
    }

    this.logger.info(`Planned ${plan.length} step(s)`, { revision: view.retryCount });
    return { plan };
  }
}

function toPlanStep(raw: RawStep, index: number, view: AgentStateView): PlanStep {
  const capability = capabilityOf(raw, view);
  const expectedOutput = raw.expected_output?.trim();

  return {
    index,
    description: (raw.action ?? raw.description ?? '').trim(),
    ...(capability ? { capability } : {}),
    arguments: raw.inputs ?? raw.arguments ?? {},
    ...(expectedOutput ? { expectedOutput } : {}),
    revision: view.retryCount,
  };
}

/**
 * @throws RetryableAgentFailure for names outside the run's capability sets,
 * so the plan is re-sampled
 */
function capabilityOf(raw: RawStep, view: AgentStateView): CapabilityRef | undefined {
  const tool = usableName(raw.tool);
  if (tool) {
    if (!view.availableTools.includes(tool)) {
      throw new RetryableAgentFailure(`PlannerAgent: step references unavailable tool "${tool}"`);
    }
    return { kind: 'tool', name: tool };
  }

  const skill = usableName(raw.skill);
  if (skill) {
    if (!view.availableSkills.includes(skill)) {
      throw new RetryableAgentFailure(`PlannerAgent: step references unavailable skill "${skill}"`);
    }
    return { kind: 'skill', name: skill };
  }

  return undefined;
}

function usableName(name: string | null | undefined): string | undefined {
  const trimmed = name?.trim();
  return trimmed && trimmed.toLowerCase() !== 'none' ? trimmed : undefined;
}
