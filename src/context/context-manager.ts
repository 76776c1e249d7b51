import type { AgentRole } from '../agents/roles';
import { buildClassificationInstructions } from '../agents/prompts/classification';
import { buildExecutionInstructions } from '../agents/prompts/execution';
import { buildPlanningInstructions } from '../agents/prompts/planning';
import { buildValidationInstructions } from '../agents/prompts/validation';
import type { AgentStateView, PlanStep, StepResult } from '../orchestrator/data-flow';
import { ConfigurationError } from '../utils/errors';
import type { Context, ContextEntry } from './types';

export type { Context, ContextEntry, ContextRole } from './types';

/** Appended to a pinned entry that had to be clipped */
export const TRUNCATION_MARKER = '\n[...truncated]';

/** Smallest budget for which the size bound can always be honoured */
export const MIN_CONTEXT_BUDGET = TRUNCATION_MARKER.length * 2;

export interface ContextBuildOptions {
  /** Executor model step being answered */
  step?: PlanStep;
}

export class ContextManager {
  /**
   * Assemble the bounded context one agent call sees.
   *
   * Layout: pinned stage instructions first, then history oldest to newest,
   * then the pinned user request. Over budget, history is dropped from the
   * oldest end; if the pinned entries alone still do not fit, the request is
   * clipped first and the instructions second. Both remain present.
   *
   * @throws ConfigurationError for budgets below MIN_CONTEXT_BUDGET
   */
  static build(stage: AgentRole, state: AgentStateView, budget: number, options: ContextBuildOptions = {}): Context {
    if (!Number.isInteger(budget) || budget < MIN_CONTEXT_BUDGET) {
      throw new ConfigurationError(`Context budget must be an integer of at least ${MIN_CONTEXT_BUDGET} characters, got ${budget}`, [`context.size: ${budget}`]);
    }

    const system: ContextEntry = { role: 'system', content: instructionsFor(stage, state, options), pinned: true };
    const user: ContextEntry = { role: 'user', content: `Request:\n${state.input}`, pinned: true };
    const history = historyFor(stage, state, options);

    let dropped = 0;
    while (history.length > 0 && measure([system, ...history, user]) > budget) {
      history.shift();
      dropped++;
    }

    const overflow = measure([system, user]) - budget;
    if (overflow > 0) {
      user.content = clip(user.content, Math.max(TRUNCATION_MARKER.length, user.content.length - overflow));
      system.content = clip(system.content, budget - user.content.length);
    }

    const entries = [system, ...history, user];
    return { stage, entries, size: measure(entries), budget, dropped };
  }
}

// ── Private Helpers ─────────────────────────────────────────────────────

function measure(entries: readonly ContextEntry[]): number {
  return entries.reduce((total, entry) => total + entry.content.length, 0);
}

/** Cut `content` to `maxLength` UTF-16 units including the marker, never inside a surrogate pair */
export function clip(content: string, maxLength: number): string {
  if (content.length <= maxLength) return content;
  let end = maxLength - TRUNCATION_MARKER.length;
  if (end > 0 && isHighSurrogate(content.charCodeAt(end - 1))) end -= 1;
  return content.slice(0, end) + TRUNCATION_MARKER;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function instructionsFor(stage: AgentRole, state: AgentStateView, options: ContextBuildOptions): string {
  switch (stage) {
    case 'orchestrator':
      return buildClassificationInstructions();
    case 'planner':
      return buildPlanningInstructions({
        tools: state.availableTools,
        skills: state.availableSkills,
        revising: state.retryCount > 0 && state.validation?.verdict === 'fail',
      });
    case 'executor': {
      const step = options.step ?? state.plan[0];
      return buildExecutionInstructions({
        index: step?.index ?? 1,
        total: Math.max(state.plan.length, 1),
        description: step?.description ?? state.input,
        expectedOutput: step?.expectedOutput,
      });
    }
    case 'validator':
      return buildValidationInstructions();
  }
}

function historyFor(stage: AgentRole, state: AgentStateView, options: ContextBuildOptions): ContextEntry[] {
  const history: ContextEntry[] = [];
  if (stage === 'orchestrator') return history;

  if (state.classification) {
    const c = state.classification;
    history.push({ role: 'assistant', content: `Classification: ${c.complexity} (${c.routing})${c.reasoning ? ` - ${c.reasoning}` : ''}`, pinned: false });
  }

  if (stage === 'planner') {
    if (state.retryCount > 0 && state.plan.length > 0) {
      history.push({ role: 'assistant', content: `Previous plan:\n${formatPlan(state.plan)}`, pinned: false });
    }
    if (state.retryCount > 0 && state.validation?.verdict === 'fail') {
      const lines = state.validation.diagnostics.map((d) => `- ${d.step !== undefined ? `step ${d.step}: ` : ''}${d.message}`);
      history.push({ role: 'user', content: `Validator diagnostics for the rejected plan:\n${lines.join('\n')}`, pinned: false });
    }
    return history;
  }

  if (state.plan.length > 0) {
    history.push({ role: 'assistant', content: `Plan:\n${formatPlan(state.plan)}`, pinned: false });
  }

  // The executor only sees results of steps before the one it is answering
  const before = stage === 'executor' && options.step ? options.step.index : Number.POSITIVE_INFINITY;
  for (const result of state.results) {
    if (result.step < before) {
      history.push({ role: 'tool', content: formatResult(result), pinned: false });
    }
  }

  return history;
}

function formatPlan(plan: readonly PlanStep[]): string {
  return plan
    .map((step) => {
      const capability = step.capability ? ` [${step.capability.kind}:${step.capability.name}]` : '';
      return `${step.index}. ${step.description}${capability}`;
    })
    .join('\n');
}

function formatResult(result: StepResult): string {
  const header = `Step ${result.step} (${result.status}): ${result.description}`;
  if (result.status === 'success') return `${header}\n${result.output ?? ''}`;
  return `${header}\nError: ${result.error ?? 'unknown error'}`;
}
