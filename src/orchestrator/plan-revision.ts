import { diffArrays } from 'diff';
import type { Diagnostic, PlanStep } from './data-flow';

export interface PlanComparison {
  changed: boolean;
  /** Step signatures present only in the new plan */
  added: string[];
  /** Step signatures present only in the previous plan */
  removed: string[];
}

/** What a step does, ignoring its position and revision */
export function stepSignature(step: PlanStep): string {
  const capability = step.capability ? `${step.capability.kind}:${step.capability.name}` : 'model';
  return `${capability} ${step.description} ${JSON.stringify(step.arguments)}`;
}

export function comparePlans(previous: readonly PlanStep[], next: readonly PlanStep[]): PlanComparison {
  const added: string[] = [];
  const removed: string[] = [];

  for (const part of diffArrays(previous.map(stepSignature), next.map(stepSignature))) {
    if (part.added) added.push(...part.value);
    else if (part.removed) removed.push(...part.value);
  }

  return { changed: added.length > 0 || removed.length > 0, added, removed };
}

/** One model step per diagnostic, appended after `plan` */
export function remediationSteps(plan: readonly PlanStep[], diagnostics: readonly Diagnostic[], revision: number): PlanStep[] {
  return diagnostics.map((d, i) => ({
    index: plan.length + i + 1,
    description: `Address validator feedback${d.step !== undefined ? ` on step ${d.step}` : ''}: ${d.message}`,
    arguments: {},
    revision,
  }));
}
