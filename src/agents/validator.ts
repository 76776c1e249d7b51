import { z } from 'zod';
import type { Context } from '../context/types';
import type { AgentStateView, Diagnostic, StateDelta, Validation } from '../orchestrator/data-flow';
import { BaseAgent, type AttemptScope } from './base-agent';
import { RetryableAgentFailure } from './errors';
import { parseModelJson } from './json';

const RawDiagnosticSchema = z.union([
  z.string().min(1),
  z.object({
    step: z.number().int().positive().optional(),
    message: z.string().min(1),
  }),
]);

const RawValidationSchema = z.object({
  verdict: z.string().optional(),
  validation_status: z.string().optional(),
  diagnostics: z.array(RawDiagnosticSchema).optional(),
  issues: z.array(RawDiagnosticSchema).optional(),
  summary: z.string().optional(),
  quality_score: z.number().min(0).max(100).optional(),
});

const VERDICTS = new Map<string, Validation['verdict']>([
  ['pass', 'pass'],
  ['passed', 'pass'],
  ['fail', 'fail'],
  ['failed', 'fail'],
  ['partial', 'fail'],
]);

export const GENERIC_DIAGNOSTIC = 'The result does not satisfy the request; revise the plan to address it more directly.';

/**
 * Last stage. A pass in which any step failed or produced nothing is rejected
 * without asking the model; otherwise the model judges the result against the
 * rubric.
 */
export class ValidatorAgent extends BaseAgent {
  readonly role = 'validator' as const;

  protected async execute(view: AgentStateView, context: Context, scope: AttemptScope): Promise<StateDelta> {
    const structural = structuralCheck(view);
    if (structural) {
      this.logger.info('Structural check rejected the pass', { diagnostics: structural.diagnostics.length });
      return { validation: structural };
    }

    const { text } = await scope.complete(context);
    const validation = normalizeValidation(parseModelJson('ValidatorAgent', text, RawValidationSchema));

    this.logger.info(`Verdict: ${validation.verdict}`, { qualityScore: validation.qualityScore, diagnostics: validation.diagnostics.length });
    return { validation };
  }
}

/** A failing Validation when some plan step has no successful result, otherwise null */
export function structuralCheck(view: AgentStateView): Validation | null {
  const diagnostics: Diagnostic[] = [];

  for (const step of view.plan) {
    const result = view.results.find((r) => r.step === step.index);
    if (!result) {
      diagnostics.push({ step: step.index, message: `Step ${step.index} produced no result` });
    } else if (result.status !== 'success') {
      diagnostics.push({ step: step.index, message: `Step ${step.index} failed: ${result.error ?? 'unknown error'}` });
    }
  }

  if (diagnostics.length === 0) return null;
  return {
    verdict: 'fail',
    diagnostics,
    summary: `${diagnostics.length} of ${view.plan.length} step(s) did not succeed`,
  };
}

export function normalizeValidation(raw: z.infer<typeof RawValidationSchema>): Validation {
  const label = (raw.verdict ?? raw.validation_status)?.trim().toLowerCase();
  const verdict = label ? VERDICTS.get(label) : undefined;
  if (!verdict) {
    throw new RetryableAgentFailure(`ValidatorAgent: unrecognised verdict "${label ?? ''}"`);
  }

  const diagnostics: Diagnostic[] = [...(raw.diagnostics ?? []), ...(raw.issues ?? [])].map((d) => (typeof d === 'string' ? { message: d } : d));

  // A rejection always carries feedback for the planner
  if (verdict === 'fail' && diagnostics.length === 0) {
    diagnostics.push({ message: GENERIC_DIAGNOSTIC });
  }

  return {
    verdict,
    diagnostics: verdict === 'pass' ? [] : diagnostics,
    ...(raw.summary ? { summary: raw.summary } : {}),
    ...(raw.quality_score !== undefined ? { qualityScore: raw.quality_score } : {}),
  };
}
