import { z } from 'zod';

// ── Schemas ─────────────────────────────────────────────────────────────

export const ClassificationSchema = z.object({
  complexity: z.enum(['simple', 'complex']),
  requiresPlanning: z.boolean(),
  routing: z.enum(['skip_planning', 'full_pipeline']),
  reasoning: z.string().optional(),
});

export const CapabilityRefSchema = z.object({
  kind: z.enum(['tool', 'skill']),
  name: z.string().min(1),
});

export const PlanStepSchema = z.object({
  /** 1-based position in the plan */
  index: z.number().int().positive(),
  description: z.string().min(1),
  capability: CapabilityRefSchema.optional(),
  arguments: z.record(z.unknown()),
  expectedOutput: z.string().optional(),
  /** retryCount at the time the step was planned */
  revision: z.number().int().min(0),
});

export const StepResultSchema = z.object({
  step: z.number().int().positive(),
  description: z.string(),
  capability: CapabilityRefSchema.optional(),
  status: z.enum(['success', 'failed']),
  output: z.string().optional(),
  error: z.string().optional(),
  /** Fallback entry that answered a model step */
  model: z.string().optional(),
});

export const ActionRecordSchema = z.object({
  step: z.number().int().positive(),
  kind: z.enum(['tool', 'skill', 'model']),
  name: z.string(),
  startedAt: z.string(),
  durationMs: z.number().min(0),
});

export const DiagnosticSchema = z.object({
  step: z.number().int().positive().optional(),
  message: z.string().min(1),
});

export const ValidationSchema = z.object({
  verdict: z.enum(['pass', 'fail']),
  diagnostics: z.array(DiagnosticSchema),
  summary: z.string().optional(),
  qualityScore: z.number().min(0).max(100).optional(),
});

export const AgentStateSchema = z.object({
  input: z.string(),
  classification: ClassificationSchema.optional(),
  plan: z.array(PlanStepSchema),
  actions: z.array(ActionRecordSchema),
  results: z.array(StepResultSchema),
  validation: ValidationSchema.optional(),
  output: z.string().optional(),
  retryCount: z.number().int().min(0),
  availableTools: z.array(z.string()),
  availableSkills: z.array(z.string()),
});

// ── Types ───────────────────────────────────────────────────────────────

export type Classification = z.infer<typeof ClassificationSchema>;
export type CapabilityRef = z.infer<typeof CapabilityRefSchema>;
export type PlanStep = z.infer<typeof PlanStepSchema>;
export type StepResult = z.infer<typeof StepResultSchema>;
export type ActionRecord = z.infer<typeof ActionRecordSchema>;
export type Diagnostic = z.infer<typeof DiagnosticSchema>;
export type Validation = z.infer<typeof ValidationSchema>;

/**
 * The single record threaded through the pipeline. Owned by the workflow
 * coordinator; agents only ever see a snapshot and answer with a StateDelta.
 */
export type AgentState = z.infer<typeof AgentStateSchema>;

/** Read-only copy of the state handed to an agent */
export type AgentStateView = Readonly<AgentState>;

/**
 * What an agent may change. input, retryCount, output and the capability
 * sets are coordinator-owned and deliberately absent.
 */
export interface StateDelta {
  classification?: Classification;
  plan?: PlanStep[];
  actions?: ActionRecord[];
  results?: StepResult[];
  validation?: Validation;
}

// ── State operations ────────────────────────────────────────────────────

export function createAgentState(input: string, availableTools: Iterable<string> = [], availableSkills: Iterable<string> = []): AgentState {
  return {
    input,
    plan: [],
    actions: [],
    results: [],
    retryCount: 0,
    availableTools: [...new Set(availableTools)],
    availableSkills: [...new Set(availableSkills)],
  };
}

/** Deep copy suitable for handing to an agent or an event listener */
export function snapshot(state: AgentState): AgentStateView {
  return structuredClone(state);
}

/**
 * Merge an agent delta into a new state.
 *  - classification is set once; a different second value is rejected
 *  - plan is replaced
 *  - actions and results are appended
 *  - validation is overwritten
 */
export function applyDelta(state: AgentState, delta: StateDelta): AgentState {
  const next = structuredClone(state);

  if (delta.classification) {
    if (next.classification && !sameClassification(next.classification, delta.classification)) {
      throw new Error('Classification is already committed for this run');
    }
    next.classification = structuredClone(delta.classification);
  }
  if (delta.plan) next.plan = structuredClone(delta.plan);
  if (delta.actions) next.actions.push(...structuredClone(delta.actions));
  if (delta.results) next.results.push(...structuredClone(delta.results));
  if (delta.validation) next.validation = structuredClone(delta.validation);

  return next;
}

/** State carrying `plan`, as when the coordinator synthesises the plan itself */
export function withPlan(state: AgentState, plan: PlanStep[]): AgentState {
  return applyDelta(state, { plan });
}

/** VALIDATING → RETRY: bump the counter and discard the failed pass */
export function resetForRetry(state: AgentState): AgentState {
  const next = structuredClone(state);
  next.retryCount += 1;
  next.results = [];
  next.actions = [];
  return next;
}

/** VALIDATING → DONE: the output is the last successful step output */
export function finalizeOutput(state: AgentState): AgentState {
  const next = structuredClone(state);
  const answered = [...next.results].reverse().find((r) => r.status === 'success' && r.output !== undefined);
  next.output = answered?.output ?? '';
  return next;
}

function sameClassification(a: Classification, b: Classification): boolean {
  return a.complexity === b.complexity && a.routing === b.routing && a.requiresPlanning === b.requiresPlanning;
}

// ── Workflow Result ─────────────────────────────────────────────────────

/** Final status of a workflow execution */
export type WorkflowStatus = 'pending' | 'completed' | 'failed';
