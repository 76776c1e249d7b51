import { z } from 'zod';
import { AgentStateSchema, DiagnosticSchema, PlanStepSchema } from './data-flow';

export const STAGES = ['START', 'ORCHESTRATING', 'SKIP_PLANNING', 'PLANNING', 'EXECUTING', 'VALIDATING', 'RETRY', 'DONE', 'FAILED'] as const;

export const StageSchema = z.enum(STAGES);

export type Stage = z.infer<typeof StageSchema>;

export type TerminalStage = Extract<Stage, 'DONE' | 'FAILED'>;

export const TRIGGERS = ['BEGIN', 'ROUTE_DIRECT', 'ROUTE_PLAN', 'PLAN_READY', 'EXECUTED', 'PASS', 'REJECT', 'EXHAUST', 'REPLAN', 'FAIL'] as const;

export const TriggerSchema = z.enum(TRIGGERS);

export type Trigger = z.infer<typeof TriggerSchema>;

export function isTerminal(stage: Stage): stage is TerminalStage {
  return stage === 'DONE' || stage === 'FAILED';
}

export const StageTransitionSchema = z.object({
  from: StageSchema,
  to: StageSchema,
  trigger: TriggerSchema,
  at: z.string(),
});

export const RoutingRecordSchema = z.object({
  stage: StageSchema,
  logicalName: z.string(),
  entryId: z.string(),
  provider: z.string(),
  model: z.string(),
  index: z.number().int().min(0),
  failures: z.array(z.object({ entryId: z.string(), code: z.string(), message: z.string() })),
  at: z.string(),
});

export const FailureSchema = z.object({
  stage: StageSchema,
  code: z.string(),
  message: z.string(),
  diagnostics: z.array(DiagnosticSchema),
});

/** Pipeline metadata wrapped around the AgentState; the unit of checkpointing */
export const WorkflowStateSchema = z.object({
  runId: z.string().min(1),
  stage: StageSchema,
  /** `${runId}:${sequence}` */
  checkpointId: z.string(),
  sequence: z.number().int().min(0),
  createdAt: z.string(),
  updatedAt: z.string(),
  agentState: AgentStateSchema,
  trace: z.array(StageTransitionSchema),
  routing: z.array(RoutingRecordSchema),
  planHistory: z.array(z.array(PlanStepSchema)),
  failure: FailureSchema.optional(),
});

export type StageTransition = z.infer<typeof StageTransitionSchema>;
export type RoutingRecord = z.infer<typeof RoutingRecordSchema>;
export type RunFailure = z.infer<typeof FailureSchema>;
export type WorkflowState = z.infer<typeof WorkflowStateSchema>;
