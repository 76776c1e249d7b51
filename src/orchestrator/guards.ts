import type { AgentState } from './data-flow';
import type { Stage } from './states';

export type GuardFn = (state: Readonly<AgentState>) => boolean | Promise<boolean>;

// Preconditions checked against the state about to be committed
export const transitionGuards: Partial<Record<Stage, GuardFn>> = {
  EXECUTING: (s) => s.plan.length > 0,
  VALIDATING: (s) => s.plan.every((step) => s.results.some((r) => r.step === step.index)),
  DONE: (s) => s.output !== undefined,
};
