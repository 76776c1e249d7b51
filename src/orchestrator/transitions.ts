import type { Stage, Trigger } from './states';

/**
 * Stage transition table. FAIL is accepted from every non-terminal stage
 * and is handled by the state machine directly.
 */
export const transitions: Record<Stage, Partial<Record<Trigger, Stage>>> = {
  START: { BEGIN: 'ORCHESTRATING' },
  ORCHESTRATING: { ROUTE_DIRECT: 'SKIP_PLANNING', ROUTE_PLAN: 'PLANNING' },
  SKIP_PLANNING: { PLAN_READY: 'EXECUTING' },
  PLANNING: { PLAN_READY: 'EXECUTING' },
  EXECUTING: { EXECUTED: 'VALIDATING' },
  VALIDATING: { PASS: 'DONE', REJECT: 'RETRY', EXHAUST: 'FAILED' },
  RETRY: { REPLAN: 'PLANNING' },
  DONE: {},
  FAILED: {},
};
