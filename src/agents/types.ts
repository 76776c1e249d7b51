import type { Context } from '../context/types';
import type { RoutingDecision } from '../models/types';
import type { AgentStateView, StateDelta } from '../orchestrator/data-flow';
import type { AgentRole } from './roles';

export interface AgentError {
  code: string;
  message: string;
}

interface AgentResultBase {
  /** One line per failed attempt, oldest first */
  diagnostics: string[];
  /** Routing decisions of every model call the agent made */
  routes: RoutingDecision[];
  attempts: number;
}

export interface AgentSuccess extends AgentResultBase {
  status: 'success';
  payload: StateDelta;
}

export interface AgentFailureResult extends AgentResultBase {
  status: 'retryable_failure' | 'fatal_failure';
  error: AgentError;
}

/** Uniform outcome of an agent call */
export type AgentResult = AgentSuccess | AgentFailureResult;

/** Anything the coordinator can run as a pipeline stage */
export interface Agent {
  readonly role: AgentRole;
  run(view: AgentStateView, context: Context): Promise<AgentResult>;
}
