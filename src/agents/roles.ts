/** The closed set of pipeline agents */
export type AgentRole = 'orchestrator' | 'planner' | 'executor' | 'validator';

export const AGENT_ROLES: readonly AgentRole[] = ['orchestrator', 'planner', 'executor', 'validator'];
