export { WorkflowCoordinator, buildResult, directAnswerStep } from './orchestrator/workflow';
export type { RunOptions, StageEvent, WorkflowOptions, WorkflowResult } from './orchestrator/workflow';
export { AgentCoordinator, createAgentCoordinator } from './orchestrator/agent-coordinator';
export { StateMachine } from './orchestrator/state-machine';
export { FileCheckpointStore, MemoryCheckpointStore } from './orchestrator/state-store';
export type { CheckpointStore } from './orchestrator/state-store';
export { STAGES, TRIGGERS, isTerminal } from './orchestrator/states';
export type { RoutingRecord, RunFailure, Stage, StageTransition, Trigger, WorkflowState } from './orchestrator/states';
export { applyDelta, createAgentState, snapshot, withPlan } from './orchestrator/data-flow';
export type { AgentState, AgentStateView, Classification, Diagnostic, PlanStep, StateDelta, StepResult, Validation, WorkflowStatus } from './orchestrator/data-flow';
export { comparePlans } from './orchestrator/plan-revision';

export { BaseAgent } from './agents/base-agent';
export type { AgentModelSettings, AgentOptions, AttemptScope } from './agents/base-agent';
export { OrchestratorAgent } from './agents/orchestrator';
export { PlannerAgent } from './agents/planner';
export { ExecutorAgent } from './agents/executor';
export { ValidatorAgent } from './agents/validator';
export { AgentFailure, AgentTimeoutError, FatalAgentFailure, RetryableAgentFailure } from './agents/errors';
export type { Agent, AgentResult } from './agents/types';
export type { AgentRole } from './agents/roles';

export { CapabilityRegistry } from './capabilities/registry';
export type { CapabilityHandler, CapabilityOutcome } from './capabilities/registry';
export { ContextManager, TRUNCATION_MARKER } from './context/context-manager';
export type { Context, ContextEntry } from './context/types';

export { ModelRouter, RoutedModelClient } from './models/router';
export { createModelRouter } from './models/factory';
export { OpenAICompatibleClient } from './models/openai-compatible';
export { AnthropicClient } from './models/anthropic';
export { ModelError, ModelMalformedError, ModelRateLimitedError, ModelTimeoutError, ModelUnavailableError } from './models/errors';
export type { Completion, CompletionOptions, FallbackEntry, ModelClient, RoutingDecision } from './models/types';

export { loadConfig, maskConfig } from './config/loader';
export type { Config } from './config/validator';
export { CapabilityNotFoundError, CheckpointNotFoundError, ConfigurationError, InvalidTransitionError, RunExistsError, SequentError } from './utils/errors';
export { ConsoleWorkflowLogger, silentLogger } from './utils/logger';
export type { WorkflowLogger } from './utils/logger';
