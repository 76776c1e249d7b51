import crypto from 'crypto';
import type { AgentRole } from '../agents/roles';
import type { AgentResult, AgentSuccess } from '../agents/types';
import { CheckpointNotFoundError, RunExistsError, SequentError, errorMessage } from '../utils/errors';
import { silentLogger, type WorkflowLogger } from '../utils/logger';
import { AgentCoordinator } from './agent-coordinator';
import { applyDelta, createAgentState, finalizeOutput, resetForRetry, withPlan, type AgentState, type AgentStateView, type Diagnostic, type PlanStep, type WorkflowStatus } from './data-flow';
import type { StateChangeEvent } from './events';
import { StateMachine } from './state-machine';
import { MemoryCheckpointStore, type CheckpointStore } from './state-store';
import { isTerminal, type RoutingRecord, type RunFailure, type Stage, type StageTransition, type Trigger } from './states';

// ── Options ─────────────────────────────────────────────────────────────

export interface WorkflowOptions {
  /** Coordinator with an agent registered for every role */
  coordinator: AgentCoordinator;
  /** Checkpoint persistence (default: in-memory) */
  store?: CheckpointStore;
  /** Validator rejections tolerated before a run fails (default: 3) */
  maxRetries?: number;
  /** Logger for one run (default: silent) */
  createLogger?: (runId: string) => WorkflowLogger;
}

export interface RunOptions {
  /** Run identifier (auto-generated if omitted) */
  runId?: string;
  /** Overrides WorkflowOptions.maxRetries for this run */
  maxRetries?: number;
}

// ── Results ─────────────────────────────────────────────────────────────

/** One per committed transition */
export interface StageEvent {
  runId: string;
  from: Stage;
  to: Stage;
  trigger: Trigger;
  checkpointId: string;
  state: AgentStateView;
  at: string;
}

export interface WorkflowResult {
  status: WorkflowStatus;
  runId: string;
  finalStage: Stage;
  output?: string;
  state: AgentState;
  trace: StageTransition[];
  routing: RoutingRecord[];
  retryCount: number;
  failure?: RunFailure;
  durationMs: number;
}

/** The plan used when the orchestrator routes around the planner */
export function directAnswerStep(revision: number): PlanStep {
  return {
    index: 1,
    description: 'Answer the request directly',
    arguments: {},
    expectedOutput: 'A complete response to the request',
    revision,
  };
}

// ── Coordinator ─────────────────────────────────────────────────────────

/**
 * WorkflowCoordinator drives runs through the fixed pipeline
 *
 *   START → ORCHESTRATING → (SKIP_PLANNING | PLANNING) → EXECUTING → VALIDATING → DONE
 *
 * with a bounded feedback loop VALIDATING → RETRY → PLANNING and FAILED as
 * the other terminal stage. Every transition is checkpointed before it is
 * published. All per-run state lives in the run's own StateMachine, so one
 * coordinator can drive any number of runs at once.
 */
export class WorkflowCoordinator {
  private coordinator: AgentCoordinator;
  private store: CheckpointStore;
  private maxRetries: number;
  private createLogger: (runId: string) => WorkflowLogger;
  /** Run ids currently being driven by this coordinator */
  private active = new Set<string>();

  constructor(options: WorkflowOptions) {
    this.coordinator = options.coordinator;
    this.store = options.store ?? new MemoryCheckpointStore();
    this.maxRetries = options.maxRetries ?? 3;
    this.createLogger = options.createLogger ?? (() => silentLogger);
  }

  // ── Public API ──────────────────────────────────────────────────────

  /**
   * Start a new run and wait for it to reach DONE or FAILED.
   * @throws RunExistsError when the run id is in use or already has checkpoints
   */
  async run(input: string, availableTools: Iterable<string> = [], availableSkills: Iterable<string> = [], options: RunOptions = {}): Promise<WorkflowResult> {
    const machine = await this.start(input, availableTools, availableSkills, options);
    return this.drive(machine, options.maxRetries ?? this.maxRetries);
  }

  /**
   * Start a new run and yield one event per transition as it is committed.
   * The generator's return value is the run's WorkflowResult.
   * @throws RunExistsError when the run id is in use or already has checkpoints
   */
  async *stream(input: string, availableTools: Iterable<string> = [], availableSkills: Iterable<string> = [], options: RunOptions = {}): AsyncGenerator<StageEvent, WorkflowResult> {
    const machine = await this.start(input, availableTools, availableSkills, options);
    return yield* this.observe(machine, () => this.drive(machine, options.maxRetries ?? this.maxRetries));
  }

  /**
   * Continue a run from its last checkpoint. A run already in DONE or FAILED
   * returns its result without calling any agent.
   * @throws CheckpointNotFoundError when the store has nothing for the run
   */
  async resume(runId: string): Promise<WorkflowResult> {
    if (this.active.has(runId)) {
      throw new RunExistsError(runId);
    }
    const machine = await StateMachine.restore(this.store, runId);
    if (!machine) {
      throw new CheckpointNotFoundError(runId);
    }

    this.createLogger(runId).info(`Resuming run from ${machine.getStage()}`, { checkpointId: machine.getWorkflowState().checkpointId });
    return this.drive(machine, this.maxRetries);
  }

  // ── Execution Loop ──────────────────────────────────────────────────

  private async start(input: string, availableTools: Iterable<string>, availableSkills: Iterable<string>, options: RunOptions): Promise<StateMachine> {
    const runId = options.runId ?? crypto.randomUUID();
    // A run id names one checkpoint log; a second run must not append to it
    if (this.active.has(runId) || (await this.store.load(runId))) {
      throw new RunExistsError(runId);
    }
    return StateMachine.create(this.store, runId, createAgentState(input, availableTools, availableSkills));
  }

  private async *observe(machine: StateMachine, drive: () => Promise<WorkflowResult>): AsyncGenerator<StageEvent, WorkflowResult> {
    const queue: StageEvent[] = [];
    let wake: (() => void) | undefined;
    let settled = false;

    const listener = (event: StateChangeEvent): void => {
      queue.push({
        runId: event.runId,
        from: event.from,
        to: event.to,
        trigger: event.trigger,
        checkpointId: event.checkpointId,
        state: event.state,
        at: event.timestamp,
      });
      wake?.();
    };
    machine.events.on('stateChange', listener);

    const done = drive();
    const markSettled = (): void => {
      settled = true;
      wake?.();
    };
    void done.then(markSettled, markSettled);

    try {
      for (;;) {
        const next = queue.shift();
        if (next) {
          yield next;
          continue;
        }
        if (settled) break;
        await new Promise<void>((resolve) => {
          wake = resolve;
        });
        wake = undefined;
      }
      return await done;
    } finally {
      machine.events.off('stateChange', listener);
    }
  }

  private async drive(machine: StateMachine, maxRetries: number): Promise<WorkflowResult> {
    const startedAt = Date.now();
    const runId = machine.getRunId();
    if (this.active.has(runId)) {
      throw new RunExistsError(runId);
    }
    this.active.add(runId);
    const logger = this.createLogger(runId);
    const onTransition = (event: StateChangeEvent): void => {
      logger.debug('Stage transition', { from: event.from, to: event.to, trigger: event.trigger, checkpointId: event.checkpointId });
    };
    machine.events.on('stateChange', onTransition);

    // Each pass through the loop commits exactly one transition
    const limit = 4 + 4 * (maxRetries + 1);

    try {
      for (let steps = 0; !isTerminal(machine.getStage()); steps++) {
        if (steps >= limit) {
          throw new SequentError(`Run ${machine.getRunId()} did not terminate within ${limit} transitions`, 'LOOP_LIMIT');
        }

        const stage = machine.getStage();
        try {
          await this.step(machine, stage, maxRetries, logger);
        } catch (error) {
          if (isTerminal(machine.getStage())) throw error;
          logger.error(`Stage ${stage} aborted`, { error: errorMessage(error) });
          await machine.transition('FAIL', {
            failure: { stage, code: error instanceof SequentError ? error.code : 'INTERNAL_ERROR', message: errorMessage(error), diagnostics: [] },
          });
        }
      }
    } finally {
      machine.events.off('stateChange', onTransition);
      this.active.delete(runId);
    }

    const result = buildResult(machine, startedAt);
    logger.info('Workflow result', { status: result.status, finalStage: result.finalStage, retryCount: result.retryCount, durationMs: result.durationMs });
    return result;
  }

  /** Run the work of one non-terminal stage and commit its outgoing transition */
  private async step(machine: StateMachine, stage: Stage, maxRetries: number, logger: WorkflowLogger): Promise<void> {
    const state = machine.getAgentState();

    switch (stage) {
      case 'START':
        logger.info('Starting workflow', { input: state.input.slice(0, 80) });
        await machine.transition('BEGIN');
        return;

      case 'ORCHESTRATING': {
        const result = await this.invoke(machine, 'orchestrator', state, logger);
        if (!result) return;
        const next = applyDelta(state, result.payload);
        const direct = next.classification?.routing === 'skip_planning';
        await machine.transition(direct ? 'ROUTE_DIRECT' : 'ROUTE_PLAN', { agentState: next, routing: routingOf(stage, result) });
        return;
      }

      case 'SKIP_PLANNING':
        await machine.transition('PLAN_READY', { agentState: withPlan(state, [directAnswerStep(state.retryCount)]), recordPlan: true });
        return;

      case 'PLANNING': {
        const result = await this.invoke(machine, 'planner', state, logger);
        if (!result) return;
        await machine.transition('PLAN_READY', { agentState: applyDelta(state, result.payload), routing: routingOf(stage, result), recordPlan: true });
        return;
      }

      case 'EXECUTING': {
        const result = await this.invoke(machine, 'executor', state, logger);
        if (!result) return;
        await machine.transition('EXECUTED', { agentState: applyDelta(state, result.payload), routing: routingOf(stage, result) });
        return;
      }

      case 'VALIDATING': {
        const result = await this.invoke(machine, 'validator', state, logger);
        if (!result) return;
        const next = applyDelta(state, result.payload);
        const routing = routingOf(stage, result);
        const validation = next.validation;

        if (validation?.verdict === 'pass') {
          await machine.transition('PASS', { agentState: finalizeOutput(next), routing });
        } else if (next.retryCount < maxRetries) {
          logger.warn(`Validation failed, retrying (${next.retryCount + 1}/${maxRetries})`, { diagnostics: validation?.diagnostics.length ?? 0 });
          await machine.transition('REJECT', { agentState: resetForRetry(next), routing });
        } else {
          const diagnostics: Diagnostic[] = validation?.diagnostics ?? [];
          logger.error('Validation failed and retries are exhausted', { retryCount: next.retryCount });
          await machine.transition('EXHAUST', {
            agentState: next,
            routing,
            failure: { stage, code: 'VALIDATION_FAILED', message: `Validation failed after ${next.retryCount} retr${next.retryCount === 1 ? 'y' : 'ies'}`, diagnostics },
          });
        }
        return;
      }

      case 'RETRY':
        await machine.transition('REPLAN');
        return;

      case 'DONE':
      case 'FAILED':
        return;
    }
  }

  /**
   * Invoke an agent. A fatal result moves the run to FAILED and yields null.
   */
  private async invoke(machine: StateMachine, role: AgentRole, state: AgentState, logger: WorkflowLogger): Promise<AgentSuccess | null> {
    const stage = machine.getStage();
    logger.info(`Executing: ${stage}`);
    const began = Date.now();

    const result = await this.coordinator.invoke(role, state);
    const elapsed = Date.now() - began;

    if (result.status === 'success') {
      logger.info(`Completed: ${stage} (${elapsed}ms)`, { attempts: result.attempts });
      return result;
    }

    logger.error(`Failed: ${stage} (${elapsed}ms)`, { code: result.error.code, error: result.error.message });
    await machine.transition('FAIL', {
      routing: routingOf(stage, result),
      failure: {
        stage,
        code: result.error.code,
        message: result.error.message,
        diagnostics: result.diagnostics.map((message) => ({ message })),
      },
    });
    return null;
  }
}

// ── Helpers ─────────────────────────────────────────────────────────────

function routingOf(stage: Stage, result: AgentResult): RoutingRecord[] {
  return result.routes.map((route) => ({ stage, ...route }));
}

function statusOf(stage: Stage): WorkflowStatus {
  switch (stage) {
    case 'DONE':
      return 'completed';
    case 'FAILED':
      return 'failed';
    default:
      return 'pending';
  }
}

/** Result view of a machine's current checkpoint */
export function buildResult(machine: StateMachine, startedAt: number): WorkflowResult {
  const ws = machine.getWorkflowState();
  const result: WorkflowResult = {
    status: statusOf(ws.stage),
    runId: ws.runId,
    finalStage: ws.stage,
    state: ws.agentState,
    trace: ws.trace,
    routing: ws.routing,
    retryCount: ws.agentState.retryCount,
    durationMs: Date.now() - startedAt,
  };

  if (ws.stage === 'DONE' && ws.agentState.output !== undefined) result.output = ws.agentState.output;
  if (ws.failure) result.failure = ws.failure;

  return result;
}
