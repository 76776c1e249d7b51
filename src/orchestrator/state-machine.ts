import { InvalidTransitionError } from '../utils/errors';
import { snapshot, type AgentState } from './data-flow';
import { StateMachineEvents } from './events';
import { transitionGuards } from './guards';
import { isTerminal, type RoutingRecord, type RunFailure, type Stage, type Trigger, type WorkflowState } from './states';
import type { CheckpointStore } from './state-store';
import { transitions } from './transitions';

export interface TransitionPayload {
  /** AgentState to commit with the transition (defaults to the current one) */
  agentState?: AgentState;
  /** Routing decisions made while the stage ran */
  routing?: RoutingRecord[];
  /** Set when the committed state carries a freshly produced plan */
  recordPlan?: boolean;
  failure?: RunFailure;
}

export class StateMachine {
  private state: WorkflowState;

  public events = new StateMachineEvents();

  constructor(
    private store: CheckpointStore,
    initial: WorkflowState,
  ) {
    this.state = structuredClone(initial);
  }

  /** Fresh machine in START for a new run */
  static create(store: CheckpointStore, runId: string, agentState: AgentState): StateMachine {
    const now = new Date().toISOString();
    return new StateMachine(store, {
      runId,
      stage: 'START',
      checkpointId: `${runId}:0`,
      sequence: 0,
      createdAt: now,
      updatedAt: now,
      agentState,
      trace: [],
      routing: [],
      planHistory: [],
    });
  }

  /** Machine positioned at the run's last committed checkpoint, or null */
  static async restore(store: CheckpointStore, runId: string): Promise<StateMachine | null> {
    const loaded = await store.load(runId);
    return loaded ? new StateMachine(store, loaded) : null;
  }

  getStage(): Stage {
    return this.state.stage;
  }

  getRunId(): string {
    return this.state.runId;
  }

  getAgentState(): AgentState {
    return structuredClone(this.state.agentState);
  }

  getWorkflowState(): WorkflowState {
    return structuredClone(this.state);
  }

  /**
   * Validate, checkpoint and commit one transition, then publish it.
   * Nothing is committed in memory if the checkpoint write fails.
   * @throws InvalidTransitionError for a trigger the current stage does not accept or a failed guard
   */
  async transition(trigger: Trigger, payload: TransitionPayload = {}): Promise<void> {
    const fromStage = this.state.stage;

    // 1. Resolve the target stage
    let nextStage: Stage | undefined;
    if (trigger === 'FAIL' && !isTerminal(fromStage)) {
      nextStage = 'FAILED';
    } else {
      nextStage = transitions[fromStage][trigger];
    }
    if (!nextStage) {
      throw new InvalidTransitionError(`Invalid transition: Trigger [${trigger}] is not valid from stage [${fromStage}]`);
    }

    // 2. Guards
    const agentState = payload.agentState ?? this.state.agentState;
    const guard = transitionGuards[nextStage];
    if (guard && !(await guard(agentState))) {
      throw new InvalidTransitionError(`Transition to [${nextStage}] rejected by guard logic.`);
    }

    // 3. Build the next checkpoint
    const at = new Date().toISOString();
    const sequence = this.state.sequence + 1;
    const next: WorkflowState = {
      ...structuredClone(this.state),
      stage: nextStage,
      sequence,
      checkpointId: `${this.state.runId}:${sequence}`,
      updatedAt: at,
      agentState: structuredClone(agentState),
    };
    next.trace.push({ from: fromStage, to: nextStage, trigger, at });
    if (payload.routing) next.routing.push(...structuredClone(payload.routing));
    if (payload.recordPlan) next.planHistory.push(structuredClone(agentState.plan));
    if (payload.failure) next.failure = structuredClone(payload.failure);

    // 4. Persist, then commit
    await this.store.save(next.runId, next);
    this.state = next;

    // 5. Events
    this.events.emitTransition({
      runId: next.runId,
      from: fromStage,
      to: nextStage,
      trigger,
      checkpointId: next.checkpointId,
      state: snapshot(next.agentState),
      timestamp: at,
    });
  }
}
