import { EventEmitter } from 'events';
import type { AgentStateView } from './data-flow';
import type { Stage, Trigger } from './states';

export interface StateChangeEvent {
  runId: string;
  from: Stage;
  to: Stage;
  trigger: Trigger;
  checkpointId: string;
  /** Snapshot of the state as committed by this transition */
  state: AgentStateView;
  timestamp: string;
}

export class StateMachineEvents extends EventEmitter {
  emitTransition(event: StateChangeEvent): void {
    this.emit('stateChange', event);
  }
}
