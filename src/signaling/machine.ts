import type { DataFlowState } from '../core/types.js';
import { StateMachine } from '../core/state-machine.js';

export const dataFlowMachine = new StateMachine<DataFlowState>('DataFlow', {
  REQUESTED: ['STARTED', 'TERMINATED'],
  STARTED: ['SUSPENDED', 'TERMINATED'],
  SUSPENDED: ['STARTED', 'TERMINATED'],
  TERMINATED: [],
});
