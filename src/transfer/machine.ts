import type { TransferState } from '../core/types.js';
import { StateMachine } from '../core/state-machine.js';

export const transferMachine = new StateMachine<TransferState>('TransferProcess', {
  REQUESTED: ['PROVISIONED', 'TERMINATED'],
  PROVISIONED: ['STARTED', 'TERMINATED'],
  STARTED: ['SUSPENDED', 'COMPLETED', 'TERMINATED'],
  SUSPENDED: ['STARTED', 'COMPLETED', 'TERMINATED'],
  COMPLETED: [],
  TERMINATED: [],
});
