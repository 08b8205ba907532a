import type { NegotiationState } from '../core/types.js';
import { StateMachine } from '../core/state-machine.js';

export const negotiationMachine = new StateMachine<NegotiationState>('ContractNegotiation', {
  REQUESTED: ['OFFERED', 'TERMINATED'],
  OFFERED: ['ACCEPTED', 'DECLINED', 'TERMINATED'],
  DECLINED: ['OFFERED', 'TERMINATED'],
  ACCEPTED: ['AGREED', 'TERMINATED'],
  AGREED: ['VERIFIED', 'TERMINATED'],
  VERIFIED: ['FINALIZED', 'TERMINATED'],
  FINALIZED: [],
  TERMINATED: [],
});
