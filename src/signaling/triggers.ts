/**
 * Trigger sources that drive a data flow to suspend or terminate.
 */

import type { TerminationReason } from '../core/types.js';

export type TriggerAction = 'suspend' | 'terminate';

export interface PolicyMonitorTrigger {
  source: 'PolicyMonitor';
  processId: string;
  action: TriggerAction;
  reason: TerminationReason;
}

export interface RemoteMessageTrigger {
  source: 'RemoteMessage';
  processId: string;
  message: 'TransferSuspension' | 'TransferTermination' | 'TransferCompletion';
  reason?: TerminationReason;
}

export interface ManualInvocationTrigger {
  source: 'ManualInvocation';
  processId: string;
  action: TriggerAction;
  reason?: TerminationReason;
}

export interface SystemErrorTrigger {
  source: 'SystemError';
  processId: string;
  error: Error;
}

export type Trigger =
  | PolicyMonitorTrigger
  | RemoteMessageTrigger
  | ManualInvocationTrigger
  | SystemErrorTrigger;

export interface TriggerResolution {
  action: TriggerAction;
  /** Always set for terminate */
  reason?: TerminationReason;
}

function resolveRemote(trigger: RemoteMessageTrigger): TriggerResolution {
  switch (trigger.message) {
    case 'TransferSuspension':
      return { action: 'suspend', reason: trigger.reason };
    case 'TransferCompletion':
      return { action: 'terminate', reason: { code: 'Completed' } };
    case 'TransferTermination':
      return { action: 'terminate', reason: trigger.reason ?? { code: 'CounterpartyTerminated' } };
  }
}

/** Map a trigger onto the suspend or terminate entry point. */
export function resolveTrigger(trigger: Trigger): TriggerResolution {
  switch (trigger.source) {
    case 'PolicyMonitor':
      return { action: trigger.action, reason: trigger.reason };
    case 'RemoteMessage':
      return resolveRemote(trigger);
    case 'ManualInvocation':
      return { action: trigger.action, reason: trigger.reason ?? { code: 'Manual' } };
    case 'SystemError':
      return { action: 'terminate', reason: { code: 'SystemError', detail: trigger.error.message } };
  }
}

/** Reason recorded for a stop requested by the counterparty. */
export function remoteReason(reason: TerminationReason | undefined): TerminationReason {
  if (!reason || reason.code === 'Manual') {
    return { code: 'CounterpartyTerminated', ...(reason?.detail ? { detail: reason.detail } : {}) };
  }
  return reason;
}
