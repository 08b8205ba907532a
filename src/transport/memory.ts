/**
 * In-process network for tests and single-process embedding.
 *
 * Every message and acknowledgement crosses as a JSON copy, so no object is
 * ever shared between participants.
 */

import type { Ack, MessageHandler, ProtocolMessage, Transport } from './types.js';
import { DataspaceError } from '../core/errors.js';
import { sleep } from '../core/retry.js';

export interface NetworkOptions {
  /** Delay applied to every delivery */
  latencyMs?: number;
  /** Delay between the receiver's handler returning and its ack arriving */
  ackLatencyMs?: number;
}

export interface DeliveryRecord {
  from: string;
  to: string;
  type: ProtocolMessage['type'];
  messageId: string;
}

function copy<T>(value: T): T {
  return JSON.parse(JSON.stringify(value));
}

function pairKey(a: string, b: string): string {
  return a < b ? `${a}|${b}` : `${b}|${a}`;
}

export class InMemoryNetwork {
  private handlers = new Map<string, MessageHandler>();
  private partitions = new Set<string>();
  private offline = new Set<string>();
  private failures = new Map<string, number>();
  private latencyMs: number;
  private ackLatencyMs: number;
  /** Messages handed to a receiver, in delivery order */
  readonly deliveries: DeliveryRecord[] = [];

  constructor(options: NetworkOptions = {}) {
    this.latencyMs = options.latencyMs ?? 0;
    this.ackLatencyMs = options.ackLatencyMs ?? 0;
  }

  /** Transport bound to `participantId`. */
  endpoint(participantId: string): Transport {
    return {
      send: (to, message) => this.deliver(participantId, to, message),
      onMessage: handler => {
        this.handlers.set(participantId, handler);
      },
    };
  }

  /** Drop all traffic between `a` and `b` until healed. */
  partition(a: string, b: string): void {
    this.partitions.add(pairKey(a, b));
  }

  heal(): void {
    this.partitions.clear();
    this.offline.clear();
  }

  disconnect(participantId: string): void {
    this.offline.add(participantId);
  }

  reconnect(participantId: string): void {
    this.offline.delete(participantId);
  }

  /** Fail the next `count` deliveries addressed to `participantId`. */
  failNext(participantId: string, count = 1): void {
    this.failures.set(participantId, (this.failures.get(participantId) ?? 0) + count);
  }

  setLatency(ms: number): void {
    this.latencyMs = ms;
  }

  setAckLatency(ms: number): void {
    this.ackLatencyMs = ms;
  }

  deliveriesOf(type: ProtocolMessage['type']): DeliveryRecord[] {
    return this.deliveries.filter(d => d.type === type);
  }

  private async deliver(from: string, to: string, message: ProtocolMessage): Promise<Ack> {
    if (this.latencyMs > 0) await sleep(this.latencyMs);

    if (this.offline.has(to) || this.offline.has(from) || this.partitions.has(pairKey(from, to))) {
      throw new DataspaceError('DeliveryFailed', `${to} is not reachable from ${from}`);
    }
    const pendingFailures = this.failures.get(to) ?? 0;
    if (pendingFailures > 0) {
      this.failures.set(to, pendingFailures - 1);
      throw new DataspaceError('DeliveryFailed', `Injected delivery failure towards ${to}`);
    }
    const handler = this.handlers.get(to);
    if (!handler) {
      throw new DataspaceError('DeliveryFailed', `No participant listening as ${to}`);
    }

    this.deliveries.push({ from, to, type: message.type, messageId: message.messageId });
    const inbound: unknown = copy(message);
    const ack = await handler(inbound);
    if (this.ackLatencyMs > 0) await sleep(this.ackLatencyMs);
    return copy(ack);
  }
}
