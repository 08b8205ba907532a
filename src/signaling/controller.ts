/**
 * Signaling Controller — the control plane's view of data flows, driving the
 * data plane and the token lifecycle.
 *
 * A flow is persisted only after its token and data plane side effects have
 * succeeded. A start that finds a suspended flow resumes it with a new token.
 */

import type {
  AccessToken,
  DataAddress,
  DataFlow,
  DataFlowState,
  DataPlane,
  EndpointDataReference,
  TerminationReason,
  TransferType,
} from '../core/types.js';
import { DataspaceError } from '../core/errors.js';
import { canonicalize } from '../core/crypto.js';
import { createLogger, type Logger } from '../core/logger.js';
import { globalMetrics, type MetricsCollector } from '../core/metrics.js';
import type { ClaimsAuthority } from '../claims/authority.js';
import type { ProcessStore } from '../storage/process-store.js';
import { dataFlowMachine } from './machine.js';
import { resolveTrigger, type Trigger } from './triggers.js';

export interface StartRequest {
  processId: string;
  type: TransferType;
  address: DataAddress;
  agreementId: string;
}

export interface StartResult {
  flow: DataFlow;
  token: AccessToken;
  /** PULL only */
  edr?: EndpointDataReference;
}

export interface SignalingControllerOptions {
  store: ProcessStore;
  claims: ClaimsAuthority;
  dataPlane: DataPlane;
  metrics?: MetricsCollector;
  logger?: Logger;
  now?: () => Date;
}

function sameParameters(flow: DataFlow, request: StartRequest): boolean {
  return flow.type === request.type
    && flow.agreementId === request.agreementId
    && canonicalize(flow.address) === canonicalize(request.address);
}

function withoutToken(flow: DataFlow): DataFlow {
  const { tokenId: _, ...rest } = flow;
  return rest;
}

export class SignalingController {
  private readonly store: ProcessStore;
  private readonly claims: ClaimsAuthority;
  private readonly dataPlane: DataPlane;
  private readonly metrics: MetricsCollector;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: SignalingControllerOptions) {
    this.store = options.store;
    this.claims = options.claims;
    this.dataPlane = options.dataPlane;
    this.metrics = options.metrics ?? globalMetrics;
    this.logger = options.logger ?? createLogger('SignalingController');
    this.now = options.now ?? (() => new Date());
  }

  async get(processId: string): Promise<DataFlow | null> {
    return this.store.dataFlows.load(processId);
  }

  async listByState(state: DataFlowState): Promise<DataFlow[]> {
    return this.store.dataFlows.listByState(state);
  }

  /**
   * Start a new flow, resume a suspended one, or return the current token of
   * a flow already started with the same parameters.
   */
  async start(request: StartRequest): Promise<StartResult> {
    return this.store.dataFlows.withLease(request.processId, async () => {
      const existing = await this.store.dataFlows.load(request.processId);
      if (!existing) return this.create(request);

      if (existing.state === 'STARTED' && sameParameters(existing, request)) {
        return this.current(existing);
      }
      if (existing.state === 'SUSPENDED' && sameParameters(existing, request)) {
        return this.reactivate(existing);
      }
      throw new DataspaceError(
        'InvalidStateTransition',
        existing.state === 'STARTED' || existing.state === 'SUSPENDED'
          ? `Data flow ${existing.id} exists with different parameters`
          : `Data flow ${existing.id} is ${existing.state} and cannot start`,
        { processId: existing.id, state: existing.state },
      );
    });
  }

  /** Start again with the parameters stored on the flow. */
  async resume(processId: string): Promise<StartResult> {
    const flow = await this.store.dataFlows.require(processId);
    return this.start({ processId, type: flow.type, address: flow.address, agreementId: flow.agreementId });
  }

  /** Suspending an already suspended flow succeeds without side effects. */
  async suspend(processId: string, reason?: TerminationReason): Promise<DataFlow> {
    return this.store.dataFlows.withLease(processId, async () => {
      const flow = await this.store.dataFlows.load(processId);
      if (!flow) {
        throw new DataspaceError('InvalidStateTransition', `No data flow ${processId} to suspend`, { processId });
      }
      if (flow.state === 'SUSPENDED') return flow;
      dataFlowMachine.assertTransition(flow.state, 'SUSPENDED', processId);

      await this.dataPlane.pause(processId);
      if (flow.tokenId) await this.claims.revokeToken(flow.tokenId);

      const next = dataFlowMachine.transition(withoutToken(flow), 'SUSPENDED', reason?.code, this.now());
      return this.persist({ ...next, ...(reason ? { reason } : {}) }, flow.state);
    });
  }

  /** Terminating a terminated flow succeeds without side effects. */
  async terminate(processId: string, reason: TerminationReason = { code: 'Manual' }): Promise<DataFlow> {
    return this.store.dataFlows.withLease(processId, async () => {
      const flow = await this.store.dataFlows.require(processId);
      if (flow.state === 'TERMINATED') return flow;

      await this.dataPlane.teardown(processId);
      if (flow.tokenId) await this.claims.revokeToken(flow.tokenId);

      const next = dataFlowMachine.transition(withoutToken(flow), 'TERMINATED', reason.code, this.now());
      return this.persist({ ...next, reason }, flow.state);
    });
  }

  async applyTrigger(trigger: Trigger): Promise<DataFlow> {
    const { action, reason } = resolveTrigger(trigger);
    this.logger.info('Trigger received', { processId: trigger.processId, source: trigger.source, action });
    this.metrics.counter('signaling.triggers', { source: trigger.source, action });
    return action === 'suspend'
      ? this.suspend(trigger.processId, reason)
      : this.terminate(trigger.processId, reason);
  }

  private async create(request: StartRequest): Promise<StartResult> {
    const token = await this.claims.issueToken(request.processId, request.type);
    const endpoint = await this.withTokenRollback(token, () => this.dataPlane.provision(request.address, token));

    const at = this.now();
    const requested: DataFlow = {
      id: request.processId,
      state: 'REQUESTED',
      version: 0,
      createdAt: at.toISOString(),
      updatedAt: at.toISOString(),
      history: [{ from: null, to: 'REQUESTED', at: at.toISOString() }],
      type: request.type,
      agreementId: request.agreementId,
      address: request.address,
    };
    const started = dataFlowMachine.transition(requested, 'STARTED', undefined, at);
    const flow = await this.persist({ ...started, tokenId: token.id, endpoint: endpoint.endpoint }, 'REQUESTED');
    return this.result(flow, token);
  }

  private async reactivate(flow: DataFlow): Promise<StartResult> {
    const token = await this.claims.issueToken(flow.id, flow.type);
    const endpoint = await this.withTokenRollback(token, () => this.dataPlane.resume(flow.id, token));

    const { reason: _, ...rest } = dataFlowMachine.transition(flow, 'STARTED', 'resumed', this.now());
    const saved = await this.persist({ ...rest, tokenId: token.id, endpoint: endpoint.endpoint }, flow.state);
    return this.result(saved, token);
  }

  /** The token a started flow is served with, replaced once it is no longer live. */
  private async current(flow: DataFlow): Promise<StartResult> {
    const stored = flow.tokenId ? await this.claims.getToken(flow.tokenId) : null;
    if (stored && !stored.revoked && new Date(stored.expiresAt).getTime() > this.now().getTime()) {
      return this.result(flow, stored);
    }

    const token = await this.claims.issueToken(flow.id, flow.type);
    const endpoint = await this.withTokenRollback(token, () => this.dataPlane.resume(flow.id, token));
    if (stored) await this.claims.revokeToken(stored.id);
    this.logger.info('Token replaced', { processId: flow.id, tokenId: token.id });
    const saved = await this.persist(
      { ...flow, tokenId: token.id, endpoint: endpoint.endpoint, updatedAt: this.now().toISOString() },
      flow.state,
    );
    return this.result(saved, token);
  }

  private result(flow: DataFlow, token: AccessToken): StartResult {
    if (flow.type !== 'PULL' || !flow.endpoint) return { flow, token };
    return {
      flow,
      token,
      edr: {
        processId: flow.id,
        endpoint: flow.endpoint,
        tokenId: token.id,
        token: token.value,
        expiresAt: token.expiresAt,
      },
    };
  }

  /** Revoke `token` when `fn` fails, then rethrow. */
  private async withTokenRollback<T>(token: AccessToken, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      await this.claims.revokeToken(token.id);
      throw err;
    }
  }

  private async persist(flow: DataFlow, from: DataFlowState): Promise<DataFlow> {
    const saved = await this.store.dataFlows.save(flow);
    this.metrics.counter('signaling.transitions', { to: saved.state });
    this.logger.info('Data flow transition', {
      processId: saved.id,
      from,
      to: saved.state,
      ...(saved.reason ? { reason: saved.reason.code } : {}),
    });
    return saved;
  }
}
