/**
 * Delivery failures, cancellation, duplicates and rejected inbound messages.
 */

import { describe, it, expect } from 'vitest';
import { generateKeypair } from '../../src/core/crypto.js';
import { createPresentation } from '../../src/claims/credential.js';
import type { ProtocolMessage } from '../../src/transport/types.js';
import type { Participant } from '../../src/participant.js';
import { ASSET, POLICY, createDataspace, negotiate, settle, startTransfer } from '../helpers.js';

const SLOW_RETRY = { maxRetries: 3, baseDelayMs: 100, maxDelayMs: 100, attemptTimeoutMs: 1_000 };

function from(sender: Participant, receiver: Participant, body: Record<string, unknown>, messageId = 'msg_test') {
  return {
    ...body,
    messageId,
    senderId: sender.id,
    presentation: createPresentation(sender.keypair, [...sender.wallet], receiver.id),
  };
}

describe('Resilience', () => {
  describe('unreachable counterparty', () => {
    it('terminates a provider transfer and its data flow once retries run out', async () => {
      const space = await createDataspace();
      const agreementId = await negotiate(space);
      space.network.disconnect(space.consumer.id);

      await expect(space.provider.transfers.requestTransfer(agreementId, 'PULL'))
        .rejects.toMatchObject({ kind: 'CounterpartyUnreachable' });

      const [ended] = await space.provider.transfers.listByState('TERMINATED');
      expect(ended.reason?.code).toBe('CounterpartyUnreachable');
      expect(ended.edr).toBeUndefined();
      const flow = await space.provider.signaling.get(ended.id);
      expect(flow?.state).toBe('TERMINATED');
      expect(flow?.reason?.code).toBe('CounterpartyUnreachable');
      expect(await space.provider.claims.liveTokens(ended.id)).toEqual([]);
      expect(space.metrics.getCounter('dispatch.exhausted', { type: 'TransferStart' })).toBe(1);
    });

    it('records a consumer request that never reached the provider as TERMINATED', async () => {
      const space = await createDataspace();
      const agreementId = await negotiate(space);
      space.network.disconnect(space.provider.id);

      await expect(space.consumer.transfers.initiate(agreementId, 'PULL'))
        .rejects.toMatchObject({ kind: 'CounterpartyUnreachable' });

      const [ended] = await space.consumer.transfers.listByState('TERMINATED');
      expect(ended.version).toBe(2);
      expect(ended.history.map(h => h.to)).toEqual(['REQUESTED', 'TERMINATED']);
      expect(ended.reason?.code).toBe('CounterpartyUnreachable');
    });

    it('records a negotiation request that never reached the provider as TERMINATED', async () => {
      const space = await createDataspace();
      space.network.disconnect(space.provider.id);

      await expect(space.consumer.negotiations.requestContract(space.provider.id, ASSET, POLICY))
        .rejects.toMatchObject({ kind: 'CounterpartyUnreachable' });

      const [ended] = await space.consumer.negotiations.listByState('TERMINATED');
      expect(ended.history.map(h => h.to)).toEqual(['REQUESTED', 'TERMINATED']);
      expect(ended.reason?.code).toBe('CounterpartyUnreachable');
    });

    it('retries a transient failure with the same message id', async () => {
      const space = await createDataspace();
      const { process } = await startTransfer(space);
      space.network.failNext(space.consumer.id, 1);

      const suspended = await space.provider.transfers.suspend(process.id);

      expect(suspended.state).toBe('SUSPENDED');
      expect(space.metrics.getCounter('dispatch.retries', { type: 'TransferSuspension' })).toBe(1);
      const delivered = space.network.deliveriesOf('TransferSuspension');
      expect(delivered).toHaveLength(1);
      const [mirror] = await space.consumer.transfers.listByState('SUSPENDED');
      expect(mirror.processedMessageIds).toContain(delivered[0].messageId);
    });
  });

  describe('acknowledgements that arrive after the reply', () => {
    it('finalizes a negotiation', async () => {
      const space = await createDataspace();
      space.network.setAckLatency(20);

      const agreementId = await negotiate(space);

      const [theirs] = await space.provider.negotiations.listByState('FINALIZED');
      expect(theirs.agreement?.id).toBe(agreementId);
    });

    it('starts a transfer the consumer requested', async () => {
      const space = await createDataspace();
      const agreementId = await negotiate(space);
      space.network.setAckLatency(20);

      const mirror = await space.consumer.transfers.initiate(agreementId, 'PULL');
      await settle(space.consumer, space.provider);

      const started = await space.consumer.transfers.get(mirror.id);
      expect(started?.state).toBe('STARTED');
      const [providerSide] = await space.provider.transfers.listByState('STARTED');
      expect(providerSide.counterpartyPid).toBe(mirror.id);
      expect(started?.edr?.token).toBeDefined();
    });
  });

  it('abandons pending deliveries when the process is terminated', async () => {
    const space = await createDataspace({ providerConfig: { retry: SLOW_RETRY } });
    const { process } = await startTransfer(space);
    space.network.disconnect(space.consumer.id);

    const suspending = expect(space.provider.transfers.suspend(process.id))
      .rejects.toMatchObject({ kind: 'Aborted' });
    await new Promise(resolve => setTimeout(resolve, 20));
    expect(space.provider.dispatcher.pending(process.id)).toBe(1);

    const ended = await space.provider.transfers.terminate(process.id);
    await suspending;
    space.network.reconnect(space.consumer.id);
    await settle(space.consumer, space.provider);

    expect(ended.state).toBe('TERMINATED');
    expect(ended.reason).toEqual({ code: 'Manual' });
    expect(space.provider.dispatcher.pending(process.id)).toBe(0);
    expect(space.providerPlane.callsFor(process.id)).toEqual(['provision', 'pause', 'teardown']);
    const [mirror] = await space.consumer.transfers.listByState('TERMINATED');
    expect(mirror.reason).toEqual({ code: 'CounterpartyTerminated' });
  });

  it('abandons pending deliveries when the counterparty terminates', async () => {
    const space = await createDataspace({ providerConfig: { retry: SLOW_RETRY } });
    const { process } = await startTransfer(space);
    space.network.failNext(space.consumer.id, 4);

    const suspending = expect(space.provider.transfers.suspend(process.id))
      .rejects.toMatchObject({ kind: 'Aborted', message: 'TransferTermination received' });
    await new Promise(resolve => setTimeout(resolve, 20));
    expect(space.provider.dispatcher.pending(process.id)).toBe(1);

    const [mirror] = await space.consumer.transfers.listByState('STARTED');
    await space.consumer.transfers.terminate(mirror.id);
    await suspending;
    await settle(space.consumer, space.provider);

    const ended = await space.provider.transfers.get(process.id);
    expect(ended?.state).toBe('TERMINATED');
    expect(ended?.reason).toEqual({ code: 'CounterpartyTerminated' });
    expect(space.provider.dispatcher.pending(process.id)).toBe(0);
    expect((await space.provider.signaling.get(process.id))?.state).toBe('TERMINATED');
  });

  it('applies a redelivered message once', async () => {
    const space = await createDataspace();
    const { process } = await startTransfer(space);
    const message = from(space.consumer, space.provider, {
      type: 'TransferSuspension',
      providerPid: process.id,
      reason: { code: 'Manual' },
    }, 'msg_repeat');

    expect(await space.provider.receive(message)).toEqual({ status: 'ok' });
    const first = await space.provider.transfers.get(process.id);
    expect(await space.provider.receive(message)).toEqual({ status: 'ok' });
    const second = await space.provider.transfers.get(process.id);

    expect(first?.state).toBe('SUSPENDED');
    expect(second?.version).toBe(first?.version);
    expect(space.metrics.getCounter('transfer.duplicates')).toBe(1);
    expect(space.providerPlane.callsFor(process.id)).toEqual(['provision', 'pause']);
  });

  describe('inbound verification', () => {
    it('terminates the addressed transfer when the presentation belongs to someone else', async () => {
      const space = await createDataspace();
      const { process } = await startTransfer(space);
      const stranger = generateKeypair('stranger');

      const ack = await space.provider.receive({
        type: 'TransferSuspension',
        providerPid: process.id,
        messageId: 'msg_forged',
        senderId: space.consumer.id,
        presentation: createPresentation(stranger, [], space.provider.id),
      });
      await settle(space.consumer, space.provider);

      expect(ack).toEqual({
        status: 'rejected',
        error: { kind: 'VerificationFailed', message: 'Presentation holder is not the sender' },
      });
      const ended = await space.provider.transfers.get(process.id);
      expect(ended?.state).toBe('TERMINATED');
      expect(ended?.reason).toEqual({ code: 'VerificationFailed', detail: 'Presentation holder is not the sender' });
      const [mirror] = await space.consumer.transfers.listByState('TERMINATED');
      expect(mirror.reason?.code).toBe('VerificationFailed');
    });

    it('rejects a message without a presentation', async () => {
      const space = await createDataspace();
      const ack = await space.provider.receive({
        type: 'PresentationQuery',
        messageId: 'msg_bare',
        senderId: space.consumer.id,
      });
      expect(ack).toEqual({
        status: 'rejected',
        error: { kind: 'VerificationFailed', message: 'Message carries no presentation' },
      });
    });

    it('rejects a presentation addressed to another participant', async () => {
      const space = await createDataspace();
      const ack = await space.provider.receive({
        type: 'PresentationQuery',
        messageId: 'msg_elsewhere',
        senderId: space.consumer.id,
        presentation: createPresentation(space.consumer.keypair, [...space.consumer.wallet], 'someone-else'),
      });
      expect(ack).toEqual({
        status: 'rejected',
        error: { kind: 'VerificationFailed', message: 'Presentation is not addressed to this participant' },
      });
    });

    it('ends the sender side when its credential has been revoked', async () => {
      const space = await createDataspace();
      const agreementId = await negotiate(space);
      const [credential] = space.consumer.wallet;
      await space.provider.claims.revokeCredential(credential.id);

      await expect(space.consumer.transfers.initiate(agreementId, 'PULL'))
        .rejects.toMatchObject({ kind: 'VerificationFailed' });

      const [ended] = await space.consumer.transfers.listByState('TERMINATED');
      expect(ended.reason).toEqual({
        code: 'VerificationFailed',
        detail: `TransferRequest rejected: Credential ${credential.id} has been revoked`,
      });
      expect(await space.provider.storage.listTransfers()).toEqual([]);
    });
  });

  describe('malformed input', () => {
    it('rejects a message that does not match any message schema', async () => {
      const space = await createDataspace();
      const ack = await space.provider.receive({ type: 'Nonsense', messageId: 'msg_x', senderId: 'x' });
      expect(ack.status).toBe('rejected');
      expect(ack.status === 'rejected' && ack.error.kind).toBe('MalformedMessage');
      expect(space.metrics.getCounter('inbound.rejected', { kind: 'MalformedMessage' })).toBe(1);
    });

    it('rejects a transfer message missing its process ids', async () => {
      const space = await createDataspace();
      const ack = await space.provider.receive(from(space.consumer, space.provider, {
        type: 'TransferStart',
        agreementId: 'agr_missing',
        transferType: 'PULL',
      }));
      expect(ack.status === 'rejected' && ack.error.kind).toBe('MalformedMessage');
    });

    it.each<[ProtocolMessage['type'], Record<string, unknown>]>([
      ['RevocationStatus', { credentialId: 'vc_1', revoked: false }],
      ['CredentialOffer', {}],
    ])('rejects %s outside of an acknowledgement', async (type, fields) => {
      const space = await createDataspace();
      const body = type === 'CredentialOffer' ? { credential: space.consumer.wallet[0] } : fields;
      const ack = await space.provider.receive(from(space.consumer, space.provider, { type, ...body }));
      expect(ack).toEqual({
        status: 'rejected',
        error: { kind: 'MalformedMessage', message: `${type} is only valid as a reply` },
      });
    });

    it('rejects a transfer message for an unknown process', async () => {
      const space = await createDataspace();
      const ack = await space.provider.receive(from(space.consumer, space.provider, {
        type: 'TransferTermination',
        providerPid: 'tp_unknown',
        reason: { code: 'Manual' },
      }));
      expect(ack.status === 'rejected' && ack.error.kind).toBe('ProcessNotFound');
    });
  });
});
