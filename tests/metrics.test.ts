import { describe, it, expect, beforeEach } from 'vitest';
import { MetricsCollector } from '../src/core/metrics.js';
import type { MetricsAdapter, Tags } from '../src/core/metrics.js';
import { createDataspace, startTransfer } from './helpers.js';

describe('MetricsCollector', () => {
  let metrics: MetricsCollector;

  beforeEach(() => {
    metrics = new MetricsCollector();
  });

  describe('counters', () => {
    it('increments by one or by a custom amount', () => {
      metrics.counter('dispatch.delivered');
      metrics.counter('dispatch.delivered', undefined, 4);
      expect(metrics.getCounter('dispatch.delivered')).toBe(5);
    });

    it('keeps tag combinations apart and sums them without tags', () => {
      metrics.counter('transfer.transitions', { role: 'PROVIDER', to: 'STARTED' });
      metrics.counter('transfer.transitions', { to: 'STARTED', role: 'PROVIDER' });
      metrics.counter('transfer.transitions', { role: 'CONSUMER', to: 'STARTED' });
      expect(metrics.getCounter('transfer.transitions', { role: 'PROVIDER', to: 'STARTED' })).toBe(2);
      expect(metrics.getCounter('transfer.transitions', { role: 'CONSUMER', to: 'STARTED' })).toBe(1);
      expect(metrics.getCounter('transfer.transitions')).toBe(3);
    });

    it('returns 0 for unknown counters and tags', () => {
      metrics.counter('known', { a: '1' });
      expect(metrics.getCounter('unknown')).toBe(0);
      expect(metrics.getCounter('known', { a: '2' })).toBe(0);
    });
  });

  describe('histograms', () => {
    it('records values per tag combination', () => {
      metrics.histogram('dispatch.latency_ms', 3, { type: 'TransferStart' });
      metrics.histogram('dispatch.latency_ms', 7, { type: 'TransferStart' });
      metrics.histogram('dispatch.latency_ms', 1, { type: 'ContractOffer' });
      expect(metrics.getHistogramValues('dispatch.latency_ms', { type: 'TransferStart' })).toEqual([3, 7]);
      expect(metrics.getHistogramValues('dispatch.latency_ms')).toEqual([3, 7, 1]);
      expect(metrics.getHistogramValues('nothing')).toEqual([]);
    });
  });

  describe('snapshot and reset', () => {
    it('lists every series with its tags', () => {
      metrics.counter('claims.tokens.issued', { direction: 'PULL' });
      metrics.histogram('dispatch.latency_ms', 2);
      const snapshot = metrics.getSnapshot();
      expect(snapshot.counters['claims.tokens.issued']).toEqual([{ value: 1, tags: { direction: 'PULL' } }]);
      expect(snapshot.histograms['dispatch.latency_ms']).toEqual([{ values: [2], tags: undefined }]);
      expect(typeof snapshot.collectedAt).toBe('string');
    });

    it('clears everything on reset', () => {
      metrics.counter('a');
      metrics.histogram('b', 1);
      metrics.reset();
      expect(metrics.getSnapshot().counters).toEqual({});
      expect(metrics.getSnapshot().histograms).toEqual({});
    });
  });

  describe('adapters', () => {
    it('forwards every observation', () => {
      const seen: [string, string, number, Tags | undefined][] = [];
      const adapter: MetricsAdapter = {
        onCounter: (name, value, tags) => seen.push(['counter', name, value, tags]),
        onHistogram: (name, value, tags) => seen.push(['histogram', name, value, tags]),
      };
      metrics.registerAdapter(adapter);
      metrics.counter('c', { k: 'v' }, 2);
      metrics.histogram('h', 9);
      expect(seen).toEqual([
        ['counter', 'c', 2, { k: 'v' }],
        ['histogram', 'h', 9, undefined],
      ]);
    });
  });

  it('counts transitions and tokens during a transfer', async () => {
    const space = await createDataspace();
    await startTransfer(space);

    expect(space.metrics.getCounter('transfer.transitions', { role: 'PROVIDER', to: 'STARTED' })).toBe(1);
    expect(space.metrics.getCounter('transfer.transitions', { role: 'CONSUMER', to: 'STARTED' })).toBe(1);
    expect(space.metrics.getCounter('claims.tokens.issued', { direction: 'PULL' })).toBe(1);
    expect(space.metrics.getCounter('negotiation.transitions')).toBeGreaterThan(0);
  });
});
