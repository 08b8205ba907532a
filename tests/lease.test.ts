import { describe, it, expect } from 'vitest';
import { LeaseManager } from '../src/core/lease.js';

describe('LeaseManager', () => {
  it('holds a key until the lease is released', async () => {
    const leases = new LeaseManager();
    const lease = await leases.acquire('transfer:tp_1');
    expect(leases.isHeld('transfer:tp_1')).toBe(true);
    expect(leases.isHeld('transfer:tp_2')).toBe(false);
    lease.release();
    expect(leases.isHeld('transfer:tp_1')).toBe(false);
  });

  it('grants waiters in arrival order', async () => {
    const leases = new LeaseManager();
    const order: string[] = [];
    const first = await leases.acquire('k');

    const a = leases.run('k', async () => { order.push('a'); });
    const b = leases.run('k', async () => { order.push('b'); });
    expect(leases.waiting('k')).toBe(2);

    order.push('first');
    first.release();
    await Promise.all([a, b]);
    expect(order).toEqual(['first', 'a', 'b']);
    expect(leases.isHeld('k')).toBe(false);
  });

  it('fails at once with a zero timeout', async () => {
    const leases = new LeaseManager();
    await leases.acquire('k');
    await expect(leases.acquire('k', { timeoutMs: 0 })).rejects.toMatchObject({
      kind: 'ConcurrentModification',
      message: 'Process k is locked by another operation',
    });
  });

  it('gives up after the timeout and leaves the queue', async () => {
    const leases = new LeaseManager(20);
    const held = await leases.acquire('k');
    await expect(leases.acquire('k')).rejects.toThrow('Timed out after 20ms waiting for the lease on k');
    expect(leases.waiting('k')).toBe(0);

    held.release();
    expect(leases.isHeld('k')).toBe(false);
  });

  it('releases when the guarded function throws', async () => {
    const leases = new LeaseManager();
    await expect(leases.run('k', async () => { throw new Error('boom'); })).rejects.toThrow('boom');
    expect(leases.isHeld('k')).toBe(false);
  });

  it('ignores a second release', async () => {
    const leases = new LeaseManager();
    const first = await leases.acquire('k');
    first.release();
    const second = await leases.acquire('k');
    first.release();
    expect(leases.isHeld('k')).toBe(true);
    second.release();
    expect(leases.isHeld('k')).toBe(false);
  });
});
