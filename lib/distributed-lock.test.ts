import { describe, it, expect } from 'vitest';
import { claimId, withLock } from './distributed-lock';
import { MemoryLockManager } from './testing/memory-stores';

const options = { lockName: 'slot:post:1-09:15@2024-01-01', ttlSeconds: 900, now: new Date('2024-01-01T09:16:00Z') };

describe('withLock', () => {
  it('runs the callback and releases the claim', async () => {
    const locks = new MemoryLockManager();

    const outcome = await withLock(locks, options, async () => 'done');

    expect(outcome).toEqual({ skipped: false, result: 'done' });
    expect(locks.isHeld(options.lockName)).toBe(false);
  });

  it('skips when another holder has the claim', async () => {
    const locks = new MemoryLockManager();
    locks.hold(options.lockName, 'other-host', new Date('2024-01-01T09:30:00Z'));

    const outcome = await withLock(locks, options, async () => 'done');

    expect(outcome).toMatchObject({ skipped: true, lock: { acquired: false, holder: 'other-host' } });
  });

  it('releases the claim when the callback throws', async () => {
    const locks = new MemoryLockManager();

    await expect(withLock(locks, options, async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(locks.isHeld(options.lockName)).toBe(false);
  });
});

describe('claimId', () => {
  it('prefixes claim names once', () => {
    expect(claimId('slot:x')).toBe('claim:slot:x');
    expect(claimId('claim:slot:x')).toBe('claim:slot:x');
  });
});
