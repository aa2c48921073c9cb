import { describe, it, expect } from 'vitest';
import { MemoryActivityLedger } from '../testing/memory-stores';
import { LedgerWriteError, buildAttemptEntry, buildOutcomeEntry } from './activity-ledger';

const at = (iso: string) => new Date(iso);
const slotWindow = { since: at('2024-01-01T09:13:00Z'), until: at('2024-01-02T09:15:00Z') };

describe('buildOutcomeEntry', () => {
  const attempt = buildAttemptEntry({ actionKind: 'post', targetKey: 'post:k', at: at('2024-01-01T09:16:00Z') });

  it('links the outcome to its attempt', () => {
    const outcome = buildOutcomeEntry(attempt, { outcome: 'failed', errorKind: 'TransientError', at: at('2024-01-01T09:17:00Z') });

    expect(outcome).toMatchObject({
      attemptId: attempt.id,
      actionKind: 'post',
      targetKey: 'post:k',
      phase: 'outcome',
      outcome: 'failed',
      errorKind: 'TransientError',
    });
    expect(outcome.id).not.toBe(attempt.id);
  });

  it('refuses a success without an external id', () => {
    expect(() => buildOutcomeEntry(attempt, { outcome: 'succeeded', at: at('2024-01-01T09:17:00Z') })).toThrow(
      new LedgerWriteError('Refusing to record success for post:post:k without an external id')
    );
  });

  it('refuses to close an outcome entry', () => {
    const outcome = buildOutcomeEntry(attempt, { outcome: 'skipped', at: at('2024-01-01T09:17:00Z') });

    expect(() => buildOutcomeEntry(outcome, { outcome: 'failed', at: at('2024-01-01T09:18:00Z') })).toThrow(
      `Entry ${outcome.id} is not an attempt`
    );
  });
});

describe('MemoryActivityLedger.hasSucceeded', () => {
  it('does not count an attempt without an outcome', async () => {
    const ledger = new MemoryActivityLedger();
    await ledger.recordAttempt({ actionKind: 'post', targetKey: 'post:k', at: at('2024-01-01T09:16:00Z') });

    await expect(ledger.hasSucceeded('post', 'post:k', slotWindow)).resolves.toBe(false);
  });

  it('does not count a failure', async () => {
    const ledger = new MemoryActivityLedger();
    const attempt = await ledger.recordAttempt({ actionKind: 'post', targetKey: 'post:k', at: at('2024-01-01T09:16:00Z') });
    await ledger.recordOutcome(attempt, { outcome: 'failed', errorKind: 'TransientError', at: at('2024-01-01T09:17:00Z') });

    await expect(ledger.hasSucceeded('post', 'post:k', slotWindow)).resolves.toBe(false);
  });

  it('counts a success inside the slotWindow only', async () => {
    const ledger = new MemoryActivityLedger();
    const attempt = await ledger.recordAttempt({ actionKind: 'post', targetKey: 'post:k', at: at('2024-01-01T09:16:00Z') });
    await ledger.recordOutcome(attempt, { outcome: 'succeeded', externalId: 'urn:li:share:1', at: at('2024-01-01T09:17:00Z') });

    await expect(ledger.hasSucceeded('post', 'post:k', slotWindow)).resolves.toBe(true);
    await expect(ledger.hasSucceeded('engagement', 'post:k', slotWindow)).resolves.toBe(false);
    await expect(
      ledger.hasSucceeded('post', 'post:k', { since: at('2024-01-01T10:00:00Z'), until: at('2024-01-02T10:00:00Z') })
    ).resolves.toBe(false);
  });
});

describe('MemoryActivityLedger.lastAttemptAt', () => {
  it('returns the latest attempt of the kind', async () => {
    const ledger = new MemoryActivityLedger();
    await ledger.recordAttempt({ actionKind: 'post', targetKey: 'a', at: at('2024-01-01T09:16:00Z') });
    await ledger.recordAttempt({ actionKind: 'post', targetKey: 'b', at: at('2024-01-01T11:16:00Z') });
    await ledger.recordAttempt({ actionKind: 'engagement', targetKey: 'c', at: at('2024-01-01T12:00:00Z') });

    await expect(ledger.lastAttemptAt('post')).resolves.toEqual(at('2024-01-01T11:16:00Z'));
    await expect(ledger.lastAttemptAt('connection')).resolves.toBeUndefined();
  });
});
