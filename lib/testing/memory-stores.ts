/**
 * In-process stand-ins for the Mongo-backed stores. Same contracts, no
 * database; used by the test suites.
 */

import { addMilliseconds } from 'date-fns';
import { v4 as uuidv4 } from 'uuid';
import { getDateKey } from '../dates';
import type { LockManager, LockOptions, LockResult } from '../distributed-lock';
import {
  buildAttemptEntry,
  buildOutcomeEntry,
  type ActivityLedger,
  type AttemptInput,
  type LedgerQuery,
  type OutcomeInput,
} from '../ledger/activity-ledger';
import {
  PostRecordTransitionError,
  resolutionFields,
  type PostRecordStore,
  type PostResolution,
} from '../ledger/post-records';
import type { IncrementRequest, RateCounterStore } from '../rate-limiter';
import type { Runtime } from '../runtime';
import type { ActionKind, ActivityLedgerEntry, ContentItem, PostRecord, TimeWindow } from '../types';

export class MemoryActivityLedger implements ActivityLedger {
  readonly entries: ActivityLedgerEntry[] = [];

  async recordAttempt(input: AttemptInput): Promise<ActivityLedgerEntry> {
    const entry = buildAttemptEntry(input);
    this.entries.push(entry);
    return entry;
  }

  async recordOutcome(attempt: ActivityLedgerEntry, input: OutcomeInput): Promise<ActivityLedgerEntry> {
    const entry = buildOutcomeEntry(attempt, input);
    this.entries.push(entry);
    return entry;
  }

  async hasSucceeded(actionKind: ActionKind, targetKey: string, window: TimeWindow): Promise<boolean> {
    return this.entries.some(
      entry =>
        entry.actionKind === actionKind &&
        entry.targetKey === targetKey &&
        entry.phase === 'outcome' &&
        entry.outcome === 'succeeded' &&
        entry.timestamp >= window.since &&
        entry.timestamp <= window.until
    );
  }

  async lastAttemptAt(actionKind: ActionKind): Promise<Date | undefined> {
    let latest: Date | undefined;
    for (const entry of this.entries) {
      if (entry.actionKind !== actionKind || entry.phase !== 'attempt') continue;
      if (!latest || entry.timestamp > latest) latest = entry.timestamp;
    }
    return latest;
  }

  async list(query: LedgerQuery = {}): Promise<ActivityLedgerEntry[]> {
    return this.entries
      .filter(
        entry =>
          (!query.actionKind || entry.actionKind === query.actionKind) &&
          (!query.phase || entry.phase === query.phase) &&
          (!query.since || entry.timestamp >= query.since) &&
          (!query.until || entry.timestamp <= query.until)
      )
      .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  }

  outcomes(actionKind?: ActionKind): ActivityLedgerEntry[] {
    return this.entries.filter(e => e.phase === 'outcome' && (!actionKind || e.actionKind === actionKind));
  }
}

/**
 * Wraps a ledger so that `interleave` runs once, right after the first
 * `hasSucceeded` read returns. Lets a test run another cycle between a
 * worker's dedup check and its claim.
 */
export function interleavedLedger(ledger: ActivityLedger, interleave: () => Promise<unknown>): ActivityLedger {
  let pending: (() => Promise<unknown>) | undefined = interleave;
  return {
    recordAttempt: input => ledger.recordAttempt(input),
    recordOutcome: (attempt, input) => ledger.recordOutcome(attempt, input),
    lastAttemptAt: actionKind => ledger.lastAttemptAt(actionKind),
    list: query => ledger.list(query),
    async hasSucceeded(actionKind, targetKey, window) {
      const result = await ledger.hasSucceeded(actionKind, targetKey, window);
      const run = pending;
      pending = undefined;
      if (run) await run();
      return result;
    },
  };
}

export class MemoryPostRecordStore implements PostRecordStore {
  readonly records = new Map<string, PostRecord>();

  async createPending({ occurrenceKey, contentItem, at }: { occurrenceKey: string; contentItem: ContentItem; at: Date }): Promise<PostRecord> {
    const record: PostRecord = { id: uuidv4(), occurrenceKey, contentItem, status: 'pending', submittedAt: at };
    this.records.set(record.id, record);
    return { ...record };
  }

  async resolve(id: string, resolution: PostResolution): Promise<PostRecord> {
    const record = this.records.get(id);
    if (!record || record.status !== 'pending') {
      throw new PostRecordTransitionError(id);
    }
    const resolved: PostRecord = { ...record, ...resolutionFields(resolution) };
    this.records.set(id, resolved);
    return { ...resolved };
  }

  all(): PostRecord[] {
    return [...this.records.values()];
  }
}

interface MemoryCounter {
  count: number;
  lastAdmittedAt?: Date;
}

export class MemoryRateCounterStore implements RateCounterStore {
  private readonly counters = new Map<string, MemoryCounter>();
  private readonly latest = new Map<ActionKind, Date>();

  private key(actionKind: ActionKind, day: Date): string {
    return `${actionKind}@${getDateKey(day).toISOString()}`;
  }

  async countFor(actionKind: ActionKind, day: Date): Promise<number> {
    return this.counters.get(this.key(actionKind, day))?.count ?? 0;
  }

  async lastAdmittedAt(actionKind: ActionKind): Promise<Date | undefined> {
    return this.latest.get(actionKind);
  }

  async tryIncrement({ actionKind, day, cap, at, spacingCutoff }: IncrementRequest): Promise<boolean> {
    const key = this.key(actionKind, day);
    const counter = this.counters.get(key) ?? { count: 0 };
    const last = this.latest.get(actionKind);
    if (counter.count >= cap) return false;
    if (last && last > spacingCutoff) return false;
    this.counters.set(key, { count: counter.count + 1, lastAdmittedAt: at });
    this.latest.set(actionKind, at);
    return true;
  }

  /** Seed a counter, e.g. to start a test at the cap. */
  set(actionKind: ActionKind, day: Date, count: number, lastAdmittedAt?: Date): void {
    this.counters.set(this.key(actionKind, day), { count, lastAdmittedAt });
    const last = this.latest.get(actionKind);
    if (lastAdmittedAt && (!last || lastAdmittedAt > last)) this.latest.set(actionKind, lastAdmittedAt);
  }
}

export class MemoryLockManager implements LockManager {
  private readonly held = new Map<string, { holder: string; expiresAt: Date }>();
  /** Names acquired over the manager's lifetime, in order. */
  readonly acquired: string[] = [];
  failWith?: Error;

  constructor(private readonly holder = 'test-instance') {}

  async acquire({ lockName, ttlSeconds, now = new Date() }: LockOptions): Promise<LockResult> {
    if (this.failWith) {
      return { acquired: false, lockId: lockName, unavailable: true, error: this.failWith.message };
    }
    const current = this.held.get(lockName);
    if (current && current.expiresAt > now) {
      return { acquired: false, lockId: lockName, holder: current.holder, error: `Claim held by ${current.holder}` };
    }
    this.held.set(lockName, { holder: this.holder, expiresAt: addMilliseconds(now, ttlSeconds * 1000) });
    this.acquired.push(lockName);
    return { acquired: true, lockId: lockName, holder: this.holder };
  }

  async release(lockName: string): Promise<boolean> {
    return this.held.delete(lockName);
  }

  /** Simulate another instance holding a claim. */
  hold(lockName: string, holder: string, expiresAt: Date): void {
    this.held.set(lockName, { holder, expiresAt });
  }

  isHeld(lockName: string): boolean {
    return this.held.has(lockName);
  }
}

/**
 * Runtime whose clock only moves when the code sleeps. `random` cycles
 * through the given values.
 */
export class ManualRuntime implements Runtime {
  readonly sleeps: number[] = [];
  private current: Date;
  private randomIndex = 0;

  constructor(start: Date, private readonly randomValues: readonly number[] = [0]) {
    this.current = new Date(start);
  }

  now(): Date {
    return new Date(this.current);
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current = addMilliseconds(this.current, ms);
  }

  random(): number {
    const value = this.randomValues[this.randomIndex % this.randomValues.length];
    this.randomIndex += 1;
    return value;
  }

  advance(ms: number): void {
    this.current = addMilliseconds(this.current, ms);
  }

  set(now: Date): void {
    this.current = new Date(now);
  }
}
