/**
 * ActivityLedger: the persisted record of what was attempted and what
 * happened. It is the only dedup source: an action counts as done when an
 * outcome entry with outcome 'succeeded' exists for (kind, targetKey) inside
 * the window. An attempt with no outcome is indeterminate, never a success.
 */

import { v4 as uuidv4 } from 'uuid';
import ActivityEntry, { type IActivityEntry } from '../models/ActivityEntry';
import type {
  ActionKind,
  ActivityLedgerEntry,
  LedgerOutcome,
  LedgerPhase,
  TimeWindow,
} from '../types';

export interface AttemptInput {
  actionKind: ActionKind;
  targetKey: string;
  at: Date;
  metadata?: Record<string, unknown>;
}

export interface OutcomeInput {
  outcome: LedgerOutcome;
  at: Date;
  errorKind?: string;
  externalId?: string;
  message?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Metadata scope of the driver's own entries for an engagement or connection
 * slot. The worker records each target separately under the same kind.
 */
export const SLOT_SCOPE = 'slot';

export function isSlotEntry(entry: ActivityLedgerEntry): boolean {
  return entry.metadata?.scope === SLOT_SCOPE;
}

export interface LedgerQuery {
  actionKind?: ActionKind;
  phase?: LedgerPhase;
  since?: Date;
  until?: Date;
}

export interface ActivityLedger {
  recordAttempt(input: AttemptInput): Promise<ActivityLedgerEntry>;
  recordOutcome(attempt: ActivityLedgerEntry, input: OutcomeInput): Promise<ActivityLedgerEntry>;
  hasSucceeded(actionKind: ActionKind, targetKey: string, window: TimeWindow): Promise<boolean>;
  lastAttemptAt(actionKind: ActionKind): Promise<Date | undefined>;
  /** Entries in timestamp order. */
  list(query?: LedgerQuery): Promise<ActivityLedgerEntry[]>;
}

export class LedgerWriteError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LedgerWriteError';
  }
}

export function buildAttemptEntry(input: AttemptInput): ActivityLedgerEntry {
  const id = uuidv4();
  return {
    id,
    attemptId: id,
    actionKind: input.actionKind,
    targetKey: input.targetKey,
    phase: 'attempt',
    ...(input.metadata ? { metadata: input.metadata } : {}),
    timestamp: input.at,
  };
}

/**
 * Build the outcome entry closing `attempt`. A success without a confirmed
 * external identifier is refused.
 */
export function buildOutcomeEntry(attempt: ActivityLedgerEntry, input: OutcomeInput): ActivityLedgerEntry {
  if (attempt.phase !== 'attempt') {
    throw new LedgerWriteError(`Entry ${attempt.id} is not an attempt`);
  }
  if (input.outcome === 'succeeded' && !input.externalId) {
    throw new LedgerWriteError(
      `Refusing to record success for ${attempt.actionKind}:${attempt.targetKey} without an external id`
    );
  }

  return {
    id: uuidv4(),
    attemptId: attempt.attemptId,
    actionKind: attempt.actionKind,
    targetKey: attempt.targetKey,
    phase: 'outcome',
    outcome: input.outcome,
    ...(input.errorKind ? { errorKind: input.errorKind } : {}),
    ...(input.externalId ? { externalId: input.externalId } : {}),
    ...(input.message ? { message: input.message } : {}),
    ...(input.metadata ? { metadata: input.metadata } : {}),
    timestamp: input.at,
  };
}

function toEntry(doc: IActivityEntry): ActivityLedgerEntry {
  return {
    id: doc.entryId,
    attemptId: doc.attemptId,
    actionKind: doc.actionKind,
    targetKey: doc.targetKey,
    phase: doc.phase,
    ...(doc.outcome ? { outcome: doc.outcome } : {}),
    ...(doc.errorKind ? { errorKind: doc.errorKind } : {}),
    ...(doc.externalId ? { externalId: doc.externalId } : {}),
    ...(doc.message ? { message: doc.message } : {}),
    ...(doc.metadata ? { metadata: doc.metadata } : {}),
    timestamp: doc.timestamp,
  };
}

function toDocument(entry: ActivityLedgerEntry): IActivityEntry {
  const { id, ...rest } = entry;
  return { entryId: id, ...rest };
}

export class MongoActivityLedger implements ActivityLedger {
  async recordAttempt(input: AttemptInput): Promise<ActivityLedgerEntry> {
    const entry = buildAttemptEntry(input);
    await ActivityEntry.create(toDocument(entry));
    return entry;
  }

  async recordOutcome(attempt: ActivityLedgerEntry, input: OutcomeInput): Promise<ActivityLedgerEntry> {
    const entry = buildOutcomeEntry(attempt, input);
    await ActivityEntry.create(toDocument(entry));
    return entry;
  }

  async hasSucceeded(actionKind: ActionKind, targetKey: string, window: TimeWindow): Promise<boolean> {
    const found = await ActivityEntry.exists({
      actionKind,
      targetKey,
      phase: 'outcome',
      outcome: 'succeeded',
      timestamp: { $gte: window.since, $lte: window.until },
    });
    return found !== null;
  }

  async lastAttemptAt(actionKind: ActionKind): Promise<Date | undefined> {
    const latest = await ActivityEntry.findOne({ actionKind, phase: 'attempt' })
      .sort({ timestamp: -1 })
      .lean();
    return latest?.timestamp;
  }

  async list(query: LedgerQuery = {}): Promise<ActivityLedgerEntry[]> {
    const timestamp: { $gte?: Date; $lte?: Date } = {};
    if (query.since) timestamp.$gte = query.since;
    if (query.until) timestamp.$lte = query.until;

    const docs = await ActivityEntry.find({
      ...(query.actionKind ? { actionKind: query.actionKind } : {}),
      ...(query.phase ? { phase: query.phase } : {}),
      ...(query.since || query.until ? { timestamp } : {}),
    })
      .sort({ timestamp: 1 })
      .lean<IActivityEntry[]>();

    return docs.map(toEntry);
  }
}
