/**
 * ScheduleDriver: one invocation per external trigger.
 *
 * For each slot due at `now` (oldest first) it checks the ledger, claims the
 * occurrence, runs the action and records the result. It stops after the
 * first success, and on an AuthError. All failures below this point end up
 * in the ledger with an errorKind; nothing is retried within a run.
 */

import { differenceInMilliseconds } from 'date-fns';
import type { ContentGenerator } from '../content/content-generator';
import { selectTopic } from '../content/topics';
import { daysBefore } from '../dates';
import type { LockManager } from '../distributed-lock';
import type { ConnectionWorker } from '../engagement/connection-worker';
import type { EngagementWorker } from '../engagement/engagement-worker';
import {
  errorData,
  errorKindOf,
  errorMessage,
  isFatal,
  type ErrorKind,
} from '../errors';
import { SLOT_SCOPE, type ActivityLedger } from '../ledger/activity-ledger';
import type { PostRecordStore } from '../ledger/post-records';
import { logger, type Logger } from '../logger';
import type { SocialPoster } from '../platforms/types';
import type { RateLimiter } from '../rate-limiter';
import { pickRandom, type Runtime } from '../runtime';
import type { ActionKind, ActivityLedgerEntry, PostRecord, ScheduleEntry } from '../types';
import { describeEntry, dueSlots, eligibilityWindow, type DueSlot } from './schedule';

const log = logger.child('schedule-driver');

/** How far back topic rotation looks for earlier choices. */
const TOPIC_HISTORY_DAYS = 30;

export type SlotStatus = 'succeeded' | 'failed' | 'skipped' | 'already_done' | 'claimed_elsewhere';

export interface SlotOutcome {
  occurrenceKey: string;
  actionKind: ActionKind;
  status: SlotStatus;
  externalId?: string;
  postRecordId?: string;
  errorKind?: ErrorKind;
  message?: string;
}

export type RunStatus = 'idle' | 'noop' | 'succeeded' | 'skipped' | 'failed';

export interface ActionOutcome {
  now: Date;
  status: RunStatus;
  slots: SlotOutcome[];
  /** Set when a fatal error stopped the run. */
  fatal?: ErrorKind;
}

export interface ScheduleDriverConfig {
  entries: readonly ScheduleEntry[];
  toleranceMinutes: number;
  topics: readonly string[];
  expandTopics: boolean;
  claimTtlSeconds: number;
  minDelaySeconds: number;
}

export interface ScheduleDriverDeps {
  generator: ContentGenerator;
  poster: SocialPoster;
  limiter: RateLimiter;
  ledger: ActivityLedger;
  postRecords: PostRecordStore;
  locks: LockManager;
  runtime: Runtime;
  engagement?: EngagementWorker;
  connections?: ConnectionWorker;
}

export function summarizeRun(now: Date, slots: SlotOutcome[]): ActionOutcome {
  const fatal = slots.map(slot => slot.errorKind).find(isFatal);
  const has = (status: SlotStatus) => slots.some(slot => slot.status === status);

  let status: RunStatus;
  if (slots.length === 0) status = 'idle';
  else if (fatal) status = 'failed';
  else if (has('succeeded')) status = 'succeeded';
  else if (has('failed')) status = 'failed';
  else if (has('skipped')) status = 'skipped';
  else status = 'noop';

  return { now, status, slots, ...(fatal ? { fatal } : {}) };
}

export class ScheduleDriver {
  constructor(
    private readonly deps: ScheduleDriverDeps,
    private readonly config: ScheduleDriverConfig
  ) {}

  async run(now: Date = this.deps.runtime.now()): Promise<ActionOutcome> {
    const due = dueSlots(this.config.entries, now, this.config.toleranceMinutes);
    if (due.length === 0) {
      log.debug('Nothing due', { now: now.toISOString() });
      return summarizeRun(now, []);
    }

    log.info('Slots due', { now: now.toISOString(), slots: due.map(slot => slot.occurrenceKey) });

    const slots: SlotOutcome[] = [];
    for (const slot of due) {
      const outcome = await this.processSlot(slot, now);
      slots.push(outcome);

      if (outcome.status === 'succeeded') break;
      if (isFatal(outcome.errorKind)) {
        log.error('Fatal error, stopping run', { occurrenceKey: slot.occurrenceKey, errorKind: outcome.errorKind });
        break;
      }
    }

    const result = summarizeRun(now, slots);
    log.info('Run finished', { status: result.status, fatal: result.fatal });
    return result;
  }

  private async processSlot(slot: DueSlot, now: Date): Promise<SlotOutcome> {
    const { ledger, locks, runtime } = this.deps;
    const { occurrenceKey } = slot;
    const actionKind = slot.entry.actionKind;
    const slotLog = log.child(actionKind, { occurrenceKey });
    const window = eligibilityWindow(slot, this.config.toleranceMinutes);

    if (await ledger.hasSucceeded(actionKind, occurrenceKey, window)) {
      slotLog.info('Already done');
      return { occurrenceKey, actionKind, status: 'already_done' };
    }

    const lockName = `slot:${occurrenceKey}`;
    const lock = await locks.acquire({ lockName, ttlSeconds: this.config.claimTtlSeconds, now: runtime.now() });
    let held = lock.acquired;

    if (!lock.acquired) {
      if (!lock.unavailable) {
        slotLog.info('Claimed by another run', { holder: lock.holder });
        return { occurrenceKey, actionKind, status: 'claimed_elsewhere', message: lock.error };
      }

      // Claim store down: fall back to the spacing guard
      const last = await ledger.lastAttemptAt(actionKind);
      if (last && differenceInMilliseconds(now, last) < this.config.minDelaySeconds * 1000) {
        slotLog.warn('Claim store unavailable and a recent attempt exists, skipping', { lastAttemptAt: last.toISOString() });
        return { occurrenceKey, actionKind, status: 'claimed_elsewhere', message: lock.error };
      }
      slotLog.warn('Claim store unavailable, continuing without a claim', { error: lock.error });
      held = false;
    }

    try {
      // A run that held the claim before us may have finished in between
      if (await ledger.hasSucceeded(actionKind, occurrenceKey, window)) {
        slotLog.info('Already done');
        return { occurrenceKey, actionKind, status: 'already_done' };
      }

      switch (actionKind) {
        case 'post':
          return await this.runPost(slot, now, slotLog);
        case 'engagement':
          return await this.runWorker(slot, slotLog, this.deps.engagement, async worker =>
            (await worker.cycle(runtime.now())).map(o => ({ ...o, targetKey: o.postId }))
          );
        case 'connection':
          return await this.runWorker(slot, slotLog, this.deps.connections, async worker =>
            (await worker.cycle(runtime.now())).map(o => ({ ...o, targetKey: o.prospectId }))
          );
      }
    } catch (error) {
      // Ledger or store failures outside the action itself
      slotLog.error('Slot processing failed', errorData(error));
      return { occurrenceKey, actionKind, status: 'failed', errorKind: errorKindOf(error), message: errorMessage(error) };
    } finally {
      if (held) await locks.release(lockName);
    }
  }

  private async runPost(slot: DueSlot, now: Date, slotLog: Logger): Promise<SlotOutcome> {
    const { generator, poster, limiter, ledger, postRecords, runtime } = this.deps;
    const { occurrenceKey } = slot;
    const base = { occurrenceKey, actionKind: 'post' as const };

    const history = await ledger.list({ actionKind: 'post', phase: 'attempt', since: daysBefore(now, TOPIC_HISTORY_DAYS) });
    const topic = selectTopic(this.config.topics, history, () => runtime.random());

    const attempt = await ledger.recordAttempt({
      actionKind: 'post',
      targetKey: occurrenceKey,
      at: runtime.now(),
      metadata: { topic, slot: describeEntry(slot.entry) },
    });

    const usage = await limiter.usage('post', runtime.now());
    if (usage.remaining === 0) {
      slotLog.info('Daily post cap already reached', { ...usage });
      await ledger.recordOutcome(attempt, {
        outcome: 'skipped',
        errorKind: 'RateLimitExceeded',
        message: 'daily_cap',
        at: runtime.now(),
      });
      return { ...base, status: 'skipped', errorKind: 'RateLimitExceeded', message: 'daily_cap' };
    }

    let record: PostRecord | undefined;
    let externalPostId: string | undefined;

    try {
      let chosenTopic = topic;
      if (this.config.expandTopics) {
        const candidates = await generator.expand(topic);
        chosenTopic = pickRandom(() => runtime.random(), candidates) ?? topic;
      }

      const item = await generator.generate(chosenTopic);
      record = await postRecords.createPending({ occurrenceKey, contentItem: item, at: runtime.now() });

      const decision = await limiter.admit('post', runtime.now());
      if (!decision.admitted) {
        slotLog.info('Rate limiter denied post', { reason: decision.reason });
        await postRecords.resolve(record.id, {
          status: 'failed',
          errorKind: 'RateLimitExceeded',
          error: decision.reason,
          at: runtime.now(),
        });
        await ledger.recordOutcome(attempt, {
          outcome: 'skipped',
          errorKind: 'RateLimitExceeded',
          message: decision.reason,
          at: runtime.now(),
          metadata: { postRecordId: record.id },
        });
        return { ...base, status: 'skipped', postRecordId: record.id, errorKind: 'RateLimitExceeded', message: decision.reason };
      }

      slotLog.info('Waiting before publishing', { delayMs: decision.delayMs, topic: chosenTopic });
      await runtime.sleep(decision.delayMs);

      externalPostId = await poster.publish(item);

      await postRecords.resolve(record.id, { status: 'succeeded', externalPostId, at: runtime.now() });
      await ledger.recordOutcome(attempt, {
        outcome: 'succeeded',
        externalId: externalPostId,
        at: runtime.now(),
        metadata: { postRecordId: record.id, topic: chosenTopic, title: item.title },
      });

      slotLog.info('Post published', { externalPostId, postRecordId: record.id });
      return { ...base, status: 'succeeded', externalId: externalPostId, postRecordId: record.id };
    } catch (error) {
      return this.failPost(error, { attempt, record, externalPostId, slotLog, base });
    }
  }

  private async failPost(
    error: unknown,
    context: {
      attempt: ActivityLedgerEntry;
      record?: PostRecord;
      externalPostId?: string;
      slotLog: Logger;
      base: { occurrenceKey: string; actionKind: 'post' };
    }
  ): Promise<SlotOutcome> {
    const { attempt, record, externalPostId, slotLog, base } = context;
    const { ledger, postRecords, runtime } = this.deps;
    const errorKind = errorKindOf(error);

    if (externalPostId) {
      // Published, but recording it failed. Leave the attempt open rather
      // than mark a live post as failed.
      slotLog.error('Post published but its outcome could not be recorded', { externalPostId, ...errorData(error) });
      return { ...base, status: 'failed', errorKind, externalId: externalPostId, postRecordId: record?.id, message: errorMessage(error) };
    }

    slotLog.warn('Post failed', errorData(error));

    if (record) {
      try {
        await postRecords.resolve(record.id, { status: 'failed', errorKind, error: errorMessage(error), at: runtime.now() });
      } catch (resolveError) {
        slotLog.error('Could not mark post record failed', { postRecordId: record.id, ...errorData(resolveError) });
      }
    }

    await ledger.recordOutcome(attempt, {
      outcome: 'failed',
      errorKind,
      message: errorMessage(error),
      at: runtime.now(),
      ...(record ? { metadata: { postRecordId: record.id } } : {}),
    });
    return { ...base, status: 'failed', errorKind, postRecordId: record?.id, message: errorMessage(error) };
  }

  /**
   * Run one worker cycle for an engagement or connection slot and record the
   * slot's own outcome: succeeded if any target succeeded, failed if any
   * failed and none succeeded, skipped otherwise.
   */
  private async runWorker<W>(
    slot: DueSlot,
    slotLog: Logger,
    worker: W | undefined,
    cycle: (worker: W) => Promise<Array<{ targetKey: string; status: string; externalId?: string; errorKind?: ErrorKind; message?: string }>>
  ): Promise<SlotOutcome> {
    const { ledger, runtime } = this.deps;
    const { occurrenceKey } = slot;
    const actionKind = slot.entry.actionKind;

    if (!worker) {
      slotLog.warn('No worker configured for this action kind');
      return { occurrenceKey, actionKind, status: 'skipped', message: 'not_configured' };
    }

    const attempt = await ledger.recordAttempt({
      actionKind,
      targetKey: occurrenceKey,
      at: runtime.now(),
      metadata: { scope: SLOT_SCOPE },
    });
    const results = await cycle(worker);

    const succeeded = results.filter(r => r.status === 'succeeded' && r.externalId);
    const failures = results.filter(r => r.status === 'failed');
    const fatal = failures.find(r => isFatal(r.errorKind));
    const counts = { scope: SLOT_SCOPE, succeeded: succeeded.length, failed: failures.length, considered: results.length };

    if (succeeded.length > 0 && !fatal) {
      const externalId = succeeded.map(r => r.externalId).join(',');
      await ledger.recordOutcome(attempt, { outcome: 'succeeded', externalId, at: runtime.now(), metadata: counts });
      return { occurrenceKey, actionKind, status: 'succeeded', externalId };
    }

    const failure = fatal ?? failures[0];
    if (failure) {
      await ledger.recordOutcome(attempt, {
        outcome: 'failed',
        errorKind: failure.errorKind,
        message: failure.message,
        at: runtime.now(),
        metadata: counts,
      });
      return { occurrenceKey, actionKind, status: 'failed', errorKind: failure.errorKind, message: failure.message };
    }

    await ledger.recordOutcome(attempt, { outcome: 'skipped', message: 'nothing to do', at: runtime.now(), metadata: counts });
    return { occurrenceKey, actionKind, status: 'skipped', message: 'nothing to do' };
  }
}
