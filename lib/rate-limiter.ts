/**
 * Per-action-kind daily caps and minimum spacing, backed by persisted
 * counters so that separate runs (and concurrent ones) share one budget.
 */

import { differenceInMilliseconds, subSeconds } from 'date-fns';
import { getDateKey } from './dates';
import { isDuplicateKeyError } from './errors';
import { logger } from './logger';
import RateCounter from './models/RateCounter';
import { randomInt } from './runtime';
import type { ActionKind } from './types';

const log = logger.child('rate-limiter');

export interface IncrementRequest {
  actionKind: ActionKind;
  day: Date;
  cap: number;
  at: Date;
  /** The previous admission must be at or before this instant. */
  spacingCutoff: Date;
}

export interface RateCounterStore {
  countFor(actionKind: ActionKind, day: Date): Promise<number>;
  lastAdmittedAt(actionKind: ActionKind): Promise<Date | undefined>;
  /**
   * Atomically bump today's count if under cap and spaced from the last
   * admission on any day; false otherwise.
   */
  tryIncrement(request: IncrementRequest): Promise<boolean>;
}

export type DenialReason = 'daily_cap' | 'spacing';

export type AdmitDecision =
  | { admitted: true; delayMs: number; count: number; cap: number }
  | { admitted: false; reason: DenialReason; retryAfterMs?: number; count: number; cap: number };

export interface RateLimiterOptions {
  dailyCaps: Readonly<Record<ActionKind, number>>;
  minDelaySeconds: number;
  maxDelaySeconds: number;
  random?: () => number;
}

export interface UsageSnapshot {
  count: number;
  cap: number;
  remaining: number;
}

export class RateLimiter {
  private readonly random: () => number;

  constructor(
    private readonly store: RateCounterStore,
    private readonly options: RateLimiterOptions
  ) {
    this.random = options.random ?? Math.random;
  }

  async usage(actionKind: ActionKind, now: Date): Promise<UsageSnapshot> {
    const cap = this.options.dailyCaps[actionKind];
    const count = await this.store.countFor(actionKind, getDateKey(now));
    return { count, cap, remaining: Math.max(0, cap - count) };
  }

  async admit(actionKind: ActionKind, now: Date): Promise<AdmitDecision> {
    const cap = this.options.dailyCaps[actionKind];
    const day = getDateKey(now);
    const minSpacingMs = this.options.minDelaySeconds * 1000;

    const count = await this.store.countFor(actionKind, day);
    if (count >= cap) {
      log.info('Denied: daily cap reached', { actionKind, count, cap });
      return { admitted: false, reason: 'daily_cap', count, cap };
    }

    const last = await this.store.lastAdmittedAt(actionKind);
    if (last) {
      const elapsedMs = differenceInMilliseconds(now, last);
      if (elapsedMs < minSpacingMs) {
        const retryAfterMs = minSpacingMs - elapsedMs;
        log.info('Denied: too soon after previous action', { actionKind, retryAfterMs });
        return { admitted: false, reason: 'spacing', retryAfterMs, count, cap };
      }
    }

    const admitted = await this.store.tryIncrement({
      actionKind,
      day,
      cap,
      at: now,
      spacingCutoff: subSeconds(now, this.options.minDelaySeconds),
    });

    if (!admitted) {
      // Lost a race with another run; re-read to report the right reason
      const current = await this.store.countFor(actionKind, day);
      if (current >= cap) {
        return { admitted: false, reason: 'daily_cap', count: current, cap };
      }
      return { admitted: false, reason: 'spacing', retryAfterMs: minSpacingMs, count: current, cap };
    }

    const delayMs = this.sampleDelayMs();
    log.debug('Admitted', { actionKind, count: count + 1, cap, delayMs });
    return { admitted: true, delayMs, count: count + 1, cap };
  }

  /** Uniform in [minDelaySeconds, maxDelaySeconds], whole milliseconds. */
  sampleDelayMs(): number {
    return randomInt(this.random, this.options.minDelaySeconds * 1000, this.options.maxDelaySeconds * 1000);
  }
}

/**
 * The spacing marker for each kind lives in its own document, keyed by this
 * day, so the spacing condition holds across UTC midnight.
 */
export const SPACING_MARKER_DAY = new Date(0);

export class MongoRateCounterStore implements RateCounterStore {
  async countFor(actionKind: ActionKind, day: Date): Promise<number> {
    const counter = await RateCounter.findOne({ actionKind, day }).lean();
    return counter?.count ?? 0;
  }

  async lastAdmittedAt(actionKind: ActionKind): Promise<Date | undefined> {
    const marker = await RateCounter.findOne({ actionKind, day: SPACING_MARKER_DAY }).lean();
    return marker?.lastAdmittedAt;
  }

  async tryIncrement({ actionKind, day, cap, at, spacingCutoff }: IncrementRequest): Promise<boolean> {
    // When the conditions fail on an existing document the upsert attempts
    // an insert and hits the unique (actionKind, day) index.
    let previous: Date | undefined;
    try {
      const marker = await RateCounter.findOneAndUpdate(
        {
          actionKind,
          day: SPACING_MARKER_DAY,
          $or: [{ lastAdmittedAt: { $exists: false } }, { lastAdmittedAt: { $lte: spacingCutoff } }],
        },
        { $set: { lastAdmittedAt: at } },
        { upsert: true, new: false }
      ).lean();
      previous = marker?.lastAdmittedAt;
    } catch (error) {
      if (isDuplicateKeyError(error)) return false;
      throw error;
    }

    try {
      const updated = await RateCounter.findOneAndUpdate(
        { actionKind, day, count: { $lt: cap } },
        { $inc: { count: 1 }, $set: { lastAdmittedAt: at } },
        { upsert: true, new: true }
      );
      return updated !== null;
    } catch (error) {
      if (!isDuplicateKeyError(error)) throw error;
      // Over the cap: hand the spacing marker back unless another run moved it
      await RateCounter.updateOne(
        { actionKind, day: SPACING_MARKER_DAY, lastAdmittedAt: at },
        previous ? { $set: { lastAdmittedAt: previous } } : { $unset: { lastAdmittedAt: 1 } }
      );
      return false;
    }
  }
}
