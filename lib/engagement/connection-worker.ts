/**
 * ConnectionWorker: sends personalised connection requests to prospects
 * from the prospects file, skipping anyone invited in the last 90 days.
 */

import type { ContentGenerator } from '../content/content-generator';
import { daysBefore } from '../dates';
import { withLock, type LockManager } from '../distributed-lock';
import { errorData, errorKindOf, errorMessage, type ErrorKind } from '../errors';
import type { ActivityLedger } from '../ledger/activity-ledger';
import { logger } from '../logger';
import type { SocialPoster } from '../platforms/types';
import type { RateLimiter } from '../rate-limiter';
import type { Runtime } from '../runtime';
import type { Prospect, TimeWindow } from '../types';
import { admitWithSpacingRetry, type WorkerOutcomeStatus, type WorkerSkipReason } from './shared';

const log = logger.child('connections');

export interface ConnectionOutcome {
  prospectId: string;
  status: WorkerOutcomeStatus;
  externalId?: string;
  errorKind?: ErrorKind;
  reason?: WorkerSkipReason;
  message?: string;
}

export interface ConnectionWorkerConfig {
  prospects: readonly Prospect[];
  cycleCap: number;
  dedupWindowDays: number;
  claimTtlSeconds: number;
}

export interface ConnectionWorkerDeps {
  poster: SocialPoster;
  generator: ContentGenerator;
  limiter: RateLimiter;
  ledger: ActivityLedger;
  locks: LockManager;
  runtime: Runtime;
}

export class ConnectionWorker {
  constructor(
    private readonly deps: ConnectionWorkerDeps,
    private readonly config: ConnectionWorkerConfig
  ) {}

  async cycle(now: Date = this.deps.runtime.now()): Promise<ConnectionOutcome[]> {
    const { ledger, locks, runtime } = this.deps;
    const outcomes: ConnectionOutcome[] = [];
    let sent = 0;

    for (const prospect of this.config.prospects) {
      if (sent >= this.config.cycleCap) break;

      if (await ledger.hasSucceeded('connection', prospect.id, this.dedupWindow(now))) {
        continue;
      }

      const claimed = await withLock(
        locks,
        { lockName: `connection:${prospect.id}`, ttlSeconds: this.config.claimTtlSeconds, now: runtime.now() },
        () => this.invite(prospect, now)
      );
      const outcome: ConnectionOutcome = claimed.skipped
        ? { prospectId: prospect.id, status: 'skipped', reason: 'claimed_elsewhere' }
        : claimed.result;
      outcomes.push(outcome);

      if (outcome.status === 'succeeded') sent++;
      if (outcome.reason === 'daily_cap' || outcome.errorKind === 'AuthError') break;
    }

    log.info('Connection cycle finished', { sent, considered: outcomes.length });
    return outcomes;
  }

  /** Ends at the current clock, so invitations sent during the cycle count. */
  private dedupWindow(cycleStart: Date): TimeWindow {
    return { since: daysBefore(cycleStart, this.config.dedupWindowDays), until: this.deps.runtime.now() };
  }

  private async invite(prospect: Prospect, cycleStart: Date): Promise<ConnectionOutcome> {
    const { poster, generator, ledger, limiter, runtime } = this.deps;

    // Another cycle may have invited them while we were waiting for the claim
    if (await ledger.hasSucceeded('connection', prospect.id, this.dedupWindow(cycleStart))) {
      return { prospectId: prospect.id, status: 'skipped', reason: 'already_done' };
    }

    const decision = await admitWithSpacingRetry(limiter, 'connection', runtime);
    if (!decision.admitted) {
      return { prospectId: prospect.id, status: 'skipped', errorKind: 'RateLimitExceeded', reason: decision.reason };
    }

    const attempt = await ledger.recordAttempt({
      actionKind: 'connection',
      targetKey: prospect.id,
      at: runtime.now(),
      metadata: { name: prospect.name, company: prospect.company },
    });

    try {
      const message = await generator.connectionMessage(prospect);
      await runtime.sleep(decision.delayMs);
      const externalId = await poster.sendConnectionRequest(prospect.id, message);

      await ledger.recordOutcome(attempt, { outcome: 'succeeded', externalId, at: runtime.now() });
      log.info('Connection request sent', { prospectId: prospect.id });
      return { prospectId: prospect.id, status: 'succeeded', externalId };
    } catch (error) {
      const errorKind = errorKindOf(error);
      log.warn('Connection request failed', { prospectId: prospect.id, ...errorData(error) });
      await ledger.recordOutcome(attempt, {
        outcome: 'failed',
        errorKind,
        message: errorMessage(error),
        at: runtime.now(),
      });
      return { prospectId: prospect.id, status: 'failed', errorKind, message: errorMessage(error) };
    }
  }
}
