/**
 * EngagementWorker: likes (and optionally comments on) recent posts from the
 * configured authors, one post at a time, under the engagement rate limit.
 *
 * Each post is its own ledger target (the post URN), deduped over a 30-day
 * window. An AuthError ends the cycle; so does a run of transient failures,
 * through a circuit breaker scoped to the cycle.
 */

import { CircuitBreaker } from '../circuit-breaker';
import type { ContentGenerator } from '../content/content-generator';
import { daysBefore } from '../dates';
import type { LockManager } from '../distributed-lock';
import { errorData, errorKindOf, errorMessage, type ErrorKind } from '../errors';
import type { ActivityLedger } from '../ledger/activity-ledger';
import { logger } from '../logger';
import type { SocialPoster } from '../platforms/types';
import type { RateLimiter } from '../rate-limiter';
import type { Runtime } from '../runtime';
import type { NetworkPost, TimeWindow } from '../types';
import { admitWithSpacingRetry, type WorkerOutcomeStatus, type WorkerSkipReason } from './shared';

const log = logger.child('engagement');

export type EngagementAction = 'like' | 'comment';

export interface EngagementOutcome {
  postId: string;
  status: WorkerOutcomeStatus;
  actions: EngagementAction[];
  externalId?: string;
  errorKind?: ErrorKind;
  reason?: WorkerSkipReason;
  message?: string;
}

export interface EngagementWorkerConfig {
  postsPerCycle: number;
  cycleCap: number;
  commentsEnabled: boolean;
  dedupWindowDays: number;
  claimTtlSeconds: number;
  /** Consecutive transient failures before the cycle stops. */
  failureThreshold?: number;
}

export interface EngagementWorkerDeps {
  poster: SocialPoster;
  generator: ContentGenerator;
  limiter: RateLimiter;
  ledger: ActivityLedger;
  locks: LockManager;
  runtime: Runtime;
}

/** Target key used when the feed itself cannot be read. */
export const FEED_TARGET = 'feed';

export class EngagementWorker {
  constructor(
    private readonly deps: EngagementWorkerDeps,
    private readonly config: EngagementWorkerConfig
  ) {}

  async cycle(now: Date = this.deps.runtime.now()): Promise<EngagementOutcome[]> {
    const { poster, ledger } = this.deps;
    const outcomes: EngagementOutcome[] = [];

    let posts: NetworkPost[];
    try {
      posts = await poster.fetchRecentNetworkPosts(this.config.postsPerCycle);
    } catch (error) {
      log.error('Could not read recent posts', errorData(error));
      const attempt = await ledger.recordAttempt({ actionKind: 'engagement', targetKey: FEED_TARGET, at: now });
      await ledger.recordOutcome(attempt, {
        outcome: 'failed',
        errorKind: errorKindOf(error),
        message: errorMessage(error),
        at: this.deps.runtime.now(),
      });
      return [{ postId: FEED_TARGET, status: 'failed', actions: [], errorKind: errorKindOf(error), message: errorMessage(error) }];
    }

    log.info('Engagement cycle started', { candidates: posts.length, cap: this.config.cycleCap });

    const breaker = new CircuitBreaker('linkedin:engagement', {
      failureThreshold: this.config.failureThreshold ?? 3,
      now: () => this.deps.runtime.now().getTime(),
    });
    let engaged = 0;

    for (const post of posts) {
      if (engaged >= this.config.cycleCap) break;

      if (!breaker.allowRequest()) {
        log.warn('Stopping cycle', { reason: breaker.getRejectionReason() });
        break;
      }

      if (await ledger.hasSucceeded('engagement', post.id, this.dedupWindow(now))) {
        outcomes.push({ postId: post.id, status: 'skipped', actions: [], reason: 'already_done' });
        continue;
      }

      const outcome = await this.engage(post, now);
      outcomes.push(outcome);

      if (outcome.reason === 'daily_cap') {
        break;
      } else if (outcome.status === 'succeeded') {
        engaged++;
        breaker.recordSuccess();
      } else if (outcome.errorKind === 'TransientError') {
        breaker.recordFailure(outcome.message ?? 'transient failure');
      } else if (outcome.errorKind === 'AuthError') {
        log.error('Authentication failed, aborting cycle');
        break;
      }
    }

    log.info('Engagement cycle finished', {
      engaged,
      failed: outcomes.filter(o => o.status === 'failed').length,
      skipped: outcomes.filter(o => o.status === 'skipped').length,
    });
    return outcomes;
  }

  /** Ends at the current clock, so successes recorded during the cycle count. */
  private dedupWindow(cycleStart: Date): TimeWindow {
    return { since: daysBefore(cycleStart, this.config.dedupWindowDays), until: this.deps.runtime.now() };
  }

  /** Claim, re-check, admit, then like and comment. The claim is released in every case. */
  private async engage(post: NetworkPost, cycleStart: Date): Promise<EngagementOutcome> {
    const { ledger, locks, runtime } = this.deps;
    const lockName = `engagement:${post.id}`;

    const lock = await locks.acquire({ lockName, ttlSeconds: this.config.claimTtlSeconds, now: runtime.now() });
    if (!lock.acquired) {
      return { postId: post.id, status: 'skipped', actions: [], reason: 'claimed_elsewhere' };
    }

    try {
      // Another cycle may have finished this post while we were waiting for the claim
      if (await ledger.hasSucceeded('engagement', post.id, this.dedupWindow(cycleStart))) {
        return { postId: post.id, status: 'skipped', actions: [], reason: 'already_done' };
      }

      const decision = await admitWithSpacingRetry(this.deps.limiter, 'engagement', runtime);
      if (!decision.admitted) {
        return { postId: post.id, status: 'skipped', actions: [], errorKind: 'RateLimitExceeded', reason: decision.reason };
      }
      return await this.perform(post, decision.delayMs);
    } finally {
      await locks.release(lockName);
    }
  }

  private async perform(post: NetworkPost, delayMs: number): Promise<EngagementOutcome> {
    const { poster, generator, ledger, runtime } = this.deps;

    const attempt = await ledger.recordAttempt({
      actionKind: 'engagement',
      targetKey: post.id,
      at: runtime.now(),
      metadata: { author: post.authorUrn },
    });
    const actions: EngagementAction[] = [];

    try {
      await runtime.sleep(delayMs);

      await poster.likePost(post.id);
      actions.push('like');

      let commentId: string | undefined;
      if (this.config.commentsEnabled && post.text.trim()) {
        const text = await generator.comment(post);
        commentId = await poster.postComment(post.id, text);
        actions.push('comment');
      }

      const externalId = commentId ?? post.id;
      await ledger.recordOutcome(attempt, {
        outcome: 'succeeded',
        externalId,
        at: runtime.now(),
        metadata: { actions },
      });
      log.info('Engaged with post', { postId: post.id, actions });
      return { postId: post.id, status: 'succeeded', actions, externalId };
    } catch (error) {
      const errorKind = errorKindOf(error);
      log.warn('Engagement failed', { postId: post.id, actions, ...errorData(error) });
      await ledger.recordOutcome(attempt, {
        outcome: 'failed',
        errorKind,
        message: errorMessage(error),
        at: runtime.now(),
        metadata: { actions },
      });
      return { postId: post.id, status: 'failed', actions, errorKind, message: errorMessage(error) };
    }
  }
}
