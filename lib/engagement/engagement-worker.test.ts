import { describe, it, expect } from 'vitest';
import { ContentGenerator } from '../content/content-generator';
import { AuthError, PlatformError, TransientError } from '../errors';
import { RateLimiter } from '../rate-limiter';
import { FakeAI, FakePoster, networkPost } from '../testing/fakes';
import {
  interleavedLedger,
  ManualRuntime,
  MemoryActivityLedger,
  MemoryLockManager,
  MemoryRateCounterStore,
} from '../testing/memory-stores';
import { EngagementWorker, type EngagementWorkerConfig } from './engagement-worker';

const START = new Date('2024-01-01T12:50:00Z');
const COMMENT = 'Nice point about delivery. What made you choose this approach?';

function setup(overrides: Partial<EngagementWorkerConfig> = {}) {
  const runtime = new ManualRuntime(START);
  const ai = new FakeAI();
  const poster = new FakePoster();
  poster.networkPosts = ['urn:li:share:1', 'urn:li:share:2', 'urn:li:share:3'].map(id => networkPost(id));
  const ledger = new MemoryActivityLedger();
  const rateCounters = new MemoryRateCounterStore();
  const locks = new MemoryLockManager();
  const limiter = new RateLimiter(rateCounters, {
    dailyCaps: { post: 10, engagement: 30, connection: 20 },
    minDelaySeconds: 60,
    maxDelaySeconds: 180,
    random: () => runtime.random(),
  });
  const generator = new ContentGenerator(ai, { tone: 'professional', length: 'medium', now: () => runtime.now() });
  const deps = { poster, generator, limiter, ledger, locks, runtime };
  const config = { postsPerCycle: 10, cycleCap: 2, commentsEnabled: true, dedupWindowDays: 30, claimTtlSeconds: 900, ...overrides };
  const worker = new EngagementWorker(deps, config);
  return { worker, deps, config, runtime, ai, poster, ledger, rateCounters, locks };
}

async function seedSuccess(ledger: MemoryActivityLedger, postId: string, iso: string) {
  const at = new Date(iso);
  const attempt = await ledger.recordAttempt({ actionKind: 'engagement', targetKey: postId, at });
  await ledger.recordOutcome(attempt, { outcome: 'succeeded', externalId: 'urn:li:comment:0', at });
}

describe('EngagementWorker.cycle', () => {
  it('likes and comments up to the cycle cap', async () => {
    const { worker, poster, ledger, runtime, locks } = setup();

    const outcomes = await worker.cycle();

    expect(outcomes).toEqual([
      { postId: 'urn:li:share:1', status: 'succeeded', actions: ['like', 'comment'], externalId: 'urn:li:comment:1' },
      { postId: 'urn:li:share:2', status: 'succeeded', actions: ['like', 'comment'], externalId: 'urn:li:comment:2' },
    ]);
    expect(poster.likes).toEqual(['urn:li:share:1', 'urn:li:share:2']);
    expect(poster.comments).toEqual([
      { postId: 'urn:li:share:1', text: COMMENT },
      { postId: 'urn:li:share:2', text: COMMENT },
    ]);
    expect(runtime.sleeps).toEqual([60_000, 60_000]);
    expect(ledger.outcomes('engagement').map(e => [e.targetKey, e.outcome])).toEqual([
      ['urn:li:share:1', 'succeeded'],
      ['urn:li:share:2', 'succeeded'],
    ]);
    expect(locks.isHeld('engagement:urn:li:share:1')).toBe(false);
  });

  it('skips posts engaged with inside the dedup window', async () => {
    const { worker, poster, ledger } = setup();
    await seedSuccess(ledger, 'urn:li:share:1', '2023-12-20T10:00:00Z');

    const outcomes = await worker.cycle();

    expect(outcomes[0]).toEqual({ postId: 'urn:li:share:1', status: 'skipped', actions: [], reason: 'already_done' });
    expect(poster.likes).toEqual(['urn:li:share:2', 'urn:li:share:3']);
  });

  it('engages again once the window has passed', async () => {
    const { worker, poster, ledger } = setup({ cycleCap: 1 });
    await seedSuccess(ledger, 'urn:li:share:1', '2023-11-01T10:00:00Z');

    await worker.cycle();

    expect(poster.likes).toEqual(['urn:li:share:1']);
  });

  it('stops at the daily cap without recording an attempt', async () => {
    const { worker, poster, ledger, rateCounters } = setup();
    rateCounters.set('engagement', START, 30);

    const outcomes = await worker.cycle();

    expect(outcomes).toEqual([
      { postId: 'urn:li:share:1', status: 'skipped', actions: [], errorKind: 'RateLimitExceeded', reason: 'daily_cap' },
    ]);
    expect(poster.calls.like).toBe(0);
    expect(ledger.entries).toEqual([]);
  });

  it('waits out the spacing before the first action', async () => {
    const { worker, runtime, rateCounters } = setup({ cycleCap: 1 });
    rateCounters.set('engagement', START, 1, new Date('2024-01-01T12:49:30Z'));

    const outcomes = await worker.cycle();

    expect(outcomes.map(o => o.status)).toEqual(['succeeded']);
    expect(runtime.sleeps).toEqual([30_000, 60_000]);
  });

  it('aborts the cycle on an AuthError', async () => {
    const { worker, poster, ledger } = setup();
    poster.failNext('like', new AuthError('token revoked'));

    const outcomes = await worker.cycle();

    expect(outcomes).toEqual([
      { postId: 'urn:li:share:1', status: 'failed', actions: [], errorKind: 'AuthError', message: 'token revoked' },
    ]);
    expect(ledger.outcomes('engagement')).toMatchObject([{ outcome: 'failed', errorKind: 'AuthError' }]);
  });

  it('stops after repeated transient failures', async () => {
    const { worker, poster } = setup({ cycleCap: 5 });
    poster.networkPosts.push(networkPost('urn:li:share:4'));
    poster.failNext('like', new TransientError('503'), new TransientError('503'), new TransientError('503'));

    const outcomes = await worker.cycle();

    expect(outcomes.map(o => [o.postId, o.errorKind])).toEqual([
      ['urn:li:share:1', 'TransientError'],
      ['urn:li:share:2', 'TransientError'],
      ['urn:li:share:3', 'TransientError'],
    ]);
    expect(poster.calls.like).toBe(3);
  });

  it('records the actions taken before a failed comment and moves on', async () => {
    const { worker, poster, ledger } = setup();
    poster.failNext('comment', new PlatformError('comments disabled'));

    const outcomes = await worker.cycle();

    expect(outcomes[0]).toEqual({
      postId: 'urn:li:share:1',
      status: 'failed',
      actions: ['like'],
      errorKind: 'PlatformError',
      message: 'comments disabled',
    });
    expect(ledger.outcomes('engagement')[0].metadata).toEqual({ actions: ['like'] });
    expect(outcomes.slice(1).map(o => o.status)).toEqual(['succeeded', 'succeeded']);
  });

  it('only likes when comments are disabled', async () => {
    const { worker, ai } = setup({ commentsEnabled: false, cycleCap: 1 });

    const outcomes = await worker.cycle();

    expect(outcomes).toEqual([{ postId: 'urn:li:share:1', status: 'succeeded', actions: ['like'], externalId: 'urn:li:share:1' }]);
    expect(ai.calls).toHaveLength(0);
  });

  it('does not comment on a post without text', async () => {
    const { worker, poster } = setup({ cycleCap: 1 });
    poster.networkPosts = [networkPost('urn:li:share:9', '   ')];

    const outcomes = await worker.cycle();

    expect(outcomes[0]).toMatchObject({ status: 'succeeded', actions: ['like'], externalId: 'urn:li:share:9' });
    expect(poster.calls.comment).toBe(0);
  });

  it('skips a post claimed by another run', async () => {
    const { worker, locks } = setup();
    locks.hold('engagement:urn:li:share:1', 'other-host', new Date('2024-01-01T13:30:00Z'));

    const outcomes = await worker.cycle();

    expect(outcomes.map(o => [o.postId, o.status, o.reason])).toEqual([
      ['urn:li:share:1', 'skipped', 'claimed_elsewhere'],
      ['urn:li:share:2', 'succeeded', undefined],
      ['urn:li:share:3', 'succeeded', undefined],
    ]);
  });

  it('records a failed feed read', async () => {
    const { worker, poster, ledger } = setup();
    poster.failNext('feed', new TransientError('feed down'));

    const outcomes = await worker.cycle();

    expect(outcomes).toEqual([{ postId: 'feed', status: 'failed', actions: [], errorKind: 'TransientError', message: 'feed down' }]);
    expect(ledger.outcomes('engagement')).toMatchObject([{ targetKey: 'feed', outcome: 'failed', errorKind: 'TransientError' }]);
  });

  it('does not engage twice when another cycle finishes the post first', async () => {
    const { worker, deps, config, poster, ledger } = setup({ cycleCap: 1 });
    poster.networkPosts = [networkPost('urn:li:share:1')];
    const overlapping = new EngagementWorker(
      { ...deps, ledger: interleavedLedger(ledger, () => worker.cycle()) },
      config
    );

    const outcomes = await overlapping.cycle();

    expect(outcomes).toEqual([{ postId: 'urn:li:share:1', status: 'skipped', actions: [], reason: 'already_done' }]);
    expect(poster.likes).toEqual(['urn:li:share:1']);
    expect(poster.comments).toHaveLength(1);
    expect(ledger.outcomes('engagement').filter(e => e.outcome === 'succeeded')).toHaveLength(1);
  });
});
