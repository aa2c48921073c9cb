import { describe, it, expect, vi } from 'vitest';
import { RateLimiter, type RateLimiterOptions } from './rate-limiter';
import { MemoryRateCounterStore } from './testing/memory-stores';

const at = (iso: string) => new Date(iso);

function limiter(overrides: Partial<RateLimiterOptions> = {}, store = new MemoryRateCounterStore()) {
  const options: RateLimiterOptions = {
    dailyCaps: { post: 1, engagement: 5, connection: 0 },
    minDelaySeconds: 60,
    maxDelaySeconds: 180,
    random: () => 0,
    ...overrides,
  };
  return { limiter: new RateLimiter(store, options), store };
}

describe('RateLimiter.admit', () => {
  it('admits up to the daily cap and then denies', async () => {
    const { limiter: rl } = limiter();

    const first = await rl.admit('post', at('2024-01-01T09:00:00Z'));
    const second = await rl.admit('post', at('2024-01-01T11:00:00Z'));

    expect(first).toEqual({ admitted: true, delayMs: 60_000, count: 1, cap: 1 });
    expect(second).toEqual({ admitted: false, reason: 'daily_cap', count: 1, cap: 1 });
  });

  it('denies immediately when the cap is zero', async () => {
    const { limiter: rl } = limiter();

    await expect(rl.admit('connection', at('2024-01-01T09:00:00Z'))).resolves.toMatchObject({
      admitted: false,
      reason: 'daily_cap',
    });
  });

  it('enforces the minimum spacing and reports when to retry', async () => {
    const { limiter: rl } = limiter();

    await rl.admit('engagement', at('2024-01-01T09:00:00Z'));
    const early = await rl.admit('engagement', at('2024-01-01T09:00:30Z'));
    const onTime = await rl.admit('engagement', at('2024-01-01T09:01:00Z'));

    expect(early).toEqual({ admitted: false, reason: 'spacing', retryAfterMs: 30_000, count: 1, cap: 5 });
    expect(onTime).toMatchObject({ admitted: true, count: 2 });
  });

  it('keeps kinds independent', async () => {
    const { limiter: rl } = limiter();

    await rl.admit('post', at('2024-01-01T09:00:00Z'));
    await expect(rl.admit('engagement', at('2024-01-01T09:00:10Z'))).resolves.toMatchObject({ admitted: true });
  });

  it('starts a fresh count on the next UTC day', async () => {
    const store = new MemoryRateCounterStore();
    store.set('post', at('2024-01-01T00:00:00Z'), 1, at('2024-01-01T23:00:00Z'));
    const { limiter: rl } = limiter({}, store);

    await expect(rl.admit('post', at('2024-01-01T23:30:00Z'))).resolves.toMatchObject({ reason: 'daily_cap' });
    await expect(rl.admit('post', at('2024-01-02T00:05:00Z'))).resolves.toMatchObject({ admitted: true, count: 1 });
  });

  it('holds the spacing across midnight when the earlier read missed the last admission', async () => {
    class StaleReadStore extends MemoryRateCounterStore {
      async lastAdmittedAt(): Promise<Date | undefined> {
        return undefined;
      }
    }
    const store = new StaleReadStore();
    store.set('engagement', at('2024-01-01T00:00:00Z'), 3, at('2024-01-01T23:59:40Z'));
    const { limiter: rl } = limiter({}, store);

    const decision = await rl.admit('engagement', at('2024-01-02T00:00:10Z'));

    expect(decision).toEqual({ admitted: false, reason: 'spacing', retryAfterMs: 60_000, count: 0, cap: 5 });
    await expect(store.countFor('engagement', at('2024-01-02T00:00:10Z'))).resolves.toBe(0);
  });

  it('reports spacing when a concurrent run wins the increment', async () => {
    const { limiter: rl, store } = limiter();
    vi.spyOn(store, 'tryIncrement').mockResolvedValue(false);

    const decision = await rl.admit('engagement', at('2024-01-01T09:00:00Z'));

    expect(decision).toEqual({ admitted: false, reason: 'spacing', retryAfterMs: 60_000, count: 0, cap: 5 });
  });

  it('reports the cap when a concurrent run took the last unit', async () => {
    const { limiter: rl, store } = limiter();
    vi.spyOn(store, 'tryIncrement').mockImplementation(async request => {
      store.set(request.actionKind, request.day, request.cap);
      return false;
    });

    await expect(rl.admit('post', at('2024-01-01T09:00:00Z'))).resolves.toEqual({
      admitted: false,
      reason: 'daily_cap',
      count: 1,
      cap: 1,
    });
  });
});

describe('RateLimiter.sampleDelayMs', () => {
  it('spans the configured range', () => {
    expect(limiter({ random: () => 0 }).limiter.sampleDelayMs()).toBe(60_000);
    expect(limiter({ random: () => 0.5 }).limiter.sampleDelayMs()).toBe(120_000);
    expect(limiter({ random: () => 0.999999 }).limiter.sampleDelayMs()).toBe(180_000);
  });
});

describe('RateLimiter.usage', () => {
  it('reports count and remaining for the day', async () => {
    const { limiter: rl } = limiter({ dailyCaps: { post: 3, engagement: 5, connection: 0 } });

    await rl.admit('post', at('2024-01-01T09:00:00Z'));

    await expect(rl.usage('post', at('2024-01-01T18:00:00Z'))).resolves.toEqual({ count: 1, cap: 3, remaining: 2 });
    await expect(rl.usage('post', at('2024-01-02T08:00:00Z'))).resolves.toEqual({ count: 0, cap: 3, remaining: 3 });
  });
});
