import type { AdmitDecision, RateLimiter } from '../rate-limiter';
import type { Runtime } from '../runtime';
import type { ActionKind } from '../types';

export type WorkerOutcomeStatus = 'succeeded' | 'failed' | 'skipped';

export type WorkerSkipReason = 'already_done' | 'daily_cap' | 'spacing' | 'claimed_elsewhere';

/**
 * Admit once; on a spacing denial wait the suggested time and ask again.
 * A second denial is returned as is.
 */
export async function admitWithSpacingRetry(
  limiter: RateLimiter,
  actionKind: ActionKind,
  runtime: Runtime
): Promise<AdmitDecision> {
  const first = await limiter.admit(actionKind, runtime.now());
  if (first.admitted || first.reason !== 'spacing' || first.retryAfterMs === undefined) {
    return first;
  }
  await runtime.sleep(first.retryAfterMs);
  return limiter.admit(actionKind, runtime.now());
}
