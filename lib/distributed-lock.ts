/**
 * Distributed claims for schedule slots and worker targets.
 *
 * A claim is a document whose _id is the claim name; the unique _id makes
 * creation atomic across concurrent runs, and the TTL index on expiresAt
 * clears claims left behind by a crashed run.
 */

import mongoose, { Model } from 'mongoose';
import { errorMessage, isDuplicateKeyError } from './errors';
import { logger } from './logger';

const log = logger.child('distributed-lock');

interface IClaimLock {
  _id: string;           // Claim name (e.g. 'claim:post:1-09:15@2024-01-01')
  holder: string;        // Instance identifier
  acquiredAt: Date;
  expiresAt: Date;
}

const ClaimLockSchema = new mongoose.Schema<IClaimLock>(
  {
    _id: { type: String, required: true },
    holder: { type: String, required: true },
    acquiredAt: { type: Date, default: Date.now },
    expiresAt: { type: Date, required: true, index: { expireAfterSeconds: 0 } },
  },
  { collection: 'cron_locks' }
);

const ClaimLock: Model<IClaimLock> =
  mongoose.models.ClaimLock || mongoose.model<IClaimLock>('ClaimLock', ClaimLockSchema);

// Stable per process
export const INSTANCE_ID = `${process.env.HOSTNAME || 'local'}-${process.pid}`;

export interface LockOptions {
  lockName: string;
  ttlSeconds: number;
  now?: Date;
}

export interface LockResult {
  acquired: boolean;
  lockId?: string;
  holder?: string;
  error?: string;
  /** The lock store itself failed; callers fall back to another guard. */
  unavailable?: boolean;
}

export interface LockManager {
  acquire(options: LockOptions): Promise<LockResult>;
  release(lockName: string): Promise<boolean>;
}

export function claimId(lockName: string): string {
  return lockName.startsWith('claim:') ? lockName : `claim:${lockName}`;
}

export class MongoLockManager implements LockManager {
  constructor(private readonly holder: string = INSTANCE_ID) {}

  async acquire({ lockName, ttlSeconds, now = new Date() }: LockOptions): Promise<LockResult> {
    const lockId = claimId(lockName);
    const expiresAt = new Date(now.getTime() + ttlSeconds * 1000);

    try {
      // Take over an expired claim the TTL monitor has not removed yet
      const takenOver = await ClaimLock.findOneAndUpdate(
        { _id: lockId, expiresAt: { $lt: now } },
        { holder: this.holder, acquiredAt: now, expiresAt },
        { new: true }
      );
      if (takenOver) {
        log.info('Claim acquired (took over expired)', { lockId, holder: this.holder });
        return { acquired: true, lockId, holder: this.holder };
      }

      try {
        await ClaimLock.create({ _id: lockId, holder: this.holder, acquiredAt: now, expiresAt });
        log.debug('Claim created', { lockId, holder: this.holder });
        return { acquired: true, lockId, holder: this.holder };
      } catch (createError) {
        if (!isDuplicateKeyError(createError)) throw createError;

        const existing = await ClaimLock.findById(lockId).lean();
        return {
          acquired: false,
          lockId,
          holder: existing?.holder,
          error: `Claim held by ${existing?.holder ?? 'unknown'} (expires: ${existing?.expiresAt.toISOString() ?? 'unknown'})`,
        };
      }
    } catch (error) {
      log.error('Error acquiring claim', { lockId, error: errorMessage(error) });
      return { acquired: false, lockId, unavailable: true, error: errorMessage(error) };
    }
  }

  async release(lockName: string): Promise<boolean> {
    const lockId = claimId(lockName);

    try {
      const result = await ClaimLock.deleteOne({ _id: lockId, holder: this.holder });
      if (result.deletedCount > 0) {
        log.debug('Claim released', { lockId });
        return true;
      }
      log.warn('Claim not released (not held by this instance)', { lockId });
      return false;
    } catch (error) {
      log.error('Error releasing claim', { lockId, error: errorMessage(error) });
      return false;
    }
  }
}

/**
 * Run `fn` while holding a claim. Resolves `{ skipped: true }` when the claim
 * is held elsewhere; errors from `fn` propagate after the claim is released.
 */
export async function withLock<T>(
  locks: LockManager,
  options: LockOptions,
  fn: () => Promise<T>
): Promise<{ skipped: true; lock: LockResult } | { skipped: false; result: T }> {
  const lock = await locks.acquire(options);
  if (!lock.acquired) {
    return { skipped: true, lock };
  }

  try {
    return { skipped: false, result: await fn() };
  } finally {
    await locks.release(options.lockName);
  }
}
