/**
 * Composition root: builds every component of a run from one config value.
 * Stores default to the Mongo-backed ones; tests pass their own.
 */

import { OpenAITextService, type AITextService } from './ai-client';
import type { AutomationConfig } from './config';
import { ContentGenerator } from './content/content-generator';
import { MongoLockManager, type LockManager } from './distributed-lock';
import { ConnectionWorker } from './engagement/connection-worker';
import { EngagementWorker } from './engagement/engagement-worker';
import { MongoActivityLedger, type ActivityLedger } from './ledger/activity-ledger';
import { MongoPostRecordStore, type PostRecordStore } from './ledger/post-records';
import { LinkedInAdapter } from './platforms/linkedin-adapter';
import type { SocialPoster } from './platforms/types';
import { MongoRateCounterStore, RateLimiter, type RateCounterStore } from './rate-limiter';
import { systemRuntime, type Runtime } from './runtime';
import { ScheduleDriver } from './schedule/schedule-driver';

export interface OrchestratorOverrides {
  ai?: AITextService;
  poster?: SocialPoster;
  ledger?: ActivityLedger;
  postRecords?: PostRecordStore;
  rateCounters?: RateCounterStore;
  locks?: LockManager;
  runtime?: Runtime;
}

export interface Orchestrator {
  driver: ScheduleDriver;
  engagement: EngagementWorker;
  connections: ConnectionWorker;
  poster: SocialPoster;
  generator: ContentGenerator;
  limiter: RateLimiter;
  ledger: ActivityLedger;
}

export function createOrchestrator(config: AutomationConfig, overrides: OrchestratorOverrides = {}): Orchestrator {
  const runtime = overrides.runtime ?? systemRuntime;
  const ledger = overrides.ledger ?? new MongoActivityLedger();
  const locks = overrides.locks ?? new MongoLockManager();
  const poster =
    overrides.poster ??
    new LinkedInAdapter({ ...config.linkedin, engagementAuthors: config.engagement.authors });
  const generator = new ContentGenerator(overrides.ai ?? new OpenAITextService(config.ai), {
    tone: config.content.tone,
    length: config.content.length,
    now: () => runtime.now(),
  });
  const limiter = new RateLimiter(overrides.rateCounters ?? new MongoRateCounterStore(), {
    ...config.limits,
    random: () => runtime.random(),
  });

  const workerDeps = { poster, generator, limiter, ledger, locks, runtime };

  const engagement = new EngagementWorker(workerDeps, {
    postsPerCycle: config.engagement.postsPerCycle,
    cycleCap: config.engagement.cycleCap,
    commentsEnabled: config.engagement.commentsEnabled,
    dedupWindowDays: config.engagement.dedupWindowDays,
    claimTtlSeconds: config.claimTtlSeconds,
  });

  const connections = new ConnectionWorker(workerDeps, {
    prospects: config.network.prospects,
    cycleCap: config.network.cycleCap,
    dedupWindowDays: config.network.dedupWindowDays,
    claimTtlSeconds: config.claimTtlSeconds,
  });

  const driver = new ScheduleDriver(
    {
      ...workerDeps,
      postRecords: overrides.postRecords ?? new MongoPostRecordStore(),
      engagement,
      connections,
    },
    {
      entries: config.schedule.entries,
      toleranceMinutes: config.schedule.toleranceMinutes,
      topics: config.content.topics,
      expandTopics: config.content.expandTopics,
      claimTtlSeconds: config.claimTtlSeconds,
      minDelaySeconds: config.limits.minDelaySeconds,
    }
  );

  return { driver, engagement, connections, poster, generator, limiter, ledger };
}
