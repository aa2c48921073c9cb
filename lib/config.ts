/**
 * Configuration loading.
 *
 * Everything a run needs is read from the environment once, validated with
 * zod and frozen into an AutomationConfig that is passed down explicitly.
 * The schedule and prospect lists come from JSON files named by the env.
 */

import { readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';
import { logger } from './logger';
import { describeEntry, findScheduleConflicts, parseTime } from './schedule/schedule';
import { ACTION_KINDS, type ActionKind, type Prospect, type ScheduleEntry } from './types';

const log = logger.child('config');

export type ContentTone = 'professional' | 'casual' | 'enthusiastic' | 'thoughtful';
export type ContentLength = 'short' | 'medium' | 'long';

export interface AutomationConfig {
  linkedin: {
    accessToken: string;
    apiBaseUrl: string;
    restApiBaseUrl: string;
    apiVersion: string;
    httpTimeoutMs: number;
  };
  ai: {
    apiKey: string;
    baseUrl: string;
    model: string;
    timeoutMs: number;
  };
  mongodbUri: string;
  schedule: {
    entries: readonly ScheduleEntry[];
    toleranceMinutes: number;
  };
  limits: {
    dailyCaps: Readonly<Record<ActionKind, number>>;
    minDelaySeconds: number;
    maxDelaySeconds: number;
  };
  content: {
    tone: ContentTone;
    length: ContentLength;
    topics: readonly string[];
    expandTopics: boolean;
  };
  engagement: {
    postsPerCycle: number;
    cycleCap: number;
    commentsEnabled: boolean;
    authors: readonly string[];
    dedupWindowDays: number;
  };
  network: {
    prospects: readonly Prospect[];
    cycleCap: number;
    dedupWindowDays: number;
  };
  claimTtlSeconds: number;
}

const ENGAGEMENT_DEDUP_DAYS = 30;
const CONNECTION_DEDUP_DAYS = 90;

const csvList = z
  .string()
  .transform(value => value.split(',').map(item => item.trim()).filter(Boolean));

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const envSchema = z
  .object({
    LINKEDIN_ACCESS_TOKEN: z.string().default(''),
    LINKEDIN_API_BASE_URL: z.string().url().default('https://api.linkedin.com/v2'),
    LINKEDIN_REST_API_BASE_URL: z.string().url().default('https://api.linkedin.com/rest'),
    LINKEDIN_API_VERSION: z.string().regex(/^\d{6}$/, 'expected YYYYMM').default('202401'),
    AI_API_KEY: z.string().optional(),
    GROQ_API_KEY: z.string().optional(),
    AI_BASE_URL: z.string().url().default('https://api.groq.com/openai/v1'),
    AI_MODEL: z.string().min(1).default('llama-3.3-70b-versatile'),
    AI_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    MONGODB_URI: z.string().default(''),
    SCHEDULE_FILE: z.string().min(1).default('config/schedule.json'),
    SCHEDULE_TOLERANCE_MINUTES: z.coerce.number().int().min(0).max(30).default(2),
    DAILY_POST_CAP: z.coerce.number().int().min(0).default(10),
    DAILY_ENGAGEMENT_CAP: z.coerce.number().int().min(0).default(30),
    DAILY_CONNECTION_LIMIT: z.coerce.number().int().min(0).max(100).default(20),
    MIN_DELAY_BETWEEN_ACTIONS: z.coerce.number().int().min(30).default(60),
    MAX_DELAY_BETWEEN_ACTIONS: z.coerce.number().int().positive().default(180),
    CONTENT_TONE: z.enum(['professional', 'casual', 'enthusiastic', 'thoughtful']).default('professional'),
    CONTENT_LENGTH: z.enum(['short', 'medium', 'long']).default('medium'),
    CONTENT_TOPICS: csvList
      .default('AI,Technology,Business')
      .refine(topics => topics.length > 0, 'at least one topic is required'),
    EXPAND_TOPICS: flag.default('false'),
    ENGAGEMENT_POSTS_PER_CYCLE: z.coerce.number().int().min(1).max(50).default(10),
    ENGAGEMENT_CYCLE_CAP: z.coerce.number().int().min(0).default(5),
    ENGAGEMENT_COMMENTS: flag.default('true'),
    ENGAGEMENT_AUTHORS: csvList.default(''),
    PROSPECTS_FILE: z.string().optional(),
    CONNECTION_CYCLE_CAP: z.coerce.number().int().min(0).default(5),
    HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
    CLAIM_TTL_SECONDS: z.coerce.number().int().min(60).default(900),
  })
  .refine(env => env.MIN_DELAY_BETWEEN_ACTIONS <= env.MAX_DELAY_BETWEEN_ACTIONS, {
    message: 'must not be greater than MAX_DELAY_BETWEEN_ACTIONS',
    path: ['MIN_DELAY_BETWEEN_ACTIONS'],
  });

const scheduleFileSchema = z.object({
  entries: z.array(
    z.object({
      day: z.number().int().min(0).max(6),
      time: z.string().refine(value => parseTime(value) !== null, 'expected HH:MM (24h)'),
      kind: z.enum(ACTION_KINDS),
    })
  ),
});

const prospectsFileSchema = z.object({
  prospects: z.array(
    z.object({
      id: z.string().min(1),
      name: z.string().min(1),
      title: z.string().default(''),
      company: z.string().default(''),
      mutualConnections: z.number().int().min(0).default(0),
    })
  ),
});

export type ReadText = (filePath: string) => string;

const readFromDisk: ReadText = filePath => readFileSync(path.resolve(process.cwd(), filePath), 'utf8');

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function readJsonFile<S extends z.ZodTypeAny>(schema: S, filePath: string, readText: ReadText): z.output<S> {
  let raw: unknown;
  try {
    raw = JSON.parse(readText(filePath));
  } catch (error) {
    throw new ConfigError(`Cannot read ${filePath}: ${error instanceof Error ? error.message : 'Unknown error'}`, { cause: error });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${filePath}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function loadSchedule(filePath: string, toleranceMinutes: number, readText: ReadText = readFromDisk): ScheduleEntry[] {
  const file = readJsonFile(scheduleFileSchema, filePath, readText);

  const entries = file.entries.map((row): ScheduleEntry => {
    const time = parseTime(row.time);
    if (!time) throw new ConfigError(`Invalid time "${row.time}" in ${filePath}`);
    return Object.freeze({ dayOfWeek: row.day, hour: time.hour, minute: time.minute, actionKind: row.kind });
  });

  for (const conflict of findScheduleConflicts(entries, toleranceMinutes)) {
    log.warn('Schedule slots overlap within twice the tolerance', {
      first: describeEntry(conflict.first),
      second: describeEntry(conflict.second),
      gapMinutes: conflict.gapMinutes,
    });
  }

  return entries;
}

export function loadProspects(filePath: string, readText: ReadText = readFromDisk): Prospect[] {
  return readJsonFile(prospectsFileSchema, filePath, readText).prospects.map(prospect => Object.freeze(prospect));
}

/**
 * Parse and validate the environment. Throws ConfigError listing every
 * invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, readText: ReadText = readFromDisk): AutomationConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${describeIssues(parsed.error)}`);
  }
  const e = parsed.data;

  const config: AutomationConfig = {
    linkedin: {
      accessToken: e.LINKEDIN_ACCESS_TOKEN,
      apiBaseUrl: e.LINKEDIN_API_BASE_URL,
      restApiBaseUrl: e.LINKEDIN_REST_API_BASE_URL,
      apiVersion: e.LINKEDIN_API_VERSION,
      httpTimeoutMs: e.HTTP_TIMEOUT_MS,
    },
    ai: {
      apiKey: e.AI_API_KEY || e.GROQ_API_KEY || '',
      baseUrl: e.AI_BASE_URL,
      model: e.AI_MODEL,
      timeoutMs: e.AI_TIMEOUT_MS,
    },
    mongodbUri: e.MONGODB_URI,
    schedule: {
      entries: loadSchedule(e.SCHEDULE_FILE, e.SCHEDULE_TOLERANCE_MINUTES, readText),
      toleranceMinutes: e.SCHEDULE_TOLERANCE_MINUTES,
    },
    limits: {
      dailyCaps: {
        post: e.DAILY_POST_CAP,
        engagement: e.DAILY_ENGAGEMENT_CAP,
        connection: e.DAILY_CONNECTION_LIMIT,
      },
      minDelaySeconds: e.MIN_DELAY_BETWEEN_ACTIONS,
      maxDelaySeconds: e.MAX_DELAY_BETWEEN_ACTIONS,
    },
    content: {
      tone: e.CONTENT_TONE,
      length: e.CONTENT_LENGTH,
      topics: e.CONTENT_TOPICS,
      expandTopics: e.EXPAND_TOPICS,
    },
    engagement: {
      postsPerCycle: e.ENGAGEMENT_POSTS_PER_CYCLE,
      cycleCap: e.ENGAGEMENT_CYCLE_CAP,
      commentsEnabled: e.ENGAGEMENT_COMMENTS,
      authors: e.ENGAGEMENT_AUTHORS,
      dedupWindowDays: ENGAGEMENT_DEDUP_DAYS,
    },
    network: {
      prospects: e.PROSPECTS_FILE ? loadProspects(e.PROSPECTS_FILE, readText) : [],
      cycleCap: e.CONNECTION_CYCLE_CAP,
      dedupWindowDays: CONNECTION_DEDUP_DAYS,
    },
    claimTtlSeconds: e.CLAIM_TTL_SECONDS,
  };

  return deepFreeze(config);
}

export type Secret = 'linkedin' | 'ai' | 'mongodb';

/** Scripts call this for the credentials they actually use. */
export function requireSecrets(config: AutomationConfig, secrets: readonly Secret[]): void {
  const missing: string[] = [];
  if (secrets.includes('linkedin') && !config.linkedin.accessToken) missing.push('LINKEDIN_ACCESS_TOKEN');
  if (secrets.includes('ai') && !config.ai.apiKey) missing.push('AI_API_KEY');
  if (secrets.includes('mongodb') && !config.mongodbUri) missing.push('MONGODB_URI');
  if (missing.length > 0) {
    throw new ConfigError(`Missing required environment variables: ${missing.join(', ')}`);
  }
}

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child) && !(child instanceof Date)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
