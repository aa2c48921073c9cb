/**
 * Generate random, well-spaced weekly slots.
 *
 *   npm run generate-schedule -- --per-day=10 [--kind=post] [--tolerance=2] [--out=config/schedule.json] [--cron]
 */

import { writeFileSync } from 'fs';
import { ConfigError } from '../lib/errors';
import { logger } from '../lib/logger';
import { generateWeeklySchedule, toCronLines, toScheduleFile } from '../lib/schedule/generate';
import { ACTION_KINDS, type ActionKind } from '../lib/types';
import { EXIT_CODES, argValue, hasFlag, runScript } from './cli';

const log = logger.child('generate-schedule');

function intArg(argv: readonly string[], name: string, fallback: number): number {
  const raw = argValue(argv, name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`--${name} must be a non-negative integer`);
  }
  return value;
}

function isActionKind(value: string): value is ActionKind {
  return ACTION_KINDS.some(kind => kind === value);
}

void runScript('generate-schedule', async () => {
  const argv = process.argv.slice(2);
  const kind = argValue(argv, 'kind') ?? 'post';
  if (!isActionKind(kind)) {
    throw new ConfigError(`--kind must be one of ${ACTION_KINDS.join(', ')}`);
  }

  const entries = generateWeeklySchedule({
    perDay: intArg(argv, 'per-day', 10),
    actionKind: kind,
    toleranceMinutes: intArg(argv, 'tolerance', 2),
  });

  const output = hasFlag(argv, 'cron')
    ? toCronLines(entries).join('\n')
    : JSON.stringify(toScheduleFile(entries), null, 2);

  const out = argValue(argv, 'out');
  if (out) {
    writeFileSync(out, `${output}\n`);
    log.info('Schedule written', { path: out, entries: entries.length });
  } else {
    console.log(output);
  }
  return EXIT_CODES.ok;
});
