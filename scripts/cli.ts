/**
 * Shared plumbing for the trigger scripts: argument parsing, exit codes and
 * the connect / run / disconnect lifecycle.
 */

import { ConfigError, errorData, errorKindOf, type ErrorKind } from '../lib/errors';
import { logger } from '../lib/logger';
import { disconnectFromDatabase } from '../lib/mongodb';
import type { ActionOutcome } from '../lib/schedule/schedule-driver';

export const EXIT_CODES = {
  ok: 0,
  failed: 1,
  auth: 2,
  config: 3,
} as const;

/** `--name=value` or `--name value`. */
export function argValue(argv: readonly string[], name: string): string | undefined {
  const flag = `--${name}`;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith(`${flag}=`)) return arg.slice(flag.length + 1);
    if (arg === flag && i + 1 < argv.length) return argv[i + 1];
  }
  return undefined;
}

export function hasFlag(argv: readonly string[], name: string): boolean {
  return argv.includes(`--${name}`);
}

/** The `--now` override for replays, or undefined to use the clock. */
export function parseNow(argv: readonly string[]): Date | undefined {
  const raw = argValue(argv, 'now');
  if (raw === undefined) return undefined;
  const parsed = new Date(raw);
  if (Number.isNaN(parsed.getTime())) {
    throw new ConfigError(`Invalid --now value "${raw}", expected an ISO-8601 timestamp`);
  }
  return parsed;
}

export function exitCodeForKind(kind: ErrorKind | undefined): number {
  if (kind === 'AuthError') return EXIT_CODES.auth;
  if (kind === 'ConfigError') return EXIT_CODES.config;
  return EXIT_CODES.failed;
}

export function exitCodeForRun(outcome: Pick<ActionOutcome, 'status' | 'fatal'>): number {
  if (outcome.fatal) return exitCodeForKind(outcome.fatal);
  return outcome.status === 'failed' ? EXIT_CODES.failed : EXIT_CODES.ok;
}

/**
 * Run `main`, log a final line naming any error kind, close the database
 * connection and set the exit code.
 */
export async function runScript(name: string, main: () => Promise<number>): Promise<void> {
  const log = logger.child(name);
  let code: number;

  try {
    code = await main();
    log.info('Finished', { exitCode: code });
  } catch (error) {
    code = exitCodeForKind(errorKindOf(error));
    log.error('Aborted', { exitCode: code, ...errorData(error) });
  } finally {
    await disconnectFromDatabase().catch((error: unknown) => {
      log.warn('Error closing database connection', errorData(error));
    });
  }

  process.exitCode = code;
}
