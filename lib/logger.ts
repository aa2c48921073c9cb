/**
 * Structured logger.
 *
 * One line per call. JSON when NODE_ENV=production or LOG_FORMAT=json (cron
 * and CI log collectors), a short badge format otherwise.
 *
 * Usage:
 *   import { logger } from './logger';
 *   const log = logger.child('schedule-driver');
 *   log.info('Slot due', { occurrenceKey });
 *   log.child('post', { occurrenceKey }).warn('Denied', { reason });
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogData = Record<string, unknown>;

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  context: string;      // e.g. 'schedule-driver', 'engagement', 'linkedin'
  message: string;
  data?: LogData;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVEL_PRIORITY;
}

// Read on every call so tests and scripts can change it after import
function minLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(configured) ? configured : 'info';
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel()];
}

function formatLog(entry: LogEntry): string {
  if (process.env.NODE_ENV === 'production' || process.env.LOG_FORMAT === 'json') {
    return JSON.stringify(entry);
  }

  const levelBadge = {
    debug: '🔍',
    info: 'ℹ️ ',
    warn: '⚠️ ',
    error: '❌',
  }[entry.level];

  const dataStr = entry.data ? ` ${JSON.stringify(entry.data)}` : '';
  return `${entry.timestamp} ${levelBadge} [${entry.context}] ${entry.message}${dataStr}`;
}

function log(level: LogLevel, context: string, message: string, data?: LogData): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    context,
    message,
    ...(data && Object.keys(data).length > 0 ? { data } : {}),
  };

  const output = formatLog(entry);

  switch (level) {
    case 'error':
      console.error(output);
      break;
    case 'warn':
      console.warn(output);
      break;
    default:
      console.log(output);
  }
}

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
  /** Nested context (`parent:child`) carrying extra fields on every line. */
  child(context: string, bound?: LogData): Logger;
}

function createLogger(context: string, bound: LogData = {}): Logger {
  const write = (level: LogLevel, message: string, data?: LogData) =>
    log(level, context, message, { ...bound, ...data });

  return {
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
    child: (childContext, childBound) =>
      createLogger(`${context}:${childContext}`, { ...bound, ...childBound }),
  };
}

export const logger = {
  debug: (context: string, message: string, data?: LogData) =>
    log('debug', context, message, data),

  info: (context: string, message: string, data?: LogData) =>
    log('info', context, message, data),

  warn: (context: string, message: string, data?: LogData) =>
    log('warn', context, message, data),

  error: (context: string, message: string, data?: LogData) =>
    log('error', context, message, data),

  child: (context: string, bound?: LogData): Logger => createLogger(context, bound),
};
