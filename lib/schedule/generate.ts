import { formatTime } from '../dates';
import { randomInt } from '../runtime';
import type { ActionKind, ScheduleEntry } from '../types';
import { findScheduleConflicts, minuteOfWeek } from './schedule';

const MINUTES_PER_DAY = 24 * 60;
const MAX_ATTEMPTS = 200;

export interface GenerateScheduleOptions {
  perDay: number;
  actionKind: ActionKind;
  toleranceMinutes: number;
  /** Days to fill, 0 = Sunday. Defaults to every day. */
  days?: readonly number[];
  /** Entries the generated ones must not collide with. */
  existing?: readonly ScheduleEntry[];
  random?: () => number;
}

/**
 * `count` distinct minutes of the day, sorted, pairwise more than
 * `minGapMinutes` apart (including across midnight).
 */
export function generateRandomTimings(
  count: number,
  minGapMinutes: number,
  random: () => number = Math.random
): number[] {
  if (count * (minGapMinutes + 1) > MINUTES_PER_DAY) {
    throw new RangeError(`Cannot fit ${count} timings per day more than ${minGapMinutes} minutes apart`);
  }

  for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
    const picked: number[] = [];
    for (let tries = 0; picked.length < count && tries < count * 50; tries++) {
      const minute = randomInt(random, 0, MINUTES_PER_DAY - 1);
      const clashes = picked.some(other => {
        const gap = Math.abs(other - minute);
        return Math.min(gap, MINUTES_PER_DAY - gap) <= minGapMinutes;
      });
      if (!clashes) picked.push(minute);
    }
    if (picked.length === count) return picked.sort((a, b) => a - b);
  }

  throw new RangeError(`Could not place ${count} timings after ${MAX_ATTEMPTS} attempts`);
}

/**
 * A weekly schedule with `perDay` random slots on each requested day. No
 * two slots (generated or existing) end up within 2×tolerance of each other.
 */
export function generateWeeklySchedule(options: GenerateScheduleOptions): ScheduleEntry[] {
  const { perDay, actionKind, toleranceMinutes, days = [0, 1, 2, 3, 4, 5, 6], existing = [], random = Math.random } = options;
  const minGap = 2 * toleranceMinutes;

  for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
    const generated = days.flatMap(dayOfWeek =>
      generateRandomTimings(perDay, minGap, random).map(minute => ({
        dayOfWeek,
        hour: Math.floor(minute / 60),
        minute: minute % 60,
        actionKind,
      }))
    );

    if (findScheduleConflicts([...existing, ...generated], toleranceMinutes).length === 0) {
      return generated.sort((a, b) => minuteOfWeek(a) - minuteOfWeek(b));
    }
  }

  throw new RangeError('Could not generate a schedule without conflicts');
}

export interface ScheduleFile {
  entries: Array<{ day: number; time: string; kind: ActionKind }>;
}

export function toScheduleFile(entries: readonly ScheduleEntry[]): ScheduleFile {
  return {
    entries: [...entries]
      .sort((a, b) => minuteOfWeek(a) - minuteOfWeek(b))
      .map(entry => ({ day: entry.dayOfWeek, time: formatTime(entry.hour, entry.minute), kind: entry.actionKind })),
  };
}

/** `MM HH * * D` lines for an external cron or CI trigger. */
export function toCronLines(entries: readonly ScheduleEntry[]): string[] {
  return [...entries]
    .sort((a, b) => minuteOfWeek(a) - minuteOfWeek(b))
    .map(entry => `${entry.minute} ${entry.hour} * * ${entry.dayOfWeek}`);
}
