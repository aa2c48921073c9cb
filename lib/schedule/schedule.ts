import { differenceInMilliseconds, subMinutes } from 'date-fns';
import { addUtcDays, atUtcTime, formatDateKey, formatTime } from '../dates';
import type { ActionKind, ScheduleEntry, TimeWindow } from '../types';

const MINUTES_PER_DAY = 24 * 60;
const MINUTES_PER_WEEK = 7 * MINUTES_PER_DAY;

const KIND_ORDER: Record<ActionKind, number> = { post: 0, engagement: 1, connection: 2 };

/** A schedule entry's concrete occurrence that is due at a given instant. */
export interface DueSlot {
  entry: ScheduleEntry;
  occurrence: Date;
  occurrenceKey: string;
}

export function minuteOfWeek(entry: ScheduleEntry): number {
  return entry.dayOfWeek * MINUTES_PER_DAY + entry.hour * 60 + entry.minute;
}

/** `<kind>:<dow>-<HH:MM>@<YYYY-MM-DD>`, unique per calendar occurrence. */
export function occurrenceKey(entry: ScheduleEntry, occurrence: Date): string {
  return `${entry.actionKind}:${entry.dayOfWeek}-${formatTime(entry.hour, entry.minute)}@${formatDateKey(occurrence)}`;
}

export function describeEntry(entry: ScheduleEntry): string {
  return `${entry.actionKind}@${entry.dayOfWeek}-${formatTime(entry.hour, entry.minute)}`;
}

/**
 * Entries whose occurrence lies within ±toleranceMinutes of `now`, oldest
 * first. Occurrences on the previous and next UTC day are considered so a
 * slot at 23:59 still matches a trigger at 00:01.
 */
export function dueSlots(
  entries: readonly ScheduleEntry[],
  now: Date,
  toleranceMinutes: number
): DueSlot[] {
  const toleranceMs = toleranceMinutes * 60_000;
  const slots: DueSlot[] = [];

  for (const dayOffset of [-1, 0, 1]) {
    const day = addUtcDays(now, dayOffset);
    const dow = day.getUTCDay();

    for (const entry of entries) {
      if (entry.dayOfWeek !== dow) continue;
      const occurrence = atUtcTime(day, entry.hour, entry.minute);
      if (Math.abs(differenceInMilliseconds(now, occurrence)) <= toleranceMs) {
        slots.push({ entry, occurrence, occurrenceKey: occurrenceKey(entry, occurrence) });
      }
    }
  }

  return slots.sort(
    (a, b) =>
      a.occurrence.getTime() - b.occurrence.getTime() ||
      KIND_ORDER[a.entry.actionKind] - KIND_ORDER[b.entry.actionKind]
  );
}

/**
 * The span in which a success for this occurrence counts: from the start of
 * its tolerance window until a day later. The key already names the date, so
 * a late-recorded success still dedups.
 */
export function eligibilityWindow(slot: DueSlot, toleranceMinutes: number): TimeWindow {
  return {
    since: subMinutes(slot.occurrence, toleranceMinutes),
    until: addUtcDays(slot.occurrence, 1),
  };
}

export interface ScheduleConflict {
  first: ScheduleEntry;
  second: ScheduleEntry;
  gapMinutes: number;
}

/**
 * Pairs of neighbouring entries (wrapping around the week) closer than
 * 2×tolerance. A trigger between them would see both as due.
 */
export function findScheduleConflicts(
  entries: readonly ScheduleEntry[],
  toleranceMinutes: number
): ScheduleConflict[] {
  if (entries.length < 2) return [];

  const sorted = [...entries].sort((a, b) => minuteOfWeek(a) - minuteOfWeek(b));
  const conflicts: ScheduleConflict[] = [];

  sorted.forEach((first, index) => {
    const isLast = index === sorted.length - 1;
    const second = isLast ? sorted[0] : sorted[index + 1];
    const gapMinutes = isLast
      ? minuteOfWeek(second) + MINUTES_PER_WEEK - minuteOfWeek(first)
      : minuteOfWeek(second) - minuteOfWeek(first);

    if (gapMinutes <= 2 * toleranceMinutes) {
      conflicts.push({ first, second, gapMinutes });
    }
  });

  return conflicts;
}

const TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

export function parseTime(value: string): { hour: number; minute: number } | null {
  const match = TIME_PATTERN.exec(value);
  if (!match) return null;
  return { hour: Number(match[1]), minute: Number(match[2]) };
}
