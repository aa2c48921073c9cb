import { addHours, addMinutes, subHours } from 'date-fns';

/** Start of the UTC day containing `date`. */
export function getDateKey(date: Date = new Date()): Date {
  const d = new Date(date);
  d.setUTCHours(0, 0, 0, 0);
  return d;
}

/** YYYY-MM-DD of the UTC day containing `date`. */
export function formatDateKey(date: Date): string {
  return getDateKey(date).toISOString().slice(0, 10);
}

export function formatTime(hour: number, minute: number): string {
  return `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`;
}

// date-fns addDays/subDays follow local wall-clock time; everything here is UTC,
// so whole days are added as 24-hour spans.
export function addUtcDays(date: Date, days: number): Date {
  return addHours(date, days * 24);
}

export function daysBefore(date: Date, days: number): Date {
  return subHours(date, days * 24);
}

export function atUtcTime(day: Date, hour: number, minute: number): Date {
  return addMinutes(getDateKey(day), hour * 60 + minute);
}
