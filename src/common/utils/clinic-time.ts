import { addMinutes } from 'date-fns';

// Wall-clock rules are evaluated in UTC, matching how instants are stored.

export const MINUTES_PER_DAY = 24 * 60;
const MS_PER_MINUTE = 60_000;

export function startOfUtcDay(date: Date): Date {
  return new Date(
    Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()),
  );
}

export function atMinuteOfDay(day: Date, minutes: number): Date {
  return addMinutes(startOfUtcDay(day), minutes);
}

export function nextUtcDay(date: Date): Date {
  return addMinutes(startOfUtcDay(date), MINUTES_PER_DAY);
}

export function isSameUtcDay(a: Date, b: Date): boolean {
  return startOfUtcDay(a).getTime() === startOfUtcDay(b).getTime();
}

/** Exact, possibly fractional, minutes between two instants. */
export function minutesBetween(start: Date, end: Date): number {
  return (end.getTime() - start.getTime()) / MS_PER_MINUTE;
}

export function roundUpToIncrement(date: Date, incrementMinutes: number): Date {
  const step = incrementMinutes * MS_PER_MINUTE;
  return new Date(Math.ceil(date.getTime() / step) * step);
}

export function laterOf(a: Date, b: Date): Date {
  return a.getTime() >= b.getTime() ? a : b;
}

/** Half-open overlap: touching endpoints do not overlap. */
export function overlaps(
  aStart: Date,
  aEnd: Date,
  bStart: Date,
  bEnd: Date,
): boolean {
  return (
    aStart.getTime() < bEnd.getTime() && bStart.getTime() < aEnd.getTime()
  );
}

export function formatUtcTime(date: Date): string {
  const hours = date.getUTCHours().toString().padStart(2, '0');
  const minutes = date.getUTCMinutes().toString().padStart(2, '0');
  return `${hours}:${minutes}`;
}

export function formatUtcDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}
