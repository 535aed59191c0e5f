import { format, startOfDay } from "date-fns";
import { ScheduleContractError } from "./errors.js";

export const MINUTE_MS = 60 * 1000;
export const HOUR_MS = 60 * MINUTE_MS;

/**
 * The reference time scale used to cut instants into calendar days.
 *
 * The engine works on absolute instants only; which midnight counts is
 * the caller's choice, expressed through a scale.
 */
export interface DayScale {
  readonly name: string;
  /** Returns the first instant of the day containing `instant`. */
  startOfDay(instant: Date): Date;
  /** Returns the calendar label (YYYY-MM-DD) of the day starting at `dayStart`. */
  label(dayStart: Date): string;
}

/**
 * A single day `[start, end)` in some {@link DayScale}.
 */
export interface DayBucket {
  readonly label: string;
  readonly start: Date;
  readonly end: Date;
}

/**
 * Formats a date as a YYYY-MM-DD string in UTC.
 */
export function formatUtcDateString(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Days run from 00:00Z to 00:00Z. The default scale.
 */
export const utcDayScale: DayScale = {
  name: "utc",
  startOfDay(instant) {
    return new Date(
      Date.UTC(instant.getUTCFullYear(), instant.getUTCMonth(), instant.getUTCDate()),
    );
  },
  label: formatUtcDateString,
};

/**
 * Days follow the host time zone, including 23h and 25h days around DST changes.
 */
export const localDayScale: DayScale = {
  name: "local",
  startOfDay: (instant) => startOfDay(instant),
  label: (dayStart) => format(dayStart, "yyyy-MM-dd"),
};

export function isValidInstant(date: Date): boolean {
  return !Number.isNaN(date.getTime());
}

/**
 * Returns the start of the day after the one starting at `dayStart`.
 *
 * Probing 36 hours ahead lands inside the next day for 23h, 24h and 25h days
 * alike, so the scale only has to know how to find a day's start.
 */
export function nextDayStart(dayStart: Date, scale: DayScale): Date {
  const next = scale.startOfDay(new Date(dayStart.getTime() + 36 * HOUR_MS));
  if (next.getTime() <= dayStart.getTime()) {
    throw new ScheduleContractError(
      `Day scale "${scale.name}" did not advance past ${dayStart.toISOString()}`,
      "INVALID_DAY_SCALE",
      { scale: scale.name, dayStart: dayStart.toISOString() },
    );
  }
  return next;
}

/**
 * Builds the {@link DayBucket} containing `instant`.
 */
export function dayBucketFor(instant: Date, scale: DayScale): DayBucket {
  const start = scale.startOfDay(instant);
  if (start.getTime() > instant.getTime()) {
    throw new ScheduleContractError(
      `Day scale "${scale.name}" placed ${instant.toISOString()} before its own day start`,
      "INVALID_DAY_SCALE",
      { scale: scale.name, instant: instant.toISOString() },
    );
  }
  return { label: scale.label(start), start, end: nextDayStart(start, scale) };
}

/**
 * Lists every day bucket a half-open interval `[start, end)` puts time into,
 * from its start day through its end day.
 *
 * A final day touched only at the exclusive end (an interval ending exactly at
 * midnight) is not listed.
 *
 * @example
 * ```typescript
 * const days = daysTouched(
 *   { start: new Date("2025-01-01T23:00:00Z"), end: new Date("2025-01-02T01:00:00Z") },
 *   utcDayScale,
 * );
 * // days.map((d) => d.label) => ["2025-01-01", "2025-01-02"]
 * ```
 */
export function daysTouched(
  interval: { readonly start: Date; readonly end: Date },
  scale: DayScale,
): DayBucket[] {
  const days: DayBucket[] = [];
  if (!isValidInstant(interval.start) || !isValidInstant(interval.end)) return days;
  if (interval.end.getTime() <= interval.start.getTime()) return days;

  let day = dayBucketFor(interval.start, scale);
  while (day.start.getTime() < interval.end.getTime()) {
    days.push(day);
    const start = day.end;
    day = { label: scale.label(start), start, end: nextDayStart(start, scale) };
  }
  return days;
}

/**
 * Formats an interval as `start/end` in ISO-8601 (UTC).
 */
export function formatIsoRange(interval: { readonly start: Date; readonly end: Date }): string {
  const start = isValidInstant(interval.start) ? interval.start.toISOString() : "invalid";
  const end = isValidInstant(interval.end) ? interval.end.toISOString() : "invalid";
  return `${start}/${end}`;
}
