import { HOUR_MS, type DayBucket } from "../datetime.utils.js";
import type { Interval } from "../types.js";

/**
 * Milliseconds of `[start, end)` that fall inside `day`. Zero when they do not meet.
 */
export function clippedMilliseconds(
  interval: { readonly start: Date; readonly end: Date },
  day: DayBucket,
): number {
  const clippedStart = Math.max(interval.start.getTime(), day.start.getTime());
  const clippedEnd = Math.min(interval.end.getTime(), day.end.getTime());
  return clippedEnd > clippedStart ? clippedEnd - clippedStart : 0;
}

/**
 * Total rest, in hours, attributed to one day.
 *
 * Every `REST` interval in `restIntervals` (and `candidate`, when given and of
 * category `REST`) is clipped to `[day.start, day.end)` and the clipped
 * lengths are summed. An interval crossing midnight contributes its share to
 * each day it touches. `WORK` intervals are ignored.
 *
 * Milliseconds are summed before converting to hours, so the result does not
 * depend on the order of `restIntervals`.
 *
 * @example
 * ```ts
 * // [23:00 day1, 01:00 day2) contributes 1h to day1 and 1h to day2
 * dailyRestHours(day1, [lateRest]); // 1
 * dailyRestHours(day2, [lateRest]); // 1
 * ```
 */
export function dailyRestHours(
  day: DayBucket,
  restIntervals: readonly Interval[],
  candidate?: Interval,
): number {
  let totalMs = 0;
  for (const interval of restIntervals) {
    if (interval.category !== "REST") continue;
    totalMs += clippedMilliseconds(interval, day);
  }
  if (candidate?.category === "REST") {
    totalMs += clippedMilliseconds(candidate, day);
  }
  return totalMs / HOUR_MS;
}
