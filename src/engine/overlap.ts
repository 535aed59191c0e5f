import { HOUR_MS } from "../datetime.utils.js";

interface Span {
  readonly start: Date;
  readonly end: Date;
}

/**
 * Tests whether two half-open intervals `[start, end)` intersect.
 *
 * Back-to-back intervals (`a.end == b.start`) share only a boundary instant
 * and do not overlap.
 *
 * @example
 * ```ts
 * overlaps(at(10, 12), at(12, 14)); // false
 * overlaps(at(10, 12), at(11, 13)); // true
 * ```
 */
export function overlaps(a: Span, b: Span): boolean {
  return a.start.getTime() < b.end.getTime() && b.start.getTime() < a.end.getTime();
}

/**
 * Duration of an interval in hours. Zero for empty or inverted intervals.
 */
export function intervalHours(interval: Span): number {
  return Math.max(0, interval.end.getTime() - interval.start.getTime()) / HOUR_MS;
}
