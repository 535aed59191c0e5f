import type { Candidate, Interval, StoredInterval, WorkerScheduleSnapshot } from "../src/types.js";

/** The day most scenarios take place on. */
export const DAY = "2025-03-03";

/**
 * Parses `"HH:mm"` on {@link DAY}, or a full `"YYYY-MM-DDTHH:mm"`, as UTC.
 */
export function utc(value: string): Date {
  const local = value.includes("T") ? value : `${DAY}T${value}`;
  return new Date(`${local}:00.000Z`);
}

export function rest(id: string, start: string, end: string): StoredInterval {
  return { id, start: utc(start), end: utc(end), category: "REST" };
}

export function work(id: string, start: string, end: string): StoredInterval {
  return { id, start: utc(start), end: utc(end), category: "WORK" };
}

export function restCandidate(
  start: string,
  end: string,
  extra: Partial<Omit<Candidate, "start" | "end" | "category">> = {},
): Candidate {
  return { ...extra, start: utc(start), end: utc(end), category: "REST" };
}

export function workCandidate(
  start: string,
  end: string,
  extra: Partial<Omit<Candidate, "start" | "end" | "category">> = {},
): Candidate {
  return { ...extra, start: utc(start), end: utc(end), category: "WORK" };
}

export function snapshotOf(
  intervals: readonly Interval[],
  workerId: string = "alice",
): WorkerScheduleSnapshot {
  return {
    workerId,
    restIntervals: intervals.filter((interval) => interval.category === "REST"),
    workIntervals: intervals.filter((interval) => interval.category === "WORK"),
  };
}
