import { formatIsoRange } from "../datetime.utils.js";
import type { Interval } from "../types.js";
import type {
  DailyBudgetExceededViolation,
  InvalidIntervalReason,
  OverlapViolation,
  ValidationResult,
  Violation,
} from "./validation.types.js";

export interface ViolationReporter {
  reportInvalidInterval(reason: InvalidIntervalReason, interval: Interval): void;
  reportOverlap(conflictingInterval: Interval): void;
  reportDailyBudgetExceeded(
    exceeded: Omit<DailyBudgetExceededViolation, "type" | "id" | "message">,
  ): void;

  getResult(): ValidationResult;
}

/**
 * Deterministic ID for an overlap violation.
 * Format: overlap:{category}:{interval id, or start/end when unsaved}
 */
function overlapId(interval: Interval): string {
  return ["overlap", interval.category, interval.id ?? formatIsoRange(interval)].join(":");
}

function formatHours(hours: number): string {
  return String(Number(hours.toFixed(2)));
}

function describeInterval(interval: Interval): string {
  const range = formatIsoRange(interval);
  return interval.id
    ? `${interval.category} interval ${interval.id} (${range})`
    : `${interval.category} interval ${range}`;
}

const INVALID_INTERVAL_MESSAGES: Record<InvalidIntervalReason, (interval: Interval) => string> = {
  "invalid-start": () => "Interval start is not a valid instant",
  "invalid-end": () => "Interval end is not a valid instant",
  "end-not-after-start": (interval) =>
    `Interval end ${interval.end.toISOString()} must be after its start ${interval.start.toISOString()}`,
};

/**
 * Collects violations for one validation call, in the order they are reported.
 */
export class ViolationReporterImpl implements ViolationReporter {
  #violations: Violation[] = [];

  reportInvalidInterval(reason: InvalidIntervalReason, interval: Interval): void {
    this.#violations.push({
      id: `invalid-interval:${reason}`,
      type: "invalid-interval",
      reason,
      message: INVALID_INTERVAL_MESSAGES[reason](interval),
    });
  }

  reportOverlap(conflictingInterval: Interval): void {
    const violation: OverlapViolation = {
      id: overlapId(conflictingInterval),
      type: "overlap",
      conflictingInterval,
      message: `Overlaps ${describeInterval(conflictingInterval)}`,
    };
    this.#violations.push(violation);
  }

  reportDailyBudgetExceeded(
    exceeded: Omit<DailyBudgetExceededViolation, "type" | "id" | "message">,
  ): void {
    this.#violations.push({
      id: `daily-budget-exceeded:${exceeded.day}`,
      type: "daily-budget-exceeded",
      ...exceeded,
      message: `Rest on ${exceeded.day} totals ${formatHours(exceeded.totalHours)}h, over the ${formatHours(exceeded.budgetHours)}h daily budget`,
    });
  }

  getResult(): ValidationResult {
    return {
      accepted: this.#violations.length === 0,
      violations: [...this.#violations],
    };
  }
}
