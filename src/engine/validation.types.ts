import type { Interval } from "../types.js";

// =============================================================================
// Violations - reasons a candidate is not admissible
// =============================================================================

export interface InvalidIntervalViolation {
  readonly id: string;
  readonly type: "invalid-interval";
  /** Which part of the interval is malformed. */
  readonly reason: InvalidIntervalReason;
  readonly message: string;
}

export type InvalidIntervalReason = "invalid-start" | "invalid-end" | "end-not-after-start";

/**
 * The candidate intersects an existing interval of the same worker.
 *
 * For rest candidates the conflicting interval is a work assignment (or,
 * when overlapping rest is forbidden, another rest interval); for work
 * candidates it is a rest interval.
 */
export interface OverlapViolation {
  readonly id: string;
  readonly type: "overlap";
  readonly conflictingInterval: Interval;
  readonly message: string;
}

export interface DailyBudgetExceededViolation {
  readonly id: string;
  readonly type: "daily-budget-exceeded";
  /** Calendar label of the day (YYYY-MM-DD in the configured day scale). */
  readonly day: string;
  readonly dayStart: Date;
  /** Rest hours on that day including the candidate. */
  readonly totalHours: number;
  readonly budgetHours: number;
  readonly message: string;
}

export type Violation = InvalidIntervalViolation | OverlapViolation | DailyBudgetExceededViolation;

export type ViolationType = Violation["type"];

// =============================================================================
// Complete validation result
// =============================================================================

/**
 * Outcome of validating one candidate.
 *
 * `violations` lists every failed check in the order the checks ran;
 * `accepted` is true exactly when it is empty.
 *
 * @category Validation
 */
export interface ValidationResult {
  readonly accepted: boolean;
  readonly violations: readonly Violation[];
}
