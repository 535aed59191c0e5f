import { daysTouched, isValidInstant } from "../datetime.utils.js";
import { ScheduleContractError } from "../errors.js";
import type { Candidate, Interval, IntervalCategory, WorkerScheduleSnapshot } from "../types.js";
import {
  ValidatorConfigSchema,
  type ResolvedValidatorConfig,
  type ValidatorConfig,
} from "./config.js";
import { dailyRestHours } from "./daily-duration.js";
import { overlaps } from "./overlap.js";
import type { ValidationResult } from "./validation.types.js";
import { ViolationReporterImpl, type ViolationReporter } from "./violation-reporter.js";

/**
 * Decides whether a candidate interval is admissible for one worker.
 *
 * Both operations are pure: they read the snapshot, never change it, and keep
 * no reference to it once they return.
 *
 * @category Validation
 */
export interface ConstraintValidator {
  readonly config: ResolvedValidatorConfig;
  /**
   * Checks a `REST` candidate against the worker's work intervals and the
   * daily rest budget of every day it touches.
   */
  validateRestCandidate(snapshot: WorkerScheduleSnapshot, candidate: Candidate): ValidationResult;
  /**
   * Checks a `WORK` candidate against the worker's rest intervals.
   */
  validateWorkCandidate(snapshot: WorkerScheduleSnapshot, candidate: Candidate): ValidationResult;
}

function assertCallContract(
  snapshot: WorkerScheduleSnapshot | null | undefined,
  candidate: Candidate | null | undefined,
  category: IntervalCategory,
): void {
  if (!snapshot) {
    throw new ScheduleContractError("A worker schedule snapshot is required", "MISSING_SNAPSHOT");
  }
  if (!candidate) {
    throw new ScheduleContractError("A candidate interval is required", "MISSING_CANDIDATE");
  }
  if (candidate.workerId !== undefined && candidate.workerId !== snapshot.workerId) {
    throw new ScheduleContractError(
      `Candidate belongs to worker "${candidate.workerId}" but the snapshot is for "${snapshot.workerId}"`,
      "WORKER_MISMATCH",
      { candidateWorkerId: candidate.workerId, snapshotWorkerId: snapshot.workerId },
    );
  }
  if (candidate.category !== category) {
    throw new ScheduleContractError(
      `Expected a ${category} candidate, got ${candidate.category}`,
      "CATEGORY_MISMATCH",
      { expected: category, actual: candidate.category },
    );
  }
}

/**
 * Reports every malformed endpoint. Returns false when the interval cannot be
 * checked further.
 */
function checkIntervalBounds(candidate: Interval, reporter: ViolationReporter): boolean {
  const startValid = isValidInstant(candidate.start);
  const endValid = isValidInstant(candidate.end);
  if (!startValid) reporter.reportInvalidInterval("invalid-start", candidate);
  if (!endValid) reporter.reportInvalidInterval("invalid-end", candidate);
  if (!startValid || !endValid) return false;

  if (candidate.end.getTime() <= candidate.start.getTime()) {
    reporter.reportInvalidInterval("end-not-after-start", candidate);
    return false;
  }
  return true;
}

function withoutRecord(intervals: readonly Interval[], excludeId: string | undefined) {
  if (excludeId === undefined) return intervals;
  return intervals.filter((interval) => interval.id !== excludeId);
}

function reportOverlaps(
  candidate: Interval,
  existing: readonly Interval[],
  reporter: ViolationReporter,
): void {
  for (const interval of existing) {
    if (overlaps(candidate, interval)) reporter.reportOverlap(interval);
  }
}

/**
 * Creates a validator for rest and work candidates.
 *
 * Every applicable check runs, so the result lists all problems at once. A
 * candidate whose bounds are malformed is rejected with `invalid-interval`
 * violations only, since no other check is meaningful for it.
 *
 * @param config - See {@link ValidatorConfig}
 * @throws {z.ZodError} when the config is invalid
 * @example
 * ```ts
 * const validator = createConstraintValidator({ dailyRestBudgetHours: 2 });
 * const result = validator.validateRestCandidate(snapshot, {
 *   start: new Date("2025-03-03T18:00:00Z"),
 *   end: new Date("2025-03-03T20:00:00Z"),
 *   category: "REST",
 * });
 * if (!result.accepted) console.log(result.violations.map((v) => v.message));
 * ```
 */
export function createConstraintValidator(config: ValidatorConfig = {}): ConstraintValidator {
  const parsed = ValidatorConfigSchema.parse(config);
  const { dailyRestBudgetHours, forbidOverlappingRest, dayScale } = parsed;

  return {
    config: parsed,

    validateRestCandidate(snapshot, candidate) {
      assertCallContract(snapshot, candidate, "REST");
      const reporter = new ViolationReporterImpl();
      if (!checkIntervalBounds(candidate, reporter)) return reporter.getResult();

      reportOverlaps(candidate, withoutRecord(snapshot.workIntervals, candidate.excludeId), reporter);

      const otherRest = withoutRecord(snapshot.restIntervals, candidate.excludeId);
      for (const day of daysTouched(candidate, dayScale)) {
        const totalHours = dailyRestHours(day, otherRest, candidate);
        if (totalHours > dailyRestBudgetHours) {
          reporter.reportDailyBudgetExceeded({
            day: day.label,
            dayStart: day.start,
            totalHours,
            budgetHours: dailyRestBudgetHours,
          });
        }
      }

      if (forbidOverlappingRest) {
        reportOverlaps(candidate, otherRest, reporter);
      }

      return reporter.getResult();
    },

    validateWorkCandidate(snapshot, candidate) {
      assertCallContract(snapshot, candidate, "WORK");
      const reporter = new ViolationReporterImpl();
      if (!checkIntervalBounds(candidate, reporter)) return reporter.getResult();

      reportOverlaps(candidate, withoutRecord(snapshot.restIntervals, candidate.excludeId), reporter);

      return reporter.getResult();
    },
  };
}
