/**
 * Admissibility checks for worker rest and work intervals.
 *
 * Given one worker's existing rest and work intervals, shiftguard decides
 * whether a proposed interval may be added, and reports every reason it may
 * not.
 *
 * @remarks
 * ## Core Concepts
 *
 * **Intervals** are half-open spans `[start, end)` on absolute instants,
 * tagged `REST` or `WORK`. Back-to-back intervals do not overlap. Normalize
 * time zones before building intervals; the engine only sees instants.
 *
 * **Rules**:
 * - a rest interval must not overlap the worker's work intervals
 * - rest per day, including the candidate, must not exceed a budget
 *   (2 hours by default); intervals crossing midnight count towards each
 *   day they touch
 * - a work interval must not overlap the worker's rest intervals
 * - optionally, rest intervals must not overlap each other
 *
 * **Snapshots** hold one worker's intervals. The validator is pure: it never
 * fetches, stores or remembers anything. {@link IntervalAdmissionService}
 * wraps it with a per-worker lock and a {@link ScheduleStore} so concurrent
 * submissions for the same worker are validated one at a time.
 *
 * @example Validate a rest candidate
 * ```typescript
 * import { createConstraintValidator } from "shiftguard";
 *
 * const validator = createConstraintValidator({ dailyRestBudgetHours: 2 });
 * const result = validator.validateRestCandidate(
 *   {
 *     workerId: "alice",
 *     restIntervals: [
 *       { id: "r1", start: new Date("2025-03-03T07:00:00Z"), end: new Date("2025-03-03T07:30:00Z"), category: "REST" },
 *     ],
 *     workIntervals: [],
 *   },
 *   { start: new Date("2025-03-03T18:00:00Z"), end: new Date("2025-03-03T20:00:00Z"), category: "REST" },
 * );
 * // result.accepted === false
 * // result.violations[0].type === "daily-budget-exceeded", totalHours === 2.5
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Interval primitives
// ============================================================================

export type {
  Interval,
  IntervalCategory,
  StoredInterval,
  WorkerScheduleSnapshot,
  Candidate,
  IntervalInput,
  CandidateInput,
} from "./types.js";

export {
  IntervalCategorySchema,
  IntervalSchema,
  CandidateSchema,
  parseInterval,
  parseCandidate,
} from "./types.js";

// ============================================================================
// Days
// ============================================================================

export type { DayScale, DayBucket } from "./datetime.utils.js";

export { utcDayScale, localDayScale, dayBucketFor, daysTouched } from "./datetime.utils.js";

// ============================================================================
// Errors
// ============================================================================

export { ScheduleContractError } from "./errors.js";

export type { ScheduleContractErrorCode } from "./errors.js";

// ============================================================================
// Validation engine
// ============================================================================

export { overlaps, intervalHours } from "./engine/overlap.js";

export { dailyRestHours } from "./engine/daily-duration.js";

export { createConstraintValidator } from "./engine/constraint-validator.js";

export type { ConstraintValidator } from "./engine/constraint-validator.js";

export { ValidatorConfigSchema, readValidatorConfigFromEnv } from "./engine/config.js";

export type { ValidatorConfig, ResolvedValidatorConfig } from "./engine/config.js";

export type {
  Violation,
  ViolationType,
  InvalidIntervalViolation,
  InvalidIntervalReason,
  OverlapViolation,
  DailyBudgetExceededViolation,
  ValidationResult,
} from "./engine/validation.types.js";

// ============================================================================
// Admission
// ============================================================================

export { IntervalAdmissionService } from "./admission/admission-service.js";

export type {
  AdmissionOutcome,
  IntervalAdmissionServiceOptions,
} from "./admission/admission-service.js";

export { InMemoryScheduleStore } from "./admission/schedule-store.js";

export type { ScheduleStore } from "./admission/schedule-store.js";

export { WorkerLock } from "./admission/worker-lock.js";

// ============================================================================
// Logging
// ============================================================================

export { createLogger, silentLogger } from "./logger.js";

export type { Logger } from "./logger.js";
