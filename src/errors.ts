/**
 * Error thrown when the validator is called in a way its contract forbids.
 *
 * These are programming errors on the caller's side (a missing snapshot, a
 * candidate for another worker, a candidate of the wrong category), never
 * business-rule outcomes: those are returned as violations.
 *
 * @category Errors
 */
export class ScheduleContractError extends Error {
  public readonly code: ScheduleContractErrorCode;
  public readonly details: Readonly<Record<string, unknown>>;

  constructor(
    message: string,
    code: ScheduleContractErrorCode,
    details: Readonly<Record<string, unknown>> = {},
  ) {
    super(message);
    this.name = "ScheduleContractError";
    this.code = code;
    this.details = details;
  }
}

export type ScheduleContractErrorCode =
  | "MISSING_SNAPSHOT"
  | "MISSING_CANDIDATE"
  | "WORKER_MISMATCH"
  | "CATEGORY_MISMATCH"
  | "INVALID_DAY_SCALE";
