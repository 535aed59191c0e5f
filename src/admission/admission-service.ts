import type { ConstraintValidator } from "../engine/constraint-validator.js";
import type { Violation } from "../engine/validation.types.js";
import { ScheduleContractError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { Candidate, StoredInterval } from "../types.js";
import type { ScheduleStore } from "./schedule-store.js";
import { WorkerLock } from "./worker-lock.js";

/**
 * Result of {@link IntervalAdmissionService.submit}.
 *
 * @category Admission
 */
export type AdmissionOutcome =
  | { readonly accepted: true; readonly interval: StoredInterval }
  | { readonly accepted: false; readonly violations: readonly Violation[] };

export interface IntervalAdmissionServiceOptions {
  store: ScheduleStore;
  validator: ConstraintValidator;
  /** Share one lock between services writing to the same store. */
  lock?: WorkerLock;
  logger?: Logger;
}

/**
 * Validates and persists candidate intervals, one worker at a time.
 *
 * Loading the snapshot, validating against it and saving the accepted
 * candidate happen under a per-worker lock, so two submissions for the same
 * worker never validate against a snapshot missing the other's record.
 * Submissions for different workers proceed in parallel.
 *
 * @category Admission
 * @example
 * ```ts
 * const service = new IntervalAdmissionService({
 *   store: new InMemoryScheduleStore(),
 *   validator: createConstraintValidator(),
 * });
 * const outcome = await service.submit("worker-1", {
 *   start: new Date("2025-03-03T12:00:00Z"),
 *   end: new Date("2025-03-03T12:30:00Z"),
 *   category: "REST",
 * });
 * ```
 */
export class IntervalAdmissionService {
  #store: ScheduleStore;
  #validator: ConstraintValidator;
  #lock: WorkerLock;
  #logger: Logger;

  constructor(options: IntervalAdmissionServiceOptions) {
    this.#store = options.store;
    this.#validator = options.validator;
    this.#lock = options.lock ?? new WorkerLock();
    this.#logger = options.logger ?? silentLogger();
  }

  /**
   * Admits `candidate` for `workerId` when it passes validation.
   *
   * Pass `excludeId` (or `id`) on the candidate to update an existing record in
   * place; that record is left out of validation.
   * Store failures and contract errors reject the returned promise.
   */
  async submit(workerId: string, candidate: Candidate): Promise<AdmissionOutcome> {
    if (!candidate) {
      throw new ScheduleContractError("A candidate interval is required", "MISSING_CANDIDATE");
    }
    // The record saved under `id` is the one being replaced.
    const recordId = candidate.excludeId ?? candidate.id;
    const log = this.#logger.child({ workerId, category: candidate.category });

    return this.#lock.runExclusive(workerId, async (): Promise<AdmissionOutcome> => {
      log.debug({ excludeId: recordId }, "validating candidate interval");

      const snapshot = await this.#store.loadSnapshot(workerId);
      const scoped: Candidate = {
        ...candidate,
        excludeId: recordId,
        workerId: candidate.workerId ?? workerId,
      };
      const result =
        scoped.category === "REST"
          ? this.#validator.validateRestCandidate(snapshot, scoped)
          : this.#validator.validateWorkCandidate(snapshot, scoped);

      if (!result.accepted) {
        log.warn(
          { violations: result.violations.map((violation) => violation.id) },
          "candidate interval rejected",
        );
        return { accepted: false, violations: result.violations };
      }

      const interval = await this.#store.saveInterval(workerId, {
        id: recordId,
        start: candidate.start,
        end: candidate.end,
        category: candidate.category,
      });
      log.info({ intervalId: interval.id }, "candidate interval admitted");
      return { accepted: true, interval };
    });
  }
}
