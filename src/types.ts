/**
 * Core interval types shared by the validation engine and the admission layer.
 *
 * @packageDocumentation
 */

import * as z from "zod";

// ============================================================================
// Interval Primitives
// ============================================================================

/**
 * What an interval records for a worker: time off (`REST`) or an assignment (`WORK`).
 */
export type IntervalCategory = "REST" | "WORK";

/**
 * Zod schema for {@link IntervalCategory}.
 */
export const IntervalCategorySchema = z.union([z.literal("REST"), z.literal("WORK")]);

/**
 * A half-open time span `[start, end)` tagged with its category.
 *
 * `id` identifies a persisted record. Candidates for new records have none.
 *
 * @example
 * ```typescript
 * const lunch: Interval = {
 *   id: "rest-42",
 *   start: new Date("2025-03-03T12:00:00Z"),
 *   end: new Date("2025-03-03T12:30:00Z"),
 *   category: "REST",
 * };
 * ```
 */
export interface Interval {
  readonly id?: string;
  readonly start: Date;
  readonly end: Date;
  readonly category: IntervalCategory;
}

/**
 * An interval that has been persisted and therefore carries an id.
 */
export interface StoredInterval extends Interval {
  readonly id: string;
}

// ============================================================================
// Snapshot & Candidate
// ============================================================================

/**
 * The existing intervals of a single worker, supplied for one validation call.
 *
 * Only intervals belonging to `workerId` may appear here; the engine never
 * looks beyond the snapshot it is given.
 */
export interface WorkerScheduleSnapshot {
  readonly workerId: string;
  readonly restIntervals: readonly Interval[];
  readonly workIntervals: readonly Interval[];
}

/**
 * The interval under evaluation.
 *
 * - `excludeId` (optional): id of the existing record being edited, left out of
 *   every comparison so it is not counted against itself
 * - `workerId` (optional): when present, must match the snapshot's worker
 */
export interface Candidate extends Interval {
  readonly excludeId?: string;
  readonly workerId?: string;
}

// ============================================================================
// Boundary parsing
// ============================================================================

/**
 * Accepts an ISO-8601 string (with `Z` or an explicit offset) or a `Date`.
 */
const instantSchema = z.union([z.date(), z.iso.datetime({ offset: true })]).transform(
  (value) => (value instanceof Date ? value : new Date(value)),
);

/**
 * Zod schema for intervals arriving from outside the process (request bodies,
 * queue messages, rows).
 *
 * Ordering of `start` and `end` is not checked here: the validator reports it
 * as an `invalid-interval` violation so it reaches the caller with the rest.
 */
export const IntervalSchema = z.object({
  id: z.string().min(1).optional(),
  start: instantSchema,
  end: instantSchema,
  category: IntervalCategorySchema,
});

/**
 * Zod schema for a {@link Candidate}.
 */
export const CandidateSchema = IntervalSchema.extend({
  excludeId: z.string().min(1).optional(),
  workerId: z.string().min(1).optional(),
});

export type IntervalInput = z.input<typeof IntervalSchema>;
export type CandidateInput = z.input<typeof CandidateSchema>;

/**
 * Parses an external interval payload.
 *
 * @throws {z.ZodError} when a field is missing or malformed
 */
export function parseInterval(input: unknown): Interval {
  return IntervalSchema.parse(input);
}

/**
 * Parses an external candidate payload.
 *
 * @throws {z.ZodError} when a field is missing or malformed
 */
export function parseCandidate(input: unknown): Candidate {
  return CandidateSchema.parse(input);
}
