import * as z from "zod";
import { localDayScale, utcDayScale, type DayScale } from "../datetime.utils.js";

const DayScaleSchema = z.custom<DayScale>(
  (value) =>
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string" &&
    "startOfDay" in value &&
    typeof value.startOfDay === "function" &&
    "label" in value &&
    typeof value.label === "function",
  { error: "dayScale must provide name, startOfDay() and label()" },
);

export const ValidatorConfigSchema = z.object({
  dailyRestBudgetHours: z.number().positive().default(2),
  forbidOverlappingRest: z.boolean().default(false),
  dayScale: DayScaleSchema.default(utcDayScale),
});

/**
 * Configuration for {@link createConstraintValidator}.
 *
 * - `dailyRestBudgetHours` (default `2`): rest hours allowed per day; a day is
 *   over budget when its total is strictly greater
 * - `forbidOverlappingRest` (default `false`): also reject rest candidates that
 *   overlap the worker's other rest intervals
 * - `dayScale` (default {@link utcDayScale}): where days start
 */
export type ValidatorConfig = z.input<typeof ValidatorConfigSchema>;

export type ResolvedValidatorConfig = z.output<typeof ValidatorConfigSchema>;

const DAY_SCALES = {
  utc: utcDayScale,
  local: localDayScale,
} as const satisfies Record<string, DayScale>;

const ValidatorEnvSchema = z.object({
  SHIFTGUARD_DAILY_REST_BUDGET_HOURS: z.coerce.number().positive().optional(),
  SHIFTGUARD_FORBID_OVERLAPPING_REST: z
    .enum(["true", "false"])
    .transform((value) => value === "true")
    .optional(),
  SHIFTGUARD_DAY_SCALE: z.enum(["utc", "local"]).optional(),
});

/**
 * Reads validator settings from environment variables. Unset variables keep
 * their defaults.
 *
 * @throws {z.ZodError} when a variable is set to an unusable value
 * @example
 * ```ts
 * const validator = createConstraintValidator(readValidatorConfigFromEnv(process.env));
 * ```
 */
export function readValidatorConfigFromEnv(
  env: Readonly<Record<string, string | undefined>>,
): ValidatorConfig {
  const parsed = ValidatorEnvSchema.parse(env);
  const scaleName = parsed.SHIFTGUARD_DAY_SCALE;
  return {
    dailyRestBudgetHours: parsed.SHIFTGUARD_DAILY_REST_BUDGET_HOURS,
    forbidOverlappingRest: parsed.SHIFTGUARD_FORBID_OVERLAPPING_REST,
    dayScale: scaleName ? DAY_SCALES[scaleName] : undefined,
  };
}
