import { pino, type Logger, type LoggerOptions } from "pino";

export type { Logger } from "pino";

/**
 * Creates the package logger.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: process.env.LOG_LEVEL ?? "info" });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({ name: "shiftguard", ...options });
}

/** A logger that discards everything. Default for components given none. */
export function silentLogger(): Logger {
  return createLogger({ level: "silent" });
}
