import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options define *policy*, not behavior:
 * - which log levels are emitted
 * - how logs are rendered for humans vs machines
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   * Any log entries below this level are ignored.
   */
  level: LogLevelName

  /**
   * Whether to pretty-print log output through pino-pretty.
   *
   * @remarks
   * Intended for local development. Ignored when an explicit destination
   * stream is supplied.
   */
  prettify?: boolean
}
