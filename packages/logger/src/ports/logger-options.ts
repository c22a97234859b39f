import type { LogLevelName } from "./log-level"

/**
 * Policy for a Logger instance; adapters decide how to honor it.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit. "info" suppresses "trace" and "debug".
   */
  level: LogLevelName

  /**
   * Human-readable output for local development. Leave off where logs are
   * shipped as JSON.
   */
  prettify?: boolean
}
