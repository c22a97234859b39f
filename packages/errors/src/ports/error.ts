export type ErrorCode = Lowercase<string>

/**
 * Codes raised by the keytrace packages themselves.
 *
 * Report outcomes such as "key not found" or "no providers" are never errors;
 * only misconfiguration of the tooling ends up here.
 */
export type KeytraceErrorCode =
  | "invalid_key_pattern"
  | "config_validation_failed"
  | "config_source_failed"

/**
 * Structured metadata attached to errors (pattern, source name, key, ...).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /**
   * `true` for expected failures caused by input (a bad pattern, an invalid
   * option value), `false` for invariant violations.
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape, suitable for log metadata.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
