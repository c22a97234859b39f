export { BaseError, type BaseErrorOptions, type SerializeOptions, serializeError } from "./core/base-error"
export { createError } from "./core/create-error"
export type {
  AppError,
  ErrorCode,
  ErrorContext,
  KeytraceErrorCode,
  SerializedError,
} from "./ports/error"
