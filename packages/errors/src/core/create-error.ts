import type { KeytraceErrorCode } from "../ports/error"
import { BaseError, type BaseErrorOptions } from "./base-error"

/**
 * @example
 * ```ts
 * throw createError("invalid_key_pattern", "Invalid key pattern", {
 *   context: { pattern: "(" },
 * })
 * ```
 */
export function createError<C extends KeytraceErrorCode>(
  code: C,
  message: string,
  options?: Omit<BaseErrorOptions<C>, "code">,
): BaseError<C> {
  return new BaseError(message, { code, ...options })
}
