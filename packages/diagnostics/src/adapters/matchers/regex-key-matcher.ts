import { createError } from "@keytrace/errors"
import type { KeyMatcher } from "../../ports/key-matcher"

export type RegexKeyMatcherOptions = {
  /**
   * Applies to string patterns only; RegExp patterns keep their own flags.
   * @default true
   */
  ignoreCase?: boolean
}

function compile(pattern: string, flags: string): RegExp {
  try {
    return new RegExp(pattern, flags)
  } catch (err) {
    throw createError("invalid_key_pattern", `Invalid key pattern: ${pattern}`, {
      context: { pattern },
      cause: err,
    })
  }
}

/**
 * Matches a key when any of the patterns finds it.
 *
 * Global and sticky flags are dropped from RegExp patterns so `test()` never
 * depends on `lastIndex`.
 */
export class RegexKeyMatcher implements KeyMatcher {
  private readonly patterns: readonly RegExp[]

  constructor(patterns: ReadonlyArray<string | RegExp>, options: RegexKeyMatcherOptions = {}) {
    const flags = (options.ignoreCase ?? true) ? "i" : ""

    this.patterns = patterns.map((p) =>
      typeof p === "string" ? compile(p, flags) : new RegExp(p.source, p.flags.replace(/[gy]/g, "")),
    )
  }

  matches(key: string): boolean {
    return this.patterns.some((p) => p.test(key))
  }
}
