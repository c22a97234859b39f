import type { KeyMatcher } from "../../ports/key-matcher"
import { RegexKeyMatcher } from "./regex-key-matcher"

export const noneKeyMatcher: KeyMatcher = {
  matches: () => false,
}

export function anyKeyMatcher(...matchers: KeyMatcher[]): KeyMatcher {
  return {
    matches: (key) => matchers.some((m) => m.matches(key)),
  }
}

/**
 * Fragments that usually mark a secret. Keys containing any of them, in any
 * case, are treated as sensitive by `sensitiveKeyMatcher`.
 */
export const DEFAULT_SENSITIVE_KEY_PATTERNS = [
  "password",
  "secret",
  "token",
  "api_?key",
  "connectionstring",
] as const

export const sensitiveKeyMatcher: KeyMatcher = new RegexKeyMatcher(DEFAULT_SENSITIVE_KEY_PATTERNS)
