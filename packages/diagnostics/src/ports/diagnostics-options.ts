import type { KeyMatcher } from "./key-matcher"
import type { Obfuscator } from "./obfuscator"

export type DiagnosticsOptions = Readonly<{
  keyMatcher: KeyMatcher
  obfuscator: Obfuscator
}>
