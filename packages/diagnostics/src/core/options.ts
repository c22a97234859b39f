import { noneKeyMatcher } from "../adapters/matchers/composite-key-matchers"
import { FixedStringObfuscator } from "../adapters/obfuscators/obfuscators"
import type { DiagnosticsOptions } from "../ports/diagnostics-options"

export const DEFAULT_DIAGNOSTICS_OPTIONS: DiagnosticsOptions = Object.freeze({
  keyMatcher: noneKeyMatcher,
  obfuscator: new FixedStringObfuscator(),
})

export function createDiagnosticsOptions(
  overrides: Partial<DiagnosticsOptions> = {},
): DiagnosticsOptions {
  return Object.freeze({
    keyMatcher: overrides.keyMatcher ?? DEFAULT_DIAGNOSTICS_OPTIONS.keyMatcher,
    obfuscator: overrides.obfuscator ?? DEFAULT_DIAGNOSTICS_OPTIONS.obfuscator,
  })
}

let globalOptions: DiagnosticsOptions = DEFAULT_DIAGNOSTICS_OPTIONS

/**
 * Process-wide fallback used when a call site passes no options.
 * Prefer passing options explicitly.
 */
export function getGlobalOptions(): DiagnosticsOptions {
  return globalOptions
}

/** Last write wins. */
export function setGlobalOptions(options: DiagnosticsOptions): void {
  globalOptions = options
}

export function resetGlobalOptions(): void {
  globalOptions = DEFAULT_DIAGNOSTICS_OPTIONS
}
