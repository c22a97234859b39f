export {
  anyKeyMatcher,
  DEFAULT_SENSITIVE_KEY_PATTERNS,
  noneKeyMatcher,
  sensitiveKeyMatcher,
} from "./adapters/matchers/composite-key-matchers"
export { RegexKeyMatcher, type RegexKeyMatcherOptions } from "./adapters/matchers/regex-key-matcher"
export {
  DEFAULT_REDACTED_TEXT,
  FixedStringObfuscator,
  MaskObfuscator,
  type MaskObfuscatorOptions,
  PlainTextObfuscator,
} from "./adapters/obfuscators/obfuscators"
export { buildNoProvidersReport, buildProvidersReport, buildReport } from "./core/key-source-report"
export {
  type DiagnosticsEnv,
  diagnosticsEnvSchema,
  type LoadDiagnosticsOptionsOptions,
  loadDiagnosticsOptions,
  mapEnvToOptions,
} from "./core/load-options"
export {
  logConfigurationKeySource,
  logConfigurationKeySourceAsDebug,
  logConfigurationKeySourceAsInformation,
  logConfigurationKeySourceAsTrace,
  logConfigurationProviders,
  logConfigurationProvidersAsInformation,
} from "./core/log-key-source"
export {
  createDiagnosticsOptions,
  DEFAULT_DIAGNOSTICS_OPTIONS,
  getGlobalOptions,
  resetGlobalOptions,
  setGlobalOptions,
} from "./core/options"
export {
  formatPlaceholder,
  type LeadingDigitPolicy,
  type PlaceholderOptions,
  placeholder,
} from "./core/placeholder"
export type { DiagnosticsOptions } from "./ports/diagnostics-options"
export type { KeyMatcher } from "./ports/key-matcher"
export type { LogSink } from "./ports/log-sink"
export type { Obfuscator } from "./ports/obfuscator"
