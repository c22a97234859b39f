import type { ProviderRoot } from "@keytrace/config"
import type { LogLevelName } from "@keytrace/logger"
import type { DiagnosticsOptions } from "../ports/diagnostics-options"
import type { LogSink } from "../ports/log-sink"
import { buildProvidersReport, buildReport } from "./key-source-report"

/**
 * Logs which providers supply `key`. The entry carries the key as
 * `configKey`.
 *
 * @param compressed - skip providers that have no value for the key
 * @param options - falls back to the global options
 */
export function logConfigurationKeySource(
  sink: LogSink,
  level: LogLevelName,
  root: ProviderRoot,
  key: string,
  compressed = false,
  options?: DiagnosticsOptions,
): void {
  sink.log(level, buildReport(root.providers, key, compressed, options), { configKey: key })
}

export function logConfigurationKeySourceAsTrace(
  sink: LogSink,
  root: ProviderRoot,
  key: string,
  compressed = false,
  options?: DiagnosticsOptions,
): void {
  logConfigurationKeySource(sink, "trace", root, key, compressed, options)
}

export function logConfigurationKeySourceAsDebug(
  sink: LogSink,
  root: ProviderRoot,
  key: string,
  compressed = false,
  options?: DiagnosticsOptions,
): void {
  logConfigurationKeySource(sink, "debug", root, key, compressed, options)
}

export function logConfigurationKeySourceAsInformation(
  sink: LogSink,
  root: ProviderRoot,
  key: string,
  compressed = false,
  options?: DiagnosticsOptions,
): void {
  logConfigurationKeySource(sink, "info", root, key, compressed, options)
}

export function logConfigurationProviders(
  sink: LogSink,
  level: LogLevelName,
  root: ProviderRoot,
): void {
  sink.log(level, buildProvidersReport(root.providers))
}

export function logConfigurationProvidersAsInformation(sink: LogSink, root: ProviderRoot): void {
  logConfigurationProviders(sink, "info", root)
}
