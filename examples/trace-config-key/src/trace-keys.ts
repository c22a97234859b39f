import { type ConfigSource, loadProviderRoot } from "@keytrace/config"
import {
  logConfigurationKeySourceAsInformation,
  logConfigurationProvidersAsInformation,
  loadDiagnosticsOptions,
} from "@keytrace/diagnostics"
import type { Logger } from "@keytrace/logger"

export type TraceKeysOptions = {
  sources: ConfigSource[]
  keys: string[]
  compressed: boolean
  /** Where the CONFIG_DIAGNOSTICS_* keys are read from. @default [new EnvSource()] */
  diagnosticsSources?: ConfigSource[]
}

/**
 * Logs the provider list, then where each key comes from. Failures are logged
 * as fatal; returns whether the run succeeded.
 */
export async function traceKeys(logger: Logger, opts: TraceKeysOptions): Promise<boolean> {
  try {
    const root = await loadProviderRoot(opts.sources)
    const options = await loadDiagnosticsOptions({ sources: opts.diagnosticsSources })

    logConfigurationProvidersAsInformation(logger, root)

    for (const key of opts.keys) {
      logConfigurationKeySourceAsInformation(logger, root, key, opts.compressed, options)
    }

    return true
  } catch (err) {
    logger.fatal("Failed to trace configuration keys", { err })
    return false
  }
}
