import type { ConfigProvider } from "@keytrace/config"
import type { DiagnosticsOptions } from "../ports/diagnostics-options"
import { getGlobalOptions } from "./options"

const LINE_BREAK = "\n"

export function buildNoProvidersReport(key: string): string {
  return `Cannot track ${key}. No configuration providers found.`
}

/**
 * Describes which providers hold a value for `key`, in provider order.
 *
 * Each provider is queried once. When the key is sensitive every value is
 * replaced by the obfuscator's output; otherwise values are quoted. With
 * `compressed`, providers without a value are left out.
 *
 * @example
 * ```text
 * Provider sources for value of Db:Host
 * * json:appsettings.json ==> null
 * * env ==> "srv1"
 * ```
 */
export function buildReport(
  providers: readonly ConfigProvider[],
  key: string,
  compressed: boolean,
  options: DiagnosticsOptions = getGlobalOptions(),
): string {
  if (providers.length === 0) return buildNoProvidersReport(key)

  const obfuscate = options.keyMatcher.matches(key)
  let report = `Provider sources for value of ${key}`
  let found = false

  for (const provider of providers) {
    const lookup = provider.tryGet(key)

    if (lookup.kind === "found") {
      found = true
      const shown = obfuscate
        ? options.obfuscator.obfuscate(lookup.value)
        : `"${lookup.value ?? ""}"`
      report += `${LINE_BREAK}* ${provider} ==> ${shown}`
    } else if (!compressed) {
      report += `${LINE_BREAK}* ${provider} ==> null`
    }
  }

  if (!found) {
    report += compressed ? " were not found." : `${LINE_BREAK}${key} not found in any provider.`
  }

  return report
}

/**
 * Lists provider identities in precedence order (last one wins).
 */
export function buildProvidersReport(providers: readonly ConfigProvider[]): string {
  if (providers.length === 0) return "No configuration providers found."

  return ["Configuration providers:", ...providers.map((p) => `* ${p}`)].join(LINE_BREAK)
}
