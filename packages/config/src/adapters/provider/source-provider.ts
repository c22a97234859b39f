import { flattenValues } from "../../core/flatten"
import type { ConfigProvider, ProviderLookup } from "../../ports/provider"

type Entry = { value: string | null }

/**
 * Provider over a snapshot of one source's loaded values.
 *
 * Lookups are case-insensitive. If a source holds the same key in two casings,
 * the one seen last wins.
 */
export class SourceProvider implements ConfigProvider {
  private readonly entries = new Map<string, Entry>()

  constructor(
    readonly name: string,
    values: Record<string, unknown>,
  ) {
    for (const [key, value] of flattenValues(values)) {
      this.entries.set(key.toLowerCase(), { value })
    }
  }

  tryGet(key: string): ProviderLookup {
    const entry = this.entries.get(key.toLowerCase())
    if (!entry) return { kind: "missing" }

    return { kind: "found", value: entry.value }
  }

  toString(): string {
    return this.name
  }
}
