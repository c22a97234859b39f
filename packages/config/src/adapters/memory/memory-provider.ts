import type { ConfigProvider, ProviderLookup } from "../../ports/provider"

/**
 * Provider over a fixed map of keys. Lookups are exact-match.
 */
export class MemoryProvider implements ConfigProvider {
  private readonly values: ReadonlyMap<string, string | null>

  constructor(
    readonly name: string,
    values: Record<string, string | null> = {},
  ) {
    this.values = new Map(Object.entries(values))
  }

  tryGet(key: string): ProviderLookup {
    if (!this.values.has(key)) return { kind: "missing" }

    return { kind: "found", value: this.values.get(key) ?? null }
  }

  toString(): string {
    return this.name
  }
}
