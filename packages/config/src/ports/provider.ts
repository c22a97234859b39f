export type ProviderHit = {
  kind: "found"
  /** `null` when the provider holds the key with an explicit null value. */
  value: string | null
}

export type ProviderMiss = {
  kind: "missing"
}

export type ProviderLookup = ProviderHit | ProviderMiss

/**
 * One layer of configuration, queryable by key.
 *
 * Keys use `:` as the section delimiter (`Db:Password`).
 */
export interface ConfigProvider {
  tryGet(key: string): ProviderLookup

  /** Display identity, e.g. "dotenv:.env". */
  toString(): string
}

/**
 * Ordered set of providers for one configuration instance. Later providers
 * take precedence over earlier ones.
 */
export interface ProviderRoot {
  readonly providers: readonly ConfigProvider[]
}
