import type { ProviderRoot } from "./provider"

/**
 * Validated configuration plus the provenance of every value.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({
 *     DB_HOST: z.string(),
 *     DB_PASSWORD: z.string(),
 *   }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("DB_HOST")     // "srv1"
 * config.explain("DB_HOST") // "env"
 * config.providers          // [dotenv:.env, env]
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> extends ProviderRoot {
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  keys(): (keyof T & string)[]

  /**
   * Name of the source that provided the final value for `key`, or "default"
   * when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of all sources that contributed at least one value. */
  sourcesUsed(): string[]

  /** Keys present in sources but absent from the schema. */
  unknownKeys(): string[]
}
