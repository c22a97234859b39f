/**
 * A source of configuration values.
 *
 * A ConfigSource only *loads* raw configuration. It does not validate, coerce
 * or merge. Sources are applied in order; later sources override earlier ones.
 */
export interface ConfigSource {
  /**
   * Human-readable name, used for provenance and as the display identity of
   * the provider built from this source.
   * Example: "env", "dotenv:.env.defaults", "json:appsettings.json"
   */
  readonly name: string

  /**
   * Load configuration values.
   *
   * - Env/dotenv sources return flat string values
   * - JSON sources may return nested objects
   * - `undefined` for a key means "value not provided"
   */
  load(): Promise<Record<string, unknown>>
}
