import type { ConfigSource } from "../../ports/source"
import { toSectionKeys } from "./section-keys"

export type EnvSourceOptions = {
  /** Only keys starting with this prefix are read; the prefix is stripped. */
  prefix?: string
  env?: Record<string, string | undefined>
  /**
   * Written in place of `:` in variable names (`"__"` maps `DB__HOST` to
   * `DB:HOST`). Off by default.
   */
  sectionDelimiter?: string
}

export class EnvSource implements ConfigSource {
  readonly name: string
  private readonly prefix?: string | undefined
  private readonly env: Record<string, string | undefined>
  private readonly sectionDelimiter?: string | undefined

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix
    this.env = options.env ?? process.env
    this.sectionDelimiter = options.sectionDelimiter
    this.name = this.prefix ? `env:${this.prefix}` : "env"
  }

  async load(): Promise<Record<string, unknown>> {
    if (!this.prefix) return toSectionKeys({ ...this.env }, this.sectionDelimiter)

    const filtered: Record<string, string | undefined> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (key.startsWith(this.prefix)) {
        filtered[key.slice(this.prefix.length)] = value
      }
    }

    return toSectionKeys(filtered, this.sectionDelimiter)
  }
}
