import { createError } from "@keytrace/errors"
import type { ConfigSource } from "../../ports/source"
import { type FileSourceOptions, readConfigFile } from "../file/read-config-file"

export type JsonSourceOptions = FileSourceOptions

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v)
}

/**
 * Nested sections flatten into `:`-delimited keys once wrapped in a provider,
 * so `{ "Db": { "Host": "srv1" } }` answers for `Db:Host`.
 */
export class JsonSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: JsonSourceOptions) {
    this.name = `json:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const content = await readConfigFile(this.opts)
    if (content === undefined) return {}

    const parsed: unknown = JSON.parse(content)

    if (!isRecord(parsed)) {
      throw createError("config_source_failed", `JSON source ${this.opts.file} must contain an object`, {
        context: { source: this.name },
      })
    }

    return parsed
  }
}
