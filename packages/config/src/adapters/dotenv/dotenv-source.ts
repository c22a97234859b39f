import { parse } from "dotenv"
import type { ConfigSource } from "../../ports/source"
import { toSectionKeys } from "../env/section-keys"
import { type FileSourceOptions, readConfigFile } from "../file/read-config-file"

export type DotenvSourceOptions = FileSourceOptions & {
  /** Same as `EnvSourceOptions.sectionDelimiter`. */
  sectionDelimiter?: string
}

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const content = await readConfigFile(this.opts)

    return content === undefined ? {} : toSectionKeys(parse(content), this.opts.sectionDelimiter)
  }
}
