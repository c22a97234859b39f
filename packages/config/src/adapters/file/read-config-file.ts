import fs from "node:fs/promises"
import path from "node:path"

export type FileSourceOptions = {
  /**
   * Path to the file, absolute or relative to `cwd`.
   *
   * @example ".env", ".env.production", "./config/appsettings.json"
   */
  file: string

  /**
   * `true`: a missing file throws. `false`: a missing file loads as empty.
   */
  required: boolean

  /**
   * Base directory for relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err
}

/**
 * Reads a source file. Resolves `undefined` when an optional file is missing;
 * every other failure is rethrown.
 */
export async function readConfigFile(opts: FileSourceOptions): Promise<string | undefined> {
  const filePath = path.resolve(opts.cwd ?? process.cwd(), opts.file)

  try {
    return await fs.readFile(filePath, "utf-8")
  } catch (err) {
    if (!opts.required && isErrnoException(err) && err.code === "ENOENT") {
      return undefined
    }
    throw err
  }
}
