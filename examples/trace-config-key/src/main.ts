import path from "node:path"
import { fileURLToPath } from "node:url"
import { DotenvSource, EnvSource, JsonSource, loadConfig } from "@keytrace/config"
import { createPinoLogger, logLevelNames } from "@keytrace/logger"
import { z } from "zod"
import { traceKeys } from "./trace-keys"

const envSchema = z.object({
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(true),
  TRACE_COMPRESSED: z.stringbool().default(false),
})

const configDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "config")

async function main(keys: string[]): Promise<void> {
  const env = await loadConfig({ schema: envSchema, sources: [new EnvSource()] })

  const logger = createPinoLogger(
    {},
    { level: env.get("LOG_LEVEL"), prettify: env.get("LOG_PRETTY") },
    { module: "trace-config-key" },
  )

  const ok = await traceKeys(logger, {
    sources: [
      new JsonSource({ file: "appsettings.json", required: true, cwd: configDir }),
      new JsonSource({ file: "appsettings.local.json", required: false, cwd: configDir }),
      new DotenvSource({ file: ".env", required: false, cwd: configDir, sectionDelimiter: "__" }),
      new EnvSource({ sectionDelimiter: "__" }),
    ],
    keys,
    compressed: env.get("TRACE_COMPRESSED"),
  })

  if (!ok) process.exitCode = 1
}

// Only reached when the logger settings themselves are invalid.
main(process.argv.slice(2)).catch((err: unknown) => {
  console.error(err)
  process.exitCode = 1
})
