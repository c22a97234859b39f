import { createError } from "@keytrace/errors"
import { type ZodType, z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import { SourceProvider } from "../adapters/provider/source-provider"
import type { IConfig } from "../ports/config"
import type { ProviderRoot } from "../ports/provider"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  sources?: ConfigSource[]
}

type LoadedSource = {
  source: ConfigSource
  values: Record<string, unknown>
}

async function loadSources(sources: readonly ConfigSource[]): Promise<LoadedSource[]> {
  const loaded: LoadedSource[] = []

  for (const source of sources) {
    loaded.push({ source, values: await source.load() })
  }

  return loaded
}

/**
 * Loads every source once, in order, and wraps each snapshot in a provider.
 * Nothing is merged or validated.
 */
export async function loadProviderRoot(sources: readonly ConfigSource[]): Promise<ProviderRoot> {
  const loaded = await loadSources(sources)

  return {
    providers: loaded.map(({ source, values }) => new SourceProvider(source.name, values)),
  }
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}
  const loaded = await loadSources(sources ?? [new EnvSource()])

  for (const { source, values } of loaded) {
    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        provenance[key] = source.name
      }
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw createError(
      "config_validation_failed",
      `Configuration validation failed:\n${z.prettifyError(result.error)}`,
      { cause: result.error },
    )
  }

  for (const key of Object.keys(result.data)) {
    if (!(key in provenance)) {
      provenance[key] = "default"
    }
  }

  const providers = loaded.map(({ source, values }) => new SourceProvider(source.name, values))

  return new Config<T>(result.data, provenance, new Set(Object.keys(merged)), providers)
}
