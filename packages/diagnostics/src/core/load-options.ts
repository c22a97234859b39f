import { type ConfigSource, EnvSource, loadConfig } from "@keytrace/config"
import { z } from "zod"
import { sensitiveKeyMatcher } from "../adapters/matchers/composite-key-matchers"
import { RegexKeyMatcher } from "../adapters/matchers/regex-key-matcher"
import {
  DEFAULT_REDACTED_TEXT,
  FixedStringObfuscator,
  MaskObfuscator,
  PlainTextObfuscator,
} from "../adapters/obfuscators/obfuscators"
import type { DiagnosticsOptions } from "../ports/diagnostics-options"
import type { KeyMatcher } from "../ports/key-matcher"
import type { Obfuscator } from "../ports/obfuscator"
import { createDiagnosticsOptions } from "./options"

export const diagnosticsEnvSchema = z.object({
  /** Comma-separated regular expressions. Empty falls back to the built-in list. */
  CONFIG_DIAGNOSTICS_SENSITIVE_KEYS: z.string().default(""),
  CONFIG_DIAGNOSTICS_OBFUSCATOR: z.enum(["fixed", "mask", "plain"]).default("fixed"),
  CONFIG_DIAGNOSTICS_REDACTED_TEXT: z.string().min(1).default(DEFAULT_REDACTED_TEXT),
})

export type DiagnosticsEnv = z.infer<typeof diagnosticsEnvSchema>

export type LoadDiagnosticsOptionsOptions = {
  /** @default [new EnvSource()] */
  sources?: ConfigSource[]
}

function toKeyMatcher(raw: string): KeyMatcher {
  const patterns = raw
    .split(",")
    .map((p) => p.trim())
    .filter((p) => p.length > 0)

  return patterns.length ? new RegexKeyMatcher(patterns) : sensitiveKeyMatcher
}

function toObfuscator(env: DiagnosticsEnv): Obfuscator {
  switch (env.CONFIG_DIAGNOSTICS_OBFUSCATOR) {
    case "mask":
      return new MaskObfuscator()
    case "plain":
      return new PlainTextObfuscator()
    case "fixed":
      return new FixedStringObfuscator(env.CONFIG_DIAGNOSTICS_REDACTED_TEXT)
  }
}

export function mapEnvToOptions(env: DiagnosticsEnv): DiagnosticsOptions {
  return createDiagnosticsOptions({
    keyMatcher: toKeyMatcher(env.CONFIG_DIAGNOSTICS_SENSITIVE_KEYS),
    obfuscator: toObfuscator(env),
  })
}

export async function loadDiagnosticsOptions({
  sources,
}: LoadDiagnosticsOptionsOptions = {}): Promise<DiagnosticsOptions> {
  const config = await loadConfig({
    schema: diagnosticsEnvSchema,
    sources: sources ?? [new EnvSource()],
  })

  return mapEnvToOptions(config.value)
}
