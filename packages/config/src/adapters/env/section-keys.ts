import { KEY_DELIMITER } from "../../core/flatten"

/**
 * Rewrites `alias` in every key to the section delimiter, so `DB__HOST` can
 * answer for `DB:HOST` when `alias` is `"__"`.
 */
export function toSectionKeys<V>(
  values: Record<string, V>,
  alias: string | undefined,
): Record<string, V> {
  if (!alias) return values

  const out: Record<string, V> = {}
  for (const [key, value] of Object.entries(values)) {
    out[key.split(alias).join(KEY_DELIMITER)] = value
  }
  return out
}
