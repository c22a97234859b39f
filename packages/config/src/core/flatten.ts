export const KEY_DELIMITER = ":"

/**
 * Flattens nested values into `:`-delimited keys.
 *
 * `{ Db: { Hosts: ["a", "b"] } }` becomes `Db:Hosts:0 = "a"`, `Db:Hosts:1 = "b"`.
 * `undefined` leaves are dropped, `null` leaves are kept, other scalars are
 * stringified.
 */
export function flattenValues(values: Record<string, unknown>): Map<string, string | null> {
  const out = new Map<string, string | null>()

  const visit = (prefix: string, value: unknown): void => {
    if (value === undefined) return

    if (value === null) {
      out.set(prefix, null)
      return
    }

    if (typeof value === "object") {
      for (const [k, v] of Object.entries(value)) {
        visit(`${prefix}${KEY_DELIMITER}${k}`, v)
      }
      return
    }

    out.set(prefix, String(value))
  }

  for (const [key, value] of Object.entries(values)) {
    visit(key, value)
  }

  return out
}
