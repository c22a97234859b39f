const PART_SEPARATOR = "_"
const REPLACEMENT = "_"

/**
 * How a part starting with an ASCII digit is written.
 *
 * - `"double-underscore"`: the digit is dropped and two underscores are
 *   written in its place (`9abc` → `__abc`). Matches placeholders produced by
 *   earlier releases.
 * - `"prefix"`: one underscore is prepended and the digit kept (`9abc` → `_9abc`).
 */
export type LeadingDigitPolicy = "double-underscore" | "prefix"

export type PlaceholderOptions = {
  /** @default "double-underscore" */
  leadingDigit?: LeadingDigitPolicy
}

const isAsciiDigit = (ch: string) => ch >= "0" && ch <= "9"

const isAllowed = (ch: string) => /^[\p{L}\p{Nd}.]$/u.test(ch)

function formatPart(part: string, leadingDigit: LeadingDigitPolicy): string {
  let out = ""
  let pos = 0

  for (const ch of part) {
    if (pos === 0 && isAsciiDigit(ch)) {
      out += leadingDigit === "prefix" ? `${REPLACEMENT}${ch}` : REPLACEMENT.repeat(2)
    } else {
      out += isAllowed(ch) ? ch : REPLACEMENT
    }
    pos++
  }

  return out
}

/**
 * Builds a brace-delimited token from label fragments. Blank fragments are
 * skipped, the rest are joined with `_`, and every character other than a
 * letter, digit or `.` becomes `_`. Characters are code points, so a letter
 * outside the BMP is kept whole.
 *
 * @example
 * ```ts
 * formatPlaceholder(["Db", "Connection String"]) // "{Db_Connection_String}"
 * formatPlaceholder(["9abc"], { leadingDigit: "prefix" }) // "{_9abc}"
 * ```
 */
export function formatPlaceholder(
  parts: ReadonlyArray<string | null | undefined>,
  options: PlaceholderOptions = {},
): string {
  const leadingDigit = options.leadingDigit ?? "double-underscore"

  const formatted = parts
    .filter((part): part is string => typeof part === "string" && part.trim().length > 0)
    .map((part) => formatPart(part, leadingDigit))

  return `{${formatted.join(PART_SEPARATOR)}}`
}

export function placeholder(...parts: Array<string | null | undefined>): string {
  return formatPlaceholder(parts)
}
