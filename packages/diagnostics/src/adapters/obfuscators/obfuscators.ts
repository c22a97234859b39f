import type { Obfuscator } from "../../ports/obfuscator"

export const DEFAULT_REDACTED_TEXT = "REDACTED"

/**
 * Shows the value unchanged. Useful to switch redaction off locally while
 * keeping the matcher configured.
 */
export class PlainTextObfuscator implements Obfuscator {
  obfuscate(value: string | null): string {
    return value ?? ""
  }
}

export class FixedStringObfuscator implements Obfuscator {
  constructor(private readonly text: string = DEFAULT_REDACTED_TEXT) {}

  obfuscate(_value: string | null): string {
    return this.text
  }
}

export type MaskObfuscatorOptions = {
  /** @default "*" */
  char?: string
}

/**
 * Replaces every character with the mask character; the length of the value
 * stays visible.
 */
export class MaskObfuscator implements Obfuscator {
  private readonly char: string

  constructor(options: MaskObfuscatorOptions = {}) {
    this.char = options.char ?? "*"
  }

  obfuscate(value: string | null): string {
    return this.char.repeat([...(value ?? "")].length)
  }
}
