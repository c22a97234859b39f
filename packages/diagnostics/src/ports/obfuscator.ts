/**
 * Turns a sensitive value into its display form. The result is written to
 * the report as-is, without quotes.
 */
export interface Obfuscator {
  obfuscate(value: string | null): string
}
