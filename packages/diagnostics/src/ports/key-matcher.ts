/**
 * Decides whether a configuration key is sensitive, i.e. whether its values
 * must be obfuscated in reports.
 */
export interface KeyMatcher {
  matches(key: string): boolean
}
