import { BaseError } from "@keytrace/errors"
import { anyKeyMatcher, noneKeyMatcher, sensitiveKeyMatcher } from "../composite-key-matchers"
import { RegexKeyMatcher } from "../regex-key-matcher"

describe("RegexKeyMatcher", () => {
  it("matches when any pattern finds the key, ignoring case by default", () => {
    const matcher = new RegexKeyMatcher(["password", "^Api:"])

    expect(matcher.matches("Db:Password")).toBe(true)
    expect(matcher.matches("api:Url")).toBe(true)
    expect(matcher.matches("Db:Host")).toBe(false)
  })

  it("can match case-sensitively", () => {
    const matcher = new RegexKeyMatcher(["password"], { ignoreCase: false })

    expect(matcher.matches("Db:Password")).toBe(false)
    expect(matcher.matches("db:password")).toBe(true)
  })

  it("gives the same answer on repeated calls with global RegExp patterns", () => {
    const matcher = new RegexKeyMatcher([/secret/gi])

    expect(matcher.matches("Api:Secret")).toBe(true)
    expect(matcher.matches("Api:Secret")).toBe(true)
  })

  it("throws invalid_key_pattern for a pattern that does not compile", () => {
    let caught: unknown

    try {
      new RegexKeyMatcher(["Db:("])
    } catch (err) {
      caught = err
    }

    expect(caught).toBeInstanceOf(BaseError)
    expect(caught).toMatchObject({
      code: "invalid_key_pattern",
      message: "Invalid key pattern: Db:(",
      context: { pattern: "Db:(" },
    })
    expect(caught).toHaveProperty("cause", expect.any(SyntaxError))
  })
})

describe("composite matchers", () => {
  it("noneKeyMatcher never matches", () => {
    expect(noneKeyMatcher.matches("Db:Password")).toBe(false)
  })

  it("anyKeyMatcher matches when one member does", () => {
    const matcher = anyKeyMatcher(noneKeyMatcher, new RegexKeyMatcher(["^Db:"]))

    expect(matcher.matches("Db:Host")).toBe(true)
    expect(matcher.matches("Cache:Host")).toBe(false)
    expect(anyKeyMatcher().matches("Db:Host")).toBe(false)
  })

  it.each(["Db:Password", "Stripe:ApiKey", "Stripe:API_KEY", "Auth:Token", "ConnectionStrings:Default", "Jwt:Secret"])(
    "sensitiveKeyMatcher flags %s",
    (key) => {
      expect(sensitiveKeyMatcher.matches(key)).toBe(true)
    },
  )

  it("sensitiveKeyMatcher leaves ordinary keys alone", () => {
    expect(sensitiveKeyMatcher.matches("Db:Host")).toBe(false)
    expect(sensitiveKeyMatcher.matches("Logging:Level")).toBe(false)
  })
})
