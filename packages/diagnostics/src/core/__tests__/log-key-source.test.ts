import { EnvSource, MemoryProvider, ObjectSource, loadProviderRoot } from "@keytrace/config"
import { ConsoleLogger } from "@keytrace/logger"
import { RegexKeyMatcher } from "../../adapters/matchers/regex-key-matcher"
import { FixedStringObfuscator } from "../../adapters/obfuscators/obfuscators"
import type { LogSink } from "../../ports/log-sink"
import {
  logConfigurationKeySource,
  logConfigurationKeySourceAsDebug,
  logConfigurationKeySourceAsInformation,
  logConfigurationKeySourceAsTrace,
  logConfigurationProvidersAsInformation,
} from "../log-key-source"
import { createDiagnosticsOptions, resetGlobalOptions, setGlobalOptions } from "../options"

describe("logConfigurationKeySource", () => {
  const root = {
    providers: [new MemoryProvider("A"), new MemoryProvider("B", { "Db:Password": "prod" })],
  }
  const options = createDiagnosticsOptions({
    keyMatcher: new RegexKeyMatcher(["Password"]),
    obfuscator: new FixedStringObfuscator(),
  })
  const fullReport = "Provider sources for value of Db:Password\n* A ==> null\n* B ==> REDACTED"

  function makeSink() {
    return { log: vi.fn<LogSink["log"]>() }
  }

  afterEach(() => {
    resetGlobalOptions()
  })

  it("writes the report at the requested level", () => {
    const sink = makeSink()

    logConfigurationKeySource(sink, "warn", root, "Db:Password", false, options)

    expect(sink.log).toHaveBeenCalledOnce()
    expect(sink.log).toHaveBeenCalledWith("warn", fullReport, { configKey: "Db:Password" })
  })

  it.each([
    ["trace", logConfigurationKeySourceAsTrace],
    ["debug", logConfigurationKeySourceAsDebug],
    ["info", logConfigurationKeySourceAsInformation],
  ] as const)("writes at %s", (level, logAt) => {
    const sink = makeSink()

    logAt(sink, root, "Db:Password", false, options)

    expect(sink.log).toHaveBeenCalledWith(level, fullReport, { configKey: "Db:Password" })
  })

  it("is not compressed by default", () => {
    const sink = makeSink()

    logConfigurationKeySourceAsDebug(sink, root, "Db:Name", undefined, options)

    expect(sink.log).toHaveBeenCalledWith(
      "debug",
      "Provider sources for value of Db:Name\n* A ==> null\n* B ==> null\nDb:Name not found in any provider.",
      { configKey: "Db:Name" },
    )
  })

  it("passes the compressed flag through", () => {
    const sink = makeSink()

    logConfigurationKeySourceAsInformation(sink, root, "Db:Name", true, options)

    expect(sink.log).toHaveBeenCalledWith("info", "Provider sources for value of Db:Name were not found.", {
      configKey: "Db:Name",
    })
  })

  it("uses the global options when none are given", () => {
    const sink = makeSink()
    setGlobalOptions(createDiagnosticsOptions({ keyMatcher: new RegexKeyMatcher(["Password"]) }))

    logConfigurationKeySourceAsTrace(sink, root, "Db:Password", true)

    expect(sink.log).toHaveBeenCalledWith("trace", "Provider sources for value of Db:Password\n* B ==> REDACTED", {
      configKey: "Db:Password",
    })
  })

  it("reports an empty provider root", () => {
    const sink = makeSink()

    logConfigurationKeySourceAsInformation(sink, { providers: [] }, "Db:Host")

    expect(sink.log).toHaveBeenCalledWith("info", "Cannot track Db:Host. No configuration providers found.", {
      configKey: "Db:Host",
    })
  })

  it("lets sink errors propagate", () => {
    const failure = new Error("sink closed")
    const sink: LogSink = {
      log: () => {
        throw failure
      },
    }

    expect(() => logConfigurationKeySourceAsDebug(sink, root, "Db:Password")).toThrow(failure)
  })

  it("lists providers", () => {
    const sink = makeSink()

    logConfigurationProvidersAsInformation(sink, root)

    expect(sink.log).toHaveBeenCalledWith("info", "Configuration providers:\n* A\n* B")
  })

  describe("with a real logger and loaded sources", () => {
    function makeLogger(level: "info" | "trace") {
      const lines: string[] = []
      const capture = (line: string) => {
        lines.push(line)
      }
      const fakeConsole = { trace: capture, debug: capture, info: capture, warn: capture, error: capture }

      return { lines, logger: new ConsoleLogger({ console: fakeConsole }, { level }) }
    }

    it("traces a key across json-style and env layers", async () => {
      const { lines, logger } = makeLogger("trace")
      const loaded = await loadProviderRoot([
        new ObjectSource({ Db: { Host: "json-host", Password: "json-secret" } }, "json:appsettings.json"),
        new EnvSource({ env: { "Db:Password": "env-secret" } }),
      ])

      logConfigurationKeySourceAsDebug(logger, loaded, "db:host", false, options)
      logConfigurationKeySourceAsDebug(logger, loaded, "Db:Password", false, options)

      expect(lines.map((l) => JSON.parse(l).configKey)).toEqual(["db:host", "Db:Password"])
      expect(lines.map((l) => JSON.parse(l).message)).toEqual([
        'Provider sources for value of db:host\n* json:appsettings.json ==> "json-host"\n* env ==> null',
        "Provider sources for value of Db:Password\n* json:appsettings.json ==> REDACTED\n* env ==> REDACTED",
      ])
    })

    it("drops reports below the logger's level", () => {
      const { lines, logger } = makeLogger("info")

      logConfigurationKeySourceAsDebug(logger, root, "Db:Password", false, options)
      logConfigurationKeySourceAsInformation(logger, root, "Db:Password", false, options)

      expect(lines).toHaveLength(1)
      expect(JSON.parse(lines[0]!)).toMatchObject({ level: "info", message: fullReport, configKey: "Db:Password" })
    })
  })
})
