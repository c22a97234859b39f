import { Writable } from "node:stream"
import { createPinoLogger, PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

describe("PinoLogger behavior", () => {
  it("emits JSON to the provided destination", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger(
      { destination },
      { level: "trace", prettify: false },
      { service: "billing" },
    )

    logger.info("hello", { configKey: "Db:Host" })

    const payload = JSON.parse(lines[0]!)

    expect(lines).toHaveLength(1)
    expect(payload).toMatchObject({ msg: "hello", level: 30, service: "billing", configKey: "Db:Host" })
    expect(typeof payload.time).toBe("number")
  })

  it("prefers the destination over the pretty transport", () => {
    const { lines, destination } = makeLineDestination()

    const logger = createPinoLogger({ destination }, { level: "info", prettify: true })

    logger.log("info", "still json")

    expect(JSON.parse(lines[0]!).msg).toBe("still json")
  })

  it("serializes errors with their cause", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" })

    logger.error("failed", { err: new Error("outer", { cause: new Error("inner") }) })

    const payload = JSON.parse(lines[0]!)

    expect(payload.err.message).toBe("outer")
    expect(payload.err.cause.message).toBe("inner")
  })

  it("child() inherits the base sink and level", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger({ destination }, { level: "warn" }, { service: "billing" })
    const child = base.child({ provider: "env" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0]!)).toMatchObject({ msg: "logged", service: "billing", provider: "env" })
  })
})
