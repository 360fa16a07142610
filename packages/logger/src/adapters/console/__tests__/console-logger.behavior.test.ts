import { BaseError } from "@envbind/errors"
import type { LogLevelName } from "../../../ports/log-level"
import { ConsoleLogger } from "../console-logger"

describe("ConsoleLogger behavior", () => {
  function makeLineCaptureConsole() {
    const lines: string[] = []
    const calls: { method: LogLevelName; line: string }[] = []

    const capture = (method: LogLevelName) => (line: unknown) => {
      const text = String(line)

      lines.push(text)
      calls.push({ method, line: text })
    }

    const fakeConsole = {
      trace: capture("trace"),
      debug: capture("debug"),
      info: capture("info"),
      warn: capture("warn"),
      error: capture("error"),
    }

    const parsed = (index: number): Record<string, unknown> => JSON.parse(lines[index] ?? "null")

    return { lines, calls, fakeConsole, parsed }
  }

  it("constructor defaults to global console when no override is provided", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {})

    try {
      const logger = new ConsoleLogger({}, { level: "trace", prettify: false }, { schema: "AppConfig" })

      logger.info("hello")

      expect(info).toHaveBeenCalledTimes(1)

      const payload: Record<string, unknown> = JSON.parse(String(info.mock.calls[0]?.[0]))
      expect(payload).toMatchObject({
        level: "info",
        message: "hello",
        schema: "AppConfig",
      })
    } finally {
      info.mockRestore()
    }
  })

  it("emits parseable JSON when prettify is false", () => {
    const { lines, fakeConsole, parsed } = makeLineCaptureConsole()

    const logger = new ConsoleLogger(
      { console: fakeConsole },
      { level: "trace", prettify: false },
      { schema: "AppConfig" },
    )

    logger.debug("resolved config field", { field: "port", source: "default" })

    expect(lines).toHaveLength(1)

    const payload = parsed(0)

    expect(payload).toMatchObject({
      level: "debug",
      message: "resolved config field",
      schema: "AppConfig",
      field: "port",
      source: "default",
    })
    expect(typeof payload.timestamp).toBe("string")
  })

  it("prettify true emits a human-readable line", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger(
      { console: fakeConsole },
      { level: "trace", prettify: true },
      { schema: "AppConfig" },
    )

    logger.warn("unknown variables")

    expect(lines).toHaveLength(1)
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z WARN unknown variables /)
    expect(lines[0]?.endsWith(' {"schema":"AppConfig"}')).toBe(true)
  })

  it("serializes Error values into a structured, JSON-safe form", () => {
    const { lines, fakeConsole, parsed } = makeLineCaptureConsole()

    const logger = new ConsoleLogger({ console: fakeConsole }, { level: "trace", prettify: false })

    const cause = new Error("ENOENT: no such file or directory")
    const err = new BaseError("Failed to read file", {
      code: "file_read",
      context: { variable: "SECRET_FILE" },
      cause,
    })

    logger.error("failed", { err })
    logger.error("failed-again", { err: { code: "custom" } })

    expect(lines).toHaveLength(2)
    expect(parsed(0).err).toMatchObject({
      name: "BaseError",
      message: "Failed to read file",
      code: "file_read",
      context: { variable: "SECRET_FILE" },
      cause: { name: "Error", message: "ENOENT: no such file or directory" },
    })
    expect(parsed(1).err).toEqual({ code: "custom" })
  })

  it("prettify moves the error stack onto indented lines", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger({ console: fakeConsole }, { level: "trace", prettify: true })

    logger.error("failed", { err: new Error("boom") })

    const [first, second] = (lines[0] ?? "").split("\n")

    expect(first).toContain("ERROR failed")
    expect(first).not.toContain('"stack"')
    expect(second).toBe("  Error: boom")
  })

  it("uses the correct console method for a level (fatal -> error)", () => {
    const { calls, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger({ console: fakeConsole }, { level: "trace", prettify: false })

    logger.fatal("boom")

    expect(calls).toHaveLength(1)
    expect(calls[0]?.method).toBe("error")
  })

  it("does not throw when log metadata cannot be serialized", () => {
    const { lines, fakeConsole, parsed } = makeLineCaptureConsole()

    const logger = new ConsoleLogger({ console: fakeConsole }, { level: "trace", prettify: false })

    const circular: Record<string, unknown> = { a: 1 }
    circular.self = circular

    logger.info("circular", { circular })

    expect(lines).toHaveLength(1)
    expect(parsed(0)).toEqual({ message: "Failed to stringify log payload" })
  })

  it("preserves null error values without modification", () => {
    const { lines, fakeConsole, parsed } = makeLineCaptureConsole()

    const logger = new ConsoleLogger({ console: fakeConsole }, { level: "trace", prettify: false })

    logger.error("null-error", { err: null })

    expect(lines).toHaveLength(1)
    expect(parsed(0).err).toBeNull()
  })

  it("emits trace and debug entries with the expected levels", () => {
    const { lines, fakeConsole, parsed } = makeLineCaptureConsole()

    const logger = new ConsoleLogger({ console: fakeConsole }, { level: "trace", prettify: false })

    logger.trace("t")
    logger.debug("d")

    expect(lines).toHaveLength(2)
    expect(parsed(0)).toMatchObject({ level: "trace", message: "t" })
    expect(parsed(1)).toMatchObject({ level: "debug", message: "d" })
  })

  it("defaults to info level when no minimum level is configured", () => {
    const { lines, fakeConsole, parsed } = makeLineCaptureConsole()

    const logger = new ConsoleLogger({ console: fakeConsole }, { prettify: false })

    logger.debug("ignored")
    logger.info("included")

    expect(lines).toHaveLength(1)
    expect(parsed(0)).toMatchObject({ level: "info", message: "included" })
  })

  it("ignores metadata fields that collide with reserved keys", () => {
    const { lines, fakeConsole, parsed } = makeLineCaptureConsole()

    const logger = new ConsoleLogger({ console: fakeConsole }, { level: "trace", prettify: false })

    logger.info("test-message", { timestamp: 123, level: 456, message: "overridden" })

    expect(lines).toHaveLength(1)
    expect(parsed(0)).toMatchObject({ level: "info", message: "test-message" })
    expect(typeof parsed(0).timestamp).toBe("string")
  })

  it("drops undefined metadata fields", () => {
    const { lines, fakeConsole, parsed } = makeLineCaptureConsole()

    const logger = new ConsoleLogger({ console: fakeConsole }, { level: "trace", prettify: false })

    logger.info("hello", { variable: undefined, field: "port" })

    expect(lines).toHaveLength(1)
    expect(parsed(0)).toMatchObject({ level: "info", message: "hello", field: "port" })
    expect(Object.hasOwn(parsed(0), "variable")).toBe(false)
  })
})
