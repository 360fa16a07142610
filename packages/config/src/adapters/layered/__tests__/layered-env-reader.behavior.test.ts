import { MemoryEnvReader } from "../../memory/memory-env-reader"
import { LayeredEnvReader } from "../layered-env-reader"

describe("LayeredEnvReader behavior", () => {
  const defaults = new MemoryEnvReader({
    vars: { APP_PORT: "3000", APP_HOST: "localhost" },
    files: { "/defaults/token": "from-defaults" },
  })
  const overrides = new MemoryEnvReader({
    vars: { APP_PORT: "4000", APP_DEBUG: "" },
    files: { "/overrides/token": "from-overrides" },
  })

  it("later readers override earlier ones", () => {
    const reader = new LayeredEnvReader([defaults, overrides])

    expect(reader.get("APP_PORT")).toBe("4000")
    expect(reader.get("APP_HOST")).toBe("localhost")
  })

  it("an empty value in a later reader still overrides", () => {
    const reader = new LayeredEnvReader([new MemoryEnvReader({ vars: { APP_DEBUG: "true" } }), overrides])

    expect(reader.get("APP_DEBUG")).toBe("")
  })

  it("keys() is the union without duplicates", () => {
    const reader = new LayeredEnvReader([defaults, overrides])

    expect(reader.keys()).toEqual(["APP_PORT", "APP_HOST", "APP_DEBUG"])
  })

  it("reads files through the last reader", () => {
    const reader = new LayeredEnvReader([defaults, overrides])

    expect(reader.readFile("/overrides/token")).toBe("from-overrides")
    expect(() => reader.readFile("/defaults/token")).toThrow(/ENOENT/)
  })

  it("works with a single reader", () => {
    const reader = new LayeredEnvReader([defaults])

    expect(reader.readFile("/defaults/token")).toBe("from-defaults")
    expect(reader.name).toBe("layered(memory)")
  })
})
