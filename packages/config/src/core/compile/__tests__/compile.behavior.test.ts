import { MemoryEnvReader } from "../../../adapters/memory/memory-env-reader"
import { type FieldDeclaration, TYPE_DEFAULT } from "../../../ports/field"
import { optional, required } from "../../declare/declare"
import { DeclarationError } from "../../errors"
import { extractField } from "../../extract/extract"
import { deserializers, types } from "../../types"
import { type CustomDefaultsPolicy, compileField } from "../compile"
import { STRATEGY_TABLE, strategyIds } from "../strategies"

function compile<T>(
  declaration: FieldDeclaration<T>,
  customDefaults: CustomDefaultsPolicy = "reject",
) {
  return compileField(extractField("hosts", declaration, "APP_"), { customDefaults })
}

function catchError(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }

  throw new Error("expected function to throw")
}

const hosts = types.custom<string[]>("hosts")

describe("compileField", () => {
  describe("strategy selection", () => {
    it.each<[string, FieldDeclaration<unknown>]>([
      ["native-optional", optional(types.integer)],
      ["custom-optional", optional(hosts, { deserializer: deserializers.list() })],
      ["custom-required", required(hosts, { deserializer: deserializers.list() })],
      ["native-with-default", required(types.integer, { default: 8080 })],
      ["native-with-default", required(types.integer, { default: TYPE_DEFAULT })],
      ["native-required", required(types.integer)],
    ])("selects %s", (strategy, declaration) => {
      expect(compile(declaration).strategy).toBe(strategy)
    })

    it("selects custom-with-default under the fallback policy", () => {
      const plan = compile(
        required(hosts, { deserializer: deserializers.list(), default: ["localhost"] }),
        "fallback",
      )

      expect(plan.strategy).toBe("custom-with-default")
    })
  })

  it("carries the lookup name, file flag and type name", () => {
    const plan = compile(required(types.url, { name: "UPSTREAM", fromFile: true }))

    expect(plan).toMatchObject({
      key: "hosts",
      lookupName: "APP_UPSTREAM",
      fromFile: true,
      typeName: "url",
    })
  })

  describe("declaration errors", () => {
    it.each<[string, FieldDeclaration<unknown>]>([
      ["string", optional(types.string, { default: "" })],
      ["number", optional(types.number, { default: 1.5 })],
      ["integer", optional(types.integer, { default: TYPE_DEFAULT })],
      ["boolean", optional(types.boolean, { default: false })],
      ["bigint", optional(types.bigint, { default: 1n })],
      ["url", optional(types.url, { default: new URL("http://localhost") })],
      ["oneOf", optional(types.oneOf("a", "b"), { default: "a" })],
      ["custom", optional(hosts, { deserializer: deserializers.list(), default: [] })],
    ])("rejects a default on an optional %s field", (_, declaration) => {
      for (const policy of ["reject", "fallback"] as const) {
        const err = catchError(() => compile(declaration, policy))

        expect(err).toBeInstanceOf(DeclarationError)
        expect(err).toMatchObject({ field: "hosts", attribute: "default" })
      }
    })

    it("rejects a deserializer with a default under the reject policy", () => {
      const err = catchError(() =>
        compile(required(hosts, { deserializer: deserializers.list(), default: ["localhost"] })),
      )

      expect(err).toBeInstanceOf(DeclarationError)
      expect(err).toMatchObject({
        message:
          "Field 'hosts' combines a custom deserializer with a default; " +
          'compile with customDefaults: "fallback" to allow it',
        attribute: "default",
      })
    })

    it("rejects a type without a native parser and no deserializer", () => {
      const err = catchError(() => compile(required(hosts)))

      expect(err).toBeInstanceOf(DeclarationError)
      expect(err).toMatchObject({
        message: "Field 'hosts' has type 'hosts' which has no native parser; declare a deserializer",
        attribute: "deserializer",
      })
    })

    it("rejects the default marker on a type without a default", () => {
      const err = catchError(() => compile(required(types.url, { default: TYPE_DEFAULT })))

      expect(err).toBeInstanceOf(DeclarationError)
      expect(err).toMatchObject({
        message: "Field 'hosts' uses TYPE_DEFAULT but type 'url' has no default value",
      })
    })
  })

  describe("compiled resolution", () => {
    const env = new MemoryEnvReader()

    it("custom-with-default falls back on absence", () => {
      const plan = compile(
        required(hosts, { deserializer: deserializers.list(), default: ["localhost"] }),
        "fallback",
      )

      expect(plan.resolve(env)).toEqual({ value: ["localhost"], source: { kind: "default" } })
    })

    it("native-with-default uses the type default for the marker", () => {
      const plan = compile(required(types.boolean, { default: TYPE_DEFAULT }))

      expect(plan.resolve(env)).toEqual({ value: false, source: { kind: "default" } })
    })

    it("custom types take their type default through the marker", () => {
      const withDefault = types.custom("hosts", (): string[] => [])
      const plan = compile(
        required(withDefault, { deserializer: deserializers.list(), default: TYPE_DEFAULT }),
        "fallback",
      )

      expect(plan.resolve(env)).toEqual({ value: [], source: { kind: "default" } })
    })

    it("uses the deserializer instead of the native parser", () => {
      const plan = compile(required(types.string, { deserializer: (raw) => raw.toUpperCase() }))

      expect(plan.strategy).toBe("custom-required")
      expect(plan.resolve(new MemoryEnvReader({ vars: { APP_HOSTS: "a,b" } })).value).toBe("A,B")
    })
  })
})

describe("STRATEGY_TABLE", () => {
  it("has one row per strategy", () => {
    expect(STRATEGY_TABLE.map((s) => s.id)).toEqual([...strategyIds])
  })

  it("classifies every valid combination to exactly one row", () => {
    for (const isOptional of [false, true]) {
      for (const custom of [false, true]) {
        for (const hasDefault of [false, true]) {
          if (isOptional && hasDefault) continue

          const rows = STRATEGY_TABLE.filter((s) =>
            s.select({ optional: isOptional, custom, hasDefault }),
          )

          expect(rows).toHaveLength(1)
        }
      }
    }
  })
})
