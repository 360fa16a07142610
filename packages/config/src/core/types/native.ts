import type { ValueType } from "../../ports/value-type"

const INTEGER_PATTERN = /^[+-]?\d+$/

function parseNumber(raw: string): number {
  if (raw === "" || raw.trim() !== raw) throw new Error("invalid number literal")

  const value = Number(raw)

  if (Number.isNaN(value)) throw new Error("invalid number literal")

  return value
}

function parseInteger(raw: string): number {
  if (!INTEGER_PATTERN.test(raw)) throw new Error("invalid digit found in string")

  const value = Number(raw)

  if (!Number.isSafeInteger(value)) throw new Error("number too large to fit in a safe integer")

  return value
}

function parseBoolean(raw: string): boolean {
  if (raw === "true") return true
  if (raw === "false") return false

  throw new Error("expected 'true' or 'false'")
}

function parseBigInt(raw: string): bigint {
  if (!INTEGER_PATTERN.test(raw)) throw new Error("invalid digit found in string")

  return BigInt(raw)
}

export const string: ValueType<string> = {
  name: "string",
  parse: (raw) => raw,
  typeDefault: () => "",
}

/** Any finite or infinite JavaScript number, e.g. "8080", "-1.5", "1e3". */
export const number: ValueType<number> = {
  name: "number",
  parse: parseNumber,
  typeDefault: () => 0,
}

/** Decimal digits with an optional sign, within the safe integer range. */
export const integer: ValueType<number> = {
  name: "integer",
  parse: parseInteger,
  typeDefault: () => 0,
}

/** Exactly "true" or "false". */
export const boolean: ValueType<boolean> = {
  name: "boolean",
  parse: parseBoolean,
  typeDefault: () => false,
}

export const bigint: ValueType<bigint> = {
  name: "bigint",
  parse: parseBigInt,
  typeDefault: () => 0n,
}

export const url: ValueType<URL> = {
  name: "url",
  parse: (raw) => new URL(raw),
}

/**
 * One of a fixed set of strings.
 *
 * @example
 * ```typescript
 * required(types.oneOf("debug", "info", "warn"), { default: "info" })
 * ```
 */
export function oneOf<const V extends string>(...values: readonly [V, ...V[]]): ValueType<V> {
  const expected = values.map((v) => `'${v}'`).join(", ")

  return {
    name: `oneOf(${values.join("|")})`,
    parse: (raw) => {
      const match = values.find((v) => v === raw)

      if (match === undefined) throw new Error(`expected one of ${expected}`)

      return match
    },
  }
}

/**
 * A type without a native parser. Fields of this type must declare a
 * `deserializer`.
 */
export function custom<T>(name: string, typeDefault?: () => T): ValueType<T> {
  return typeDefault ? { name, typeDefault } : { name }
}
