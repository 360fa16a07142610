import { type ZodType, z } from "zod"
import type { Deserializer } from "../../ports/field"

/**
 * Parses the value as JSON, optionally checked against a zod schema.
 *
 * @example
 * ```typescript
 * required(types.custom<string[]>("hosts"), {
 *   deserializer: deserializers.json(z.array(z.string())),
 * })
 * ```
 */
export function json(): Deserializer<unknown>
export function json<T>(schema: ZodType<T>): Deserializer<T>
export function json<T>(schema?: ZodType<T>): Deserializer<unknown> {
  return (raw) => {
    let parsed: unknown

    try {
      parsed = JSON.parse(raw)
    } catch {
      // native messages quote the input
      throw new Error("invalid JSON")
    }

    if (!schema) return parsed

    const result = schema.safeParse(parsed)

    if (!result.success) throw new Error(z.prettifyError(result.error))

    return result.data
  }
}

/** Splits on `separator`, trims each item and drops empty ones. */
export function list(separator: string = ","): Deserializer<string[]> {
  return (raw) =>
    raw
      .split(separator)
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
}
