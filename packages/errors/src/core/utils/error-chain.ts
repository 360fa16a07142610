function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function getCause(v: unknown): unknown {
  return isRecord(v) && "cause" in v ? v.cause : undefined
}

/**
 * Walk the error cause chain and return all values encountered.
 *
 * Safety:
 * - maxDepth guardrail (default 50)
 * - cycle detection via WeakSet
 */
export function errorChain(err: unknown, maxDepth: number = 50): unknown[] {
  const chain: unknown[] = []
  const seen = new WeakSet<object>()

  let current: unknown = err

  while (current != null && chain.length < maxDepth) {
    if (typeof current === "object") {
      if (seen.has(current)) break
      seen.add(current)
    }

    chain.push(current)

    const next = getCause(current)

    if (next === undefined) break
    current = next
  }

  return chain
}

/**
 * Best-effort human message for any thrown value.
 *
 * Errors give their `message`, strings are used as-is, and anything else is
 * JSON-encoded (falling back to `String()` for values JSON cannot encode).
 */
export function messageOf(value: unknown): string {
  if (value instanceof Error) return value.message
  if (typeof value === "string") return value

  try {
    return JSON.stringify(value) ?? String(value)
  } catch {
    return String(value)
  }
}

/**
 * Renders the whole cause chain on one line, outermost first.
 *
 * @example
 * ```ts
 * formatErrorChain(new Error("outer", { cause: new Error("root") }))
 * // "outer: root"
 * ```
 */
export function formatErrorChain(err: unknown): string {
  return errorChain(err).map(messageOf).join(": ")
}
