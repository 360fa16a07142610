function isCloneable(value: object): boolean {
  if (Array.isArray(value)) return true
  if (value instanceof Date || value instanceof Map || value instanceof Set) return true

  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

function deepFreeze<T>(value: T): T {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) return value

  Object.freeze(value)
  for (const nested of Object.values(value)) deepFreeze(nested)

  return value
}

/**
 * Supplier for an explicit default value.
 *
 * Primitives are returned as-is. Arrays, plain objects, dates, maps and sets
 * are cloned on every call so a loaded record never shares them with later
 * loads. Anything `structuredClone` cannot copy faithfully is deep-frozen and
 * shared.
 */
export function defaultSupplier<T>(value: T): () => T {
  if (typeof value !== "object" || value === null) return () => value

  if (isCloneable(value)) {
    try {
      structuredClone(value)
      return () => structuredClone(value)
    } catch {
      // holds functions or other uncloneable members; shared frozen below
    }
  }

  const frozen = deepFreeze(value)
  return () => frozen
}
