import type { AppError } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function isValidDate(v: unknown): v is Date {
  return v instanceof Date && Number.isFinite(v.valueOf())
}

/**
 * Type guard to check if a value is an AppError.
 *
 * @example
 * ```ts
 * try {
 *   compiled.load()
 * } catch (err) {
 *   if (isAppError(err)) {
 *     console.log(err.code, err.context)
 *   }
 * }
 * ```
 */
export function isAppError(e: unknown): e is AppError {
  if (!isRecord(e)) return false

  const code = e.code

  return (
    typeof code === "string" &&
    code === code.toLowerCase() &&
    isRecord(e.context) &&
    typeof e.isOperational === "boolean" &&
    isValidDate(e.timestamp) &&
    typeof e.message === "string" &&
    typeof e.name === "string"
  )
}
