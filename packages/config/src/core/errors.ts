import { type AppError, BaseError, formatErrorChain } from "@envbind/errors"

/** A required variable, and its file indirection where enabled, is not set. */
export class MissingVariableError extends BaseError<"missing_variable"> {
  readonly variable: string

  constructor(variable: string) {
    super(`Environment variable '${variable}' is required but not set`, {
      code: "missing_variable",
      context: { variable },
    })

    this.variable = variable
  }
}

/** A `{NAME}_FILE` variable points at a file that could not be read. */
export class FileReadError extends BaseError<"file_read"> {
  readonly variable: string
  readonly path: string

  constructor(variable: string, path: string, cause: unknown) {
    super(`Failed to read file '${path}' for environment variable '${variable}': ${formatErrorChain(cause)}`, {
      code: "file_read",
      context: { variable, path },
      cause,
    })

    this.variable = variable
    this.path = path
  }
}

/** A value was found but the native parser or deserializer rejected it. */
export class ParseError extends BaseError<"parse"> {
  readonly variable: string
  readonly typeName: string

  constructor(variable: string, typeName: string, cause: unknown) {
    super(`Failed to parse environment variable '${variable}' as ${typeName}: ${formatErrorChain(cause)}`, {
      code: "parse",
      context: { variable, typeName },
      cause,
    })

    this.variable = variable
    this.typeName = typeName
  }
}

export type DeclarationErrorDetails = {
  field?: string
  attribute?: string
  cause?: unknown
}

/**
 * Invalid schema: unsupported attribute, contradictory attributes or a type
 * that cannot be read. Raised while compiling, before any variable is read.
 */
export class DeclarationError extends BaseError<"declaration"> {
  readonly field: string | undefined
  readonly attribute: string | undefined

  constructor(message: string, details: DeclarationErrorDetails = {}) {
    super(message, {
      code: "declaration",
      context: { field: details.field, attribute: details.attribute },
      cause: details.cause,
      isOperational: false,
    })

    this.field = details.field
    this.attribute = details.attribute
  }
}

/** Every field error of one load, raised when errors are collected. */
export class ConfigurationError extends BaseError<"configuration"> {
  readonly errors: readonly AppError[]

  constructor(errors: readonly AppError[]) {
    const lines = errors.map((e) => `- ${e.message}`)

    super(`Configuration failed with ${errors.length} error(s):\n${lines.join("\n")}`, {
      code: "configuration",
      context: { codes: errors.map((e) => e.code) },
    })

    this.errors = errors
  }
}
