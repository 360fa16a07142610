import type { EnvReader } from "../../ports/env-reader"
import { FileReadError, MissingVariableError, ParseError } from "../errors"

/** Where a raw value was read from. */
export type ValueSource =
  | { kind: "env"; variable: string }
  | { kind: "file"; variable: string; path: string }

export type Provenance = ValueSource | { kind: "default" } | { kind: "absent" }

export type RawLookup = { kind: "value"; raw: string; source: ValueSource } | { kind: "missing" }

export type FieldLookup = {
  lookupName: string
  fromFile: boolean
}

/** Native parser or custom deserializer, under the type name used in errors. */
export type Parser<T> = {
  typeName: string
  parse: (raw: string) => T
}

export type Resolved<T> = {
  value: T
  source: Provenance
}

export function fileVariable(lookupName: string): string {
  return `${lookupName}_FILE`
}

/**
 * Looks a variable up, falling back to its `{NAME}_FILE` indirection.
 *
 * The direct variable always wins. File contents lose trailing whitespace. A
 * file that cannot be read is a {@link FileReadError}, never a missing value.
 */
export function resolve(env: EnvReader, lookupName: string, allowFile: boolean): RawLookup {
  const direct = env.get(lookupName)

  if (direct !== undefined) {
    return { kind: "value", raw: direct, source: { kind: "env", variable: lookupName } }
  }

  if (!allowFile) return { kind: "missing" }

  const variable = fileVariable(lookupName)
  const path = env.get(variable)

  if (path === undefined) return { kind: "missing" }

  let contents: string

  try {
    contents = env.readFile(path)
  } catch (err) {
    throw new FileReadError(variable, path, err)
  }

  return { kind: "value", raw: contents.trimEnd(), source: { kind: "file", variable, path } }
}

function parseWith<T>(lookupName: string, raw: string, parser: Parser<T>): T {
  try {
    return parser.parse(raw)
  } catch (err) {
    throw new ParseError(lookupName, parser.typeName, err)
  }
}

export function resolveRequired<T>(env: EnvReader, field: FieldLookup, parser: Parser<T>): Resolved<T> {
  const lookup = resolve(env, field.lookupName, field.fromFile)

  if (lookup.kind === "missing") throw new MissingVariableError(field.lookupName)

  return { value: parseWith(field.lookupName, lookup.raw, parser), source: lookup.source }
}

/** Absence yields `fallback()`. A present but malformed value still fails. */
export function resolveWithDefault<T>(
  env: EnvReader,
  field: FieldLookup,
  parser: Parser<T>,
  fallback: () => T,
): Resolved<T> {
  const lookup = resolve(env, field.lookupName, field.fromFile)

  if (lookup.kind === "missing") return { value: fallback(), source: { kind: "default" } }

  return { value: parseWith(field.lookupName, lookup.raw, parser), source: lookup.source }
}

export function resolveOptional<T>(
  env: EnvReader,
  field: FieldLookup,
  parser: Parser<T>,
): Resolved<T | undefined> {
  const lookup = resolve(env, field.lookupName, field.fromFile)

  if (lookup.kind === "missing") return { value: undefined, source: { kind: "absent" } }

  return { value: parseWith(field.lookupName, lookup.raw, parser), source: lookup.source }
}

export function describeProvenance(source: Provenance): string {
  switch (source.kind) {
    case "env":
    case "file":
      return `${source.kind}:${source.variable}`
    case "default":
    case "absent":
      return source.kind
  }
}
