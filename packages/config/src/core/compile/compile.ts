import type { EnvReader } from "../../ports/env-reader"
import { DeclarationError } from "../errors"
import type { FieldSpec, RecordSpec } from "../extract/extract"
import type { Parser, Resolved } from "../runtime/resolve"
import { defaultSupplier } from "./default-value"
import { type FieldClass, type StrategyId, selectStrategy } from "./strategies"

/**
 * What to do with a field that has both a custom deserializer and a default.
 *
 * - `reject`: declaration error.
 * - `fallback`: the default is used when the variable is absent.
 */
export type CustomDefaultsPolicy = "reject" | "fallback"

export type CompileFieldOptions = {
  customDefaults: CustomDefaultsPolicy
}

/** Compiled resolution call for one field. */
export type ResolutionPlan<T = unknown> = {
  readonly key: string
  readonly strategy: StrategyId
  readonly lookupName: string
  readonly fromFile: boolean
  readonly typeName: string
  resolve(env: EnvReader): Resolved<T | undefined>
}

function validate<T>(field: FieldSpec<T>, options: CompileFieldOptions): void {
  const hasDefault = field.default.kind !== "none"

  if (field.shape === "optional" && hasDefault) {
    throw new DeclarationError(
      `Field '${field.key}' is optional and cannot declare a default; absence already yields undefined`,
      { field: field.key, attribute: "default" },
    )
  }

  if (field.deserializer && hasDefault && options.customDefaults === "reject") {
    throw new DeclarationError(
      `Field '${field.key}' combines a custom deserializer with a default; ` +
        `compile with customDefaults: "fallback" to allow it`,
      { field: field.key, attribute: "default" },
    )
  }
}

function parserOf<T>(field: FieldSpec<T>): Parser<T> {
  if (field.deserializer) return { typeName: field.type.name, parse: field.deserializer }

  const parse = field.type.parse

  if (!parse) {
    throw new DeclarationError(
      `Field '${field.key}' has type '${field.type.name}' which has no native parser; declare a deserializer`,
      { field: field.key, attribute: "deserializer" },
    )
  }

  return { typeName: field.type.name, parse }
}

function fallbackOf<T>(field: FieldSpec<T>): (() => T) | undefined {
  const strategy = field.default

  switch (strategy.kind) {
    case "none":
      return undefined
    case "explicit":
      return defaultSupplier(strategy.value)
    case "type-default": {
      const typeDefault = field.type.typeDefault

      if (!typeDefault) {
        throw new DeclarationError(
          `Field '${field.key}' uses TYPE_DEFAULT but type '${field.type.name}' has no default value`,
          { field: field.key, attribute: "default" },
        )
      }

      return typeDefault
    }
  }
}

export function classify<T>(field: FieldSpec<T>): FieldClass {
  return {
    optional: field.shape === "optional",
    custom: field.deserializer !== undefined,
    hasDefault: field.default.kind !== "none",
  }
}

/**
 * Validates a field and binds it to its resolution strategy.
 *
 * @throws {DeclarationError} for contradictory attributes or a type that cannot be read.
 */
export function compileField<T>(field: FieldSpec<T>, options: CompileFieldOptions): ResolutionPlan<T> {
  validate(field, options)

  const parser = parserOf(field)
  const fallback = fallbackOf(field)
  const strategy = selectStrategy(classify(field))

  if (!strategy) {
    throw new DeclarationError(`No resolution strategy matches field '${field.key}'`, {
      field: field.key,
    })
  }

  return {
    key: field.key,
    strategy: strategy.id,
    lookupName: field.lookupName,
    fromFile: field.fromFile,
    typeName: parser.typeName,
    resolve: strategy.build({ field, parser, fallback }),
  }
}

export function compileRecord(spec: RecordSpec, options: CompileFieldOptions): ResolutionPlan[] {
  return spec.fields.map((field) => compileField(field, options))
}
