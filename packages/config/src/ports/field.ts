import type { ValueType } from "./value-type"

/** Marker selecting the type's own default value as the absence fallback. */
export const TYPE_DEFAULT: unique symbol = Symbol("envbind.type-default")

export type TypeDefault = typeof TYPE_DEFAULT

export type Deserializer<T> = (raw: string) => T

export type FieldShape = "required" | "optional"

/**
 * Attribute block attached to a field. Several blocks may be given; later keys
 * overwrite earlier ones and a key set to `undefined` counts as not given.
 */
export type FieldAttributes<T> = {
  /** Variable name override. The record prefix is still prepended. */
  name?: string
  /** Fallback on absence: `TYPE_DEFAULT` or an explicit value. */
  default?: TypeDefault | T
  /** Enables `{NAME}_FILE` indirection. */
  fromFile?: boolean
  /** Replaces the type's native parser. */
  deserializer?: Deserializer<T>
}

export type FieldDeclaration<T, S extends FieldShape = FieldShape> = {
  readonly shape: S
  readonly type: ValueType<T>
  readonly attributes: readonly FieldAttributes<T>[]
}

export type FieldDeclarations = Record<string, FieldDeclaration<unknown>>

export type RecordAttributes = {
  /** Prepended verbatim to every lookup name, e.g. "APP_". */
  prefix?: string
}

export type ConfigSchema<F extends FieldDeclarations = FieldDeclarations> = {
  readonly fields: F
  readonly attributes: readonly RecordAttributes[]
}

export type InferField<D> = D extends FieldDeclaration<infer T, infer S>
  ? S extends "optional"
    ? T | undefined
    : T
  : never

/**
 * Record type produced by a schema.
 *
 * @example
 * ```typescript
 * const schema = defineConfig({ port: required(types.integer, { default: 8080 }) })
 * type AppConfig = InferConfig<typeof schema.fields> // { port: number }
 * ```
 */
export type InferConfig<F extends FieldDeclarations> = {
  [K in keyof F]: InferField<F[K]>
}
