import type {
  ConfigSchema,
  FieldAttributes,
  FieldDeclaration,
  FieldDeclarations,
  RecordAttributes,
} from "../../ports/field"
import type { ValueType } from "../../ports/value-type"

/** A field whose absence is fatal unless it declares a default. */
export function required<T>(
  type: ValueType<T>,
  ...attributes: FieldAttributes<T>[]
): FieldDeclaration<T, "required"> {
  return { shape: "required", type, attributes }
}

/** A field that resolves to `undefined` when absent. It may not declare a default. */
export function optional<T>(
  type: ValueType<T>,
  ...attributes: FieldAttributes<T>[]
): FieldDeclaration<T, "optional"> {
  return { shape: "optional", type, attributes }
}

/**
 * Declares a configuration record.
 *
 * @example
 * ```typescript
 * const schema = defineConfig(
 *   {
 *     databaseUrl: required(types.string),
 *     port: required(types.integer, { default: 8080 }),
 *     apiKey: required(types.string, { fromFile: true }),
 *     logLevel: optional(types.oneOf("debug", "info")),
 *   },
 *   { prefix: "APP_" },
 * )
 * ```
 */
export function defineConfig<F extends FieldDeclarations>(
  fields: F,
  ...attributes: RecordAttributes[]
): ConfigSchema<F> {
  return { fields, attributes }
}
