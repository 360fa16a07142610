import { z } from "zod"
import {
  type ConfigSchema,
  type Deserializer,
  type FieldAttributes,
  type FieldDeclaration,
  type FieldDeclarations,
  type FieldShape,
  type RecordAttributes,
  TYPE_DEFAULT,
} from "../../ports/field"
import type { ValueType } from "../../ports/value-type"
import { DeclarationError } from "../errors"
import { lookupNameOf } from "./lookup-name"

export type DefaultStrategy<T> =
  | { kind: "none" }
  | { kind: "type-default" }
  | { kind: "explicit"; value: T }

/** Normalized field, consumed by the compiler and then discarded. */
export type FieldSpec<T> = {
  readonly key: string
  readonly lookupName: string
  readonly shape: FieldShape
  readonly type: ValueType<T>
  readonly default: DefaultStrategy<T>
  readonly fromFile: boolean
  readonly deserializer: Deserializer<T> | undefined
}

export type RecordSpec = {
  readonly prefix: string
  readonly fields: readonly FieldSpec<unknown>[]
}

const fieldAttributesSchema = z.strictObject({
  name: z.string().min(1).optional(),
  default: z.unknown().optional(),
  fromFile: z.boolean().optional(),
  deserializer: z
    .custom<Deserializer<unknown>>((v) => typeof v === "function", "expected a function")
    .optional(),
})

const recordAttributesSchema = z.strictObject({
  prefix: z.string().optional(),
})

function checkBlock(schema: z.ZodType, block: unknown, field?: string): void {
  const result = schema.safeParse(block)

  if (result.success) return

  const where = field === undefined ? "record" : `field '${field}'`

  for (const issue of result.error.issues) {
    if (issue.code === "unrecognized_keys") {
      const [attribute = ""] = issue.keys

      throw new DeclarationError(`Unsupported attribute '${attribute}' on ${where}`, {
        field,
        attribute,
      })
    }
  }

  const [first] = result.error.issues
  const attribute = first?.path.map(String).join(".")

  throw new DeclarationError(`Invalid attributes on ${where}: ${z.prettifyError(result.error)}`, {
    field,
    attribute,
    cause: result.error,
  })
}

function mergeFieldAttributes<T>(blocks: readonly FieldAttributes<T>[]): FieldAttributes<T> {
  const merged: FieldAttributes<T> = {}

  for (const block of blocks) {
    if (block.name !== undefined) merged.name = block.name
    if (block.default !== undefined) merged.default = block.default
    if (block.fromFile !== undefined) merged.fromFile = block.fromFile
    if (block.deserializer !== undefined) merged.deserializer = block.deserializer
  }

  return merged
}

function defaultStrategyOf<T>(value: FieldAttributes<T>["default"]): DefaultStrategy<T> {
  if (value === undefined) return { kind: "none" }
  if (value === TYPE_DEFAULT) return { kind: "type-default" }

  return { kind: "explicit", value }
}

export function extractRecordAttributes(blocks: readonly RecordAttributes[]): { prefix: string } {
  let prefix = ""

  for (const block of blocks) {
    checkBlock(recordAttributesSchema, block)

    if (block.prefix !== undefined) prefix = block.prefix
  }

  return { prefix }
}

export function extractField<T>(
  key: string,
  declaration: FieldDeclaration<T>,
  prefix: string,
): FieldSpec<T> {
  for (const block of declaration.attributes) checkBlock(fieldAttributesSchema, block, key)

  const attributes = mergeFieldAttributes(declaration.attributes)

  return {
    key,
    lookupName: lookupNameOf(prefix, key, attributes.name),
    shape: declaration.shape,
    type: declaration.type,
    default: defaultStrategyOf(attributes.default),
    fromFile: attributes.fromFile ?? false,
    deserializer: attributes.deserializer,
  }
}

/** Turns a declared schema into a RecordSpec. Checks attribute keys only. */
export function extractRecord<F extends FieldDeclarations>(schema: ConfigSchema<F>): RecordSpec {
  const { prefix } = extractRecordAttributes(schema.attributes)

  const declarations: FieldDeclarations = schema.fields
  const fields = Object.entries(declarations).map(([key, declaration]) =>
    extractField(key, declaration, prefix),
  )

  return { prefix, fields }
}
