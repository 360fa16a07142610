import type { EnvReader } from "../../ports/env-reader"
import { DeclarationError } from "../errors"
import type { FieldSpec } from "../extract/extract"
import {
  type Parser,
  type Resolved,
  resolveOptional,
  resolveRequired,
  resolveWithDefault,
} from "../runtime/resolve"

export const strategyIds = [
  "native-optional",
  "custom-optional",
  "custom-with-default",
  "custom-required",
  "native-with-default",
  "native-required",
] as const

export type StrategyId = (typeof strategyIds)[number]

/** What the dispatch table looks at. */
export type FieldClass = {
  optional: boolean
  custom: boolean
  hasDefault: boolean
}

export type PlanInput<T> = {
  field: FieldSpec<T>
  /** The type's native parser, or the field's deserializer for custom strategies. */
  parser: Parser<T>
  fallback: (() => T) | undefined
}

export type FieldResolver<T> = (env: EnvReader) => Resolved<T | undefined>

export type Strategy = {
  readonly id: StrategyId
  select(c: FieldClass): boolean
  build<T>(input: PlanInput<T>): FieldResolver<T>
}

function requireFallback<T>({ field, fallback }: PlanInput<T>): () => T {
  if (!fallback) {
    throw new DeclarationError(`Field '${field.key}' has no default to fall back on`, {
      field: field.key,
      attribute: "default",
    })
  }

  return fallback
}

const optionalResolver =
  <T>({ field, parser }: PlanInput<T>): FieldResolver<T> =>
  (env) =>
    resolveOptional(env, field, parser)

const defaultResolver = <T>(input: PlanInput<T>): FieldResolver<T> => {
  const fallback = requireFallback(input)

  return (env) => resolveWithDefault(env, input.field, input.parser, fallback)
}

const requiredResolver =
  <T>({ field, parser }: PlanInput<T>): FieldResolver<T> =>
  (env) =>
    resolveRequired(env, field, parser)

/**
 * The six resolution strategies, most specific first. Built once; a field is
 * dispatched to the first row whose `select` accepts its class.
 */
export const STRATEGY_TABLE: readonly Strategy[] = [
  {
    id: "native-optional",
    select: (c) => c.optional && !c.custom,
    build: optionalResolver,
  },
  {
    id: "custom-optional",
    select: (c) => c.optional && c.custom,
    build: optionalResolver,
  },
  {
    id: "custom-with-default",
    select: (c) => !c.optional && c.custom && c.hasDefault,
    build: defaultResolver,
  },
  {
    id: "custom-required",
    select: (c) => !c.optional && c.custom && !c.hasDefault,
    build: requiredResolver,
  },
  {
    id: "native-with-default",
    select: (c) => !c.optional && !c.custom && c.hasDefault,
    build: defaultResolver,
  },
  {
    id: "native-required",
    select: (c) => !c.optional && !c.custom && !c.hasDefault,
    build: requiredResolver,
  },
]

export function selectStrategy(c: FieldClass): Strategy | undefined {
  return STRATEGY_TABLE.find((strategy) => strategy.select(c))
}
