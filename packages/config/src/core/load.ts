import { type AppError, isAppError } from "@envbind/errors"
import { type Logger, NullLogger } from "@envbind/logger"
import { ProcessEnvReader } from "../adapters/process/process-env-reader"
import type { IConfig } from "../ports/config"
import type { EnvReader } from "../ports/env-reader"
import type { ConfigSchema, FieldDeclarations, InferConfig } from "../ports/field"
import { type CustomDefaultsPolicy, compileRecord, type ResolutionPlan } from "./compile/compile"
import { Config } from "./config"
import { ConfigurationError } from "./errors"
import { extractRecord } from "./extract/extract"
import { describeProvenance, fileVariable } from "./runtime/resolve"

export type CompileOptions = {
  /** @default "reject" */
  customDefaults?: CustomDefaultsPolicy
  /** @default NullLogger */
  logger?: Logger
  /** Record name bound to every log entry as `schema`. @default "config" */
  name?: string
}

export type LoadOptions = {
  /**
   * Resolve every field and throw one {@link ConfigurationError} listing all
   * failures, instead of stopping at the first one.
   *
   * @default false
   */
  collectErrors?: boolean
}

export type LoadConfigOptions<F extends FieldDeclarations> = CompileOptions &
  LoadOptions & {
    schema: ConfigSchema<F>
    /** @default new ProcessEnvReader() */
    env?: EnvReader
  }

/**
 * A schema whose fields have been validated and bound to their resolution
 * strategies. Load it any number of times, against any environment.
 */
export class CompiledConfig<T extends object> {
  constructor(
    readonly plans: readonly ResolutionPlan[],
    private readonly prefix: string,
    private readonly logger: Logger,
    private readonly isComplete: (value: object) => value is T,
  ) {}

  load(env: EnvReader = new ProcessEnvReader(), options: LoadOptions = {}): IConfig<T> {
    const log = this.logger.child({ reader: env.name })
    const value: Record<string, unknown> = {}
    const provenance = new Map<string, string>()
    const failures: AppError[] = []

    for (const plan of this.plans) {
      const fieldLog = log.child({ field: plan.key, variable: plan.lookupName })

      try {
        const resolved = plan.resolve(env)
        const source = describeProvenance(resolved.source)

        value[plan.key] = resolved.value
        provenance.set(plan.key, source)

        fieldLog.debug("Resolved config field", { source })
      } catch (err) {
        if (!options.collectErrors || !isAppError(err)) {
          fieldLog.error("Failed to load configuration", { err })
          throw err
        }

        fieldLog.debug("Config field failed", { err })
        failures.push(err)
      }
    }

    if (failures.length > 0) {
      const error = new ConfigurationError(failures)

      log.error("Failed to load configuration", { err: error })
      throw error
    }

    if (!this.isComplete(value)) {
      throw new Error("Resolved configuration is missing declared fields")
    }

    const unknownKeys = this.unknownKeys(env)

    if (unknownKeys.length > 0) {
      log.warn("Unknown configuration variables", { unknownKeys })
    }

    log.info("Loaded configuration", { fields: this.plans.length })

    return new Config<T>(value, provenance, unknownKeys)
  }

  private unknownKeys(env: EnvReader): string[] {
    if (!this.prefix) return []

    const consumed = new Set<string>()

    for (const plan of this.plans) {
      consumed.add(plan.lookupName)
      if (plan.fromFile) consumed.add(fileVariable(plan.lookupName))
    }

    return env
      .keys()
      .filter((key) => key.startsWith(this.prefix) && !consumed.has(key))
      .sort()
  }
}

/**
 * Extracts and compiles a schema. Every declaration error surfaces here,
 * before any variable is read.
 *
 * @throws {DeclarationError}
 */
export function compileConfig<F extends FieldDeclarations>(
  schema: ConfigSchema<F>,
  options: CompileOptions = {},
): CompiledConfig<InferConfig<F>> {
  const logger = (options.logger ?? new NullLogger()).child({ schema: options.name ?? "config" })
  const spec = extractRecord(schema)
  const plans = compileRecord(spec, { customDefaults: options.customDefaults ?? "reject" })

  for (const plan of plans) {
    logger.trace("Compiled config field", {
      field: plan.key,
      variable: plan.lookupName,
      strategy: plan.strategy,
    })
  }

  const keys = Object.keys(schema.fields)
  const isComplete = (value: object): value is InferConfig<F> => keys.every((key) => key in value)

  return new CompiledConfig(plans, spec.prefix, logger, isComplete)
}

/**
 * Compiles a schema and resolves it once.
 *
 * @example
 * ```typescript
 * const config = loadConfig({
 *   schema,
 *   env: new LayeredEnvReader([
 *     new DotenvEnvReader({ file: ".env", required: false }),
 *     new ProcessEnvReader(),
 *   ]),
 *   collectErrors: true,
 * })
 * ```
 */
export function loadConfig<F extends FieldDeclarations>({
  schema,
  env,
  collectErrors,
  ...compileOptions
}: LoadConfigOptions<F>): IConfig<InferConfig<F>> {
  return compileConfig(schema, compileOptions).load(env, { collectErrors })
}

/** Resolves a schema against `env` and returns the plain record. */
export function fromEnv<F extends FieldDeclarations>(
  schema: ConfigSchema<F>,
  env?: EnvReader,
): InferConfig<F> {
  return loadConfig({ schema, env }).value
}
