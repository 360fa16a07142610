export {
  type DotenvEnvReaderOptions,
  DotenvEnvReader,
} from "./adapters/dotenv/dotenv-env-reader"
export { LayeredEnvReader } from "./adapters/layered/layered-env-reader"
export { MemoryEnvReader, type MemoryEnvReaderOptions } from "./adapters/memory/memory-env-reader"
export {
  ProcessEnvReader,
  type ProcessEnvReaderOptions,
} from "./adapters/process/process-env-reader"
export {
  type CompileFieldOptions,
  type CustomDefaultsPolicy,
  compileField,
  type ResolutionPlan,
} from "./core/compile/compile"
export { STRATEGY_TABLE, type StrategyId, strategyIds } from "./core/compile/strategies"
export { Config } from "./core/config"
export { defineConfig, optional, required } from "./core/declare/declare"
export {
  ConfigurationError,
  DeclarationError,
  FileReadError,
  MissingVariableError,
  ParseError,
} from "./core/errors"
export {
  type DefaultStrategy,
  extractField,
  extractRecord,
  type FieldSpec,
  type RecordSpec,
} from "./core/extract/extract"
export { toEnvName } from "./core/extract/lookup-name"
export {
  type CompileOptions,
  CompiledConfig,
  compileConfig,
  fromEnv,
  type LoadConfigOptions,
  type LoadOptions,
  loadConfig,
} from "./core/load"
export {
  type Parser,
  type Provenance,
  type RawLookup,
  type Resolved,
  resolve,
  resolveOptional,
  resolveRequired,
  resolveWithDefault,
  type ValueSource,
} from "./core/runtime/resolve"
export { deserializers, types } from "./core/types"
export type { IConfig } from "./ports/config"
export type { EnvReader } from "./ports/env-reader"
export {
  type ConfigSchema,
  type Deserializer,
  type FieldAttributes,
  type FieldDeclaration,
  type FieldDeclarations,
  type FieldShape,
  type InferConfig,
  type InferField,
  type RecordAttributes,
  TYPE_DEFAULT,
  type TypeDefault,
} from "./ports/field"
export type { ValueType } from "./ports/value-type"
