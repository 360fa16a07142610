/**
 * Configuration container providing type-safe access to a resolved record.
 *
 * @typeParam T - The record shape, inferred from the schema's field declarations.
 *
 * @example
 * ```typescript
 * const config = loadConfig({
 *   schema: defineConfig(
 *     {
 *       databaseUrl: required(types.string),
 *       port: required(types.integer, { default: 8080 }),
 *     },
 *     { prefix: "APP_" },
 *   ),
 * })
 *
 * config.value.port            // 8080
 * config.explain("databaseUrl") // "env:APP_DATABASE_URL"
 * config.explain("port")        // "default"
 * ```
 */
export interface IConfig<T extends object> {
  /** Full resolved config record */
  readonly value: T

  /** Field keys in declaration order. */
  keys(): (keyof T & string)[]

  /**
   * Explains where the final value for a key came from.
   *
   * @returns `env:NAME`, `file:NAME_FILE`, `default` or `absent`.
   */
  explain<K extends keyof T & string>(key: K): string

  /**
   * Returns variables under the record prefix that no field consumes.
   *
   * Useful for detecting typos and stale variables. Always empty for records
   * declared without a prefix.
   */
  unknownKeys(): string[]
}
