import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options define *policy*, not behavior:
 * - which log levels are emitted
 * - how logs are rendered for humans vs machines
 *
 * Concrete adapters must honor these options, but are free to choose how they
 * are implemented internally.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   *
   * @default "info"
   */
  level: LogLevelName

  /**
   * Whether to pretty-print log output for human readability.
   *
   * @remarks
   * Intended for local development. Leave it off where structured (JSON)
   * logs are collected.
   */
  prettify?: boolean
}
