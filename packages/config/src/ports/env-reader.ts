/**
 * Read-only view of the environment a configuration record is resolved against.
 *
 * An EnvReader only *reads*: variables by name and files by path. It does not
 * parse, coerce or default anything; that is the resolution runtime's job.
 */
export interface EnvReader {
  /**
   * Human-readable name for debugging and provenance.
   * Example: "env", "memory", "dotenv:.env", "layered(dotenv:.env,env)"
   */
  readonly name: string

  /**
   * Returns the raw value of a variable, or undefined when it is not set.
   *
   * An empty string is a value, not an absence.
   */
  get(variable: string): string | undefined

  /** Names of every variable currently set. */
  keys(): string[]

  /**
   * Reads a file referenced by a `{NAME}_FILE` variable.
   *
   * Returns the contents untouched. Throws the underlying I/O error when the
   * file cannot be read.
   */
  readFile(path: string): string
}
