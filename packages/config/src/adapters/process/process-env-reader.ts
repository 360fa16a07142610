import fs from "node:fs"
import path from "node:path"
import type { EnvReader } from "../../ports/env-reader"

export type ProcessEnvReaderOptions = {
  /** Variables to read. Defaults to `process.env`. */
  env?: Record<string, string | undefined>
  /**
   * Base directory for relative `{NAME}_FILE` paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

/** Reads the process environment and the local filesystem. */
export class ProcessEnvReader implements EnvReader {
  readonly name = "env"
  private readonly env: Record<string, string | undefined>
  private readonly cwd: string | undefined

  constructor(options: ProcessEnvReaderOptions = {}) {
    this.env = options.env ?? process.env
    this.cwd = options.cwd
  }

  get(variable: string): string | undefined {
    return Object.hasOwn(this.env, variable) ? this.env[variable] : undefined
  }

  keys(): string[] {
    return Object.keys(this.env).filter((key) => this.env[key] !== undefined)
  }

  readFile(file: string): string {
    return fs.readFileSync(path.resolve(this.cwd ?? process.cwd(), file), "utf-8")
  }
}
