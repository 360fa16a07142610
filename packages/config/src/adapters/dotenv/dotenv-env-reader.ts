import fs from "node:fs"
import path from "node:path"
import { parse } from "dotenv"
import type { EnvReader } from "../../ports/env-reader"

/**
 * Options for creating a dotenv reader.
 */
export type DotenvEnvReaderOptions = {
  /**
   * Path to the .env file.
   *
   * Can be absolute or relative to `cwd`.
   *
   * @example ".env", ".env.production", "./config/.env.defaults"
   */
  file: string

  /**
   * Whether the file must exist.
   *
   * - `true`: Throws on first read if file not found.
   * - `false`: Behaves as an empty environment if file not found.
   */
  required: boolean

  /**
   * Base directory for resolving the .env file and relative `{NAME}_FILE` paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

/** Variables parsed from a .env file. The file is read once, on first access. */
export class DotenvEnvReader implements EnvReader {
  readonly name: string
  private vars: Record<string, string> | undefined

  constructor(private readonly opts: DotenvEnvReaderOptions) {
    this.name = `dotenv:${opts.file}`
  }

  get(variable: string): string | undefined {
    const vars = this.load()

    return Object.hasOwn(vars, variable) ? vars[variable] : undefined
  }

  keys(): string[] {
    return Object.keys(this.load())
  }

  readFile(file: string): string {
    return fs.readFileSync(path.resolve(this.baseDir(), file), "utf-8")
  }

  private baseDir(): string {
    return this.opts.cwd ?? process.cwd()
  }

  private load(): Record<string, string> {
    if (this.vars) return this.vars

    const filePath = path.resolve(this.baseDir(), this.opts.file)

    try {
      this.vars = parse(fs.readFileSync(filePath, "utf-8"))
    } catch (err) {
      if (this.opts.required || !isNotFound(err)) throw err

      this.vars = {}
    }

    return this.vars
  }
}
