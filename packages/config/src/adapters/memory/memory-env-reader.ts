import type { EnvReader } from "../../ports/env-reader"

export type MemoryEnvReaderOptions = {
  vars?: Record<string, string | undefined>
  /** File contents keyed by path. */
  files?: Record<string, string>
}

/**
 * In-process variables and files. Missing files fail the way `fs` does, with
 * an `ENOENT` error.
 */
export class MemoryEnvReader implements EnvReader {
  readonly name = "memory"
  private readonly vars: Map<string, string>
  private readonly files: Map<string, string>

  constructor(options: MemoryEnvReaderOptions = {}) {
    this.vars = new Map()
    this.files = new Map(Object.entries(options.files ?? {}))

    for (const [key, value] of Object.entries(options.vars ?? {})) {
      if (value !== undefined) this.vars.set(key, value)
    }
  }

  get(variable: string): string | undefined {
    return this.vars.get(variable)
  }

  keys(): string[] {
    return [...this.vars.keys()]
  }

  readFile(path: string): string {
    const contents = this.files.get(path)

    if (contents === undefined) {
      throw Object.assign(new Error(`ENOENT: no such file or directory, open '${path}'`), {
        code: "ENOENT",
        path,
      })
    }

    return contents
  }
}
