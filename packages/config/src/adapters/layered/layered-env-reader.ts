import type { EnvReader } from "../../ports/env-reader"

/**
 * Stacks readers. Later readers override earlier ones, so
 * `new LayeredEnvReader([dotenv, process])` lets real variables win over the
 * .env file. Files are read through the last reader.
 */
export class LayeredEnvReader implements EnvReader {
  readonly name: string

  constructor(private readonly readers: readonly [EnvReader, ...EnvReader[]]) {
    this.name = `layered(${readers.map((r) => r.name).join(",")})`
  }

  get(variable: string): string | undefined {
    for (let i = this.readers.length - 1; i >= 0; i--) {
      const value = this.readers[i]?.get(variable)

      if (value !== undefined) return value
    }

    return undefined
  }

  keys(): string[] {
    return [...new Set(this.readers.flatMap((r) => r.keys()))]
  }

  readFile(path: string): string {
    const [first, ...rest] = this.readers

    return (rest.at(-1) ?? first).readFile(path)
  }
}
