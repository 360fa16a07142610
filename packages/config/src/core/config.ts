import type { IConfig } from "../ports/config"

export class Config<T extends object> implements IConfig<T> {
  constructor(
    private readonly data: Readonly<T>,
    private readonly provenance: ReadonlyMap<string, string>,
    private readonly unconsumed: readonly string[],
  ) {
    Object.freeze(this.data)
  }

  get value(): T {
    return this.data
  }

  keys(): (keyof T & string)[] {
    return [...this.provenance.keys()].filter((k): k is keyof T & string => k in this.data)
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.provenance.get(key) ?? "absent"
  }

  unknownKeys(): string[] {
    return [...this.unconsumed]
  }
}
