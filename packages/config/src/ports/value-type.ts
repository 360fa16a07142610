/**
 * A target type a variable can be parsed into.
 *
 * @typeParam T - The parsed value type.
 */
export type ValueType<T> = {
  /** Type name used in parse errors, e.g. "number" or "url". */
  readonly name: string

  /**
   * Native string parser. Absent for types that can only be read through a
   * custom deserializer.
   */
  readonly parse?: (raw: string) => T

  /**
   * Natural default used by the `TYPE_DEFAULT` marker. Absent when the type has
   * no sensible zero value.
   */
  readonly typeDefault?: () => T
}
