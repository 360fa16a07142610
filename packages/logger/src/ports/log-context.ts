/**
 * Well-known context fields. Everything is optional at the call site; loggers
 * carry whatever subset has been bound through `child()`.
 */
export type LogContext = {
  /** Configuration record the entry is about. */
  schema: string
  /** Name of the environment source being read. */
  reader: string
  /** Field key inside the record. */
  field: string
  /** Environment variable consulted for the field. */
  variable: string
  /** Where the value came from (`env:NAME`, `file:NAME_FILE`, `default`, `absent`). */
  source: string
  /** Resolution strategy selected for the field. */
  strategy: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
