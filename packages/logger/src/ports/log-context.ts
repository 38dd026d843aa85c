/**
 * Fields a library or service binds once and carries on every entry.
 */
export type LogContext = {
  service: string
  module: string
  env: string

  /** The operation in flight, e.g. "capture" or "deserialize". */
  operation: string
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
