export type LogContext = {
  service: string
  module: string
  env: string

  /** Native codec in use, e.g. "json" or "msgpack" */
  codec: string
  wireName: string
  typeName: string
}

type LogEvent = {
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
