export type LogContext = {
  service: string
  env: string
  module: string

  /** Name of the provider scope a chain was built for. */
  scope: string
  /** Name of the source that answered (or was skipped). */
  source: string
  /** `lookupKeyId` of the key being resolved. */
  lookup: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
