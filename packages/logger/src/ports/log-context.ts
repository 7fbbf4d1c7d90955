/**
 * Well-known fields carried by storage log entries.
 */
export type LogContext = {
  service: string
  module: string
  env: string

  bucket: string
  key: string
  operation: string

  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * Overlay merged into an existing context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
