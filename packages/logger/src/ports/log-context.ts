/**
 * Well-known fields carried on log lines. Adapters render them as
 * top-level keys so they can be queried consistently.
 */
export type LogContext = {
  requestId: string

  method: string
  path: string
  status: number
  durationMs: number

  service: string
  module: string
  env: string

  /** Encoded storage key of the file a line is about. */
  key: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/** Overlay applied by `child()`. */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
