export type ErrorCode = Lowercase<string>

/**
 * Structured data attached to an error (keys, URLs, status codes).
 * Keep it JSON-safe so it can be logged and returned as-is.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Stable machine-readable code, e.g. `file_not_found`. */
  readonly code: ErrorCode

  readonly context: ErrorContext

  readonly cause?: unknown
}
