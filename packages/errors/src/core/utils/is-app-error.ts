import type { AppError } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

/**
 * Type guard for {@link AppError}. Accepts `BaseError` instances as well as
 * structurally compatible errors from other copies of this package.
 */
export function isAppError(e: unknown): e is AppError {
  return (
    e instanceof Error &&
    "code" in e &&
    typeof e.code === "string" &&
    "context" in e &&
    isRecord(e.context)
  )
}
