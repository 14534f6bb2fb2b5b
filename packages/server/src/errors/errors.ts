import { type ErrorCode, isAppError } from "@rawcache/errors"
import type { ContentfulStatusCode } from "hono/utils/http-status"

export type StatusCode = ContentfulStatusCode

/** Status and public message for one error code. The message defaults to the error's own. */
export type ErrorMapping = {
  status: StatusCode
  message?: string
}

export interface ErrorMappingsConfig {
  mappings: Partial<Record<ErrorCode, ErrorMapping>>
}

export type ErrorResponse = {
  error: {
    status: StatusCode
    code: ErrorCode
    message: string
    requestId: string
  }
}

export type ErrorFormatter = (error: unknown, requestId: string) => ErrorResponse

const INTERNAL_STATUS = 500
const INTERNAL_MESSAGE = "An unexpected error occurred"

/**
 * Maps thrown errors to response bodies. Unmapped app errors keep their code
 * behind a 500; anything else becomes `internal_error`.
 */
export function createErrorFormatter(config: ErrorMappingsConfig): ErrorFormatter {
  return (error, requestId) => {
    if (!isAppError(error)) {
      return {
        error: { code: "internal_error", status: INTERNAL_STATUS, message: INTERNAL_MESSAGE, requestId },
      }
    }

    const mapping = config.mappings[error.code]

    return {
      error: {
        code: error.code,
        status: mapping?.status ?? INTERNAL_STATUS,
        message: mapping ? (mapping.message ?? error.message) : INTERNAL_MESSAGE,
        requestId,
      },
    }
  }
}
