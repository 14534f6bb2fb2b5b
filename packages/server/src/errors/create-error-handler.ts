import type { ErrorCode } from "@rawcache/errors"
import type { Logger } from "@rawcache/logger"
import type { ErrorHandler as HonoErrorHandler } from "hono"
import { createErrorFormatter, type ErrorMappingsConfig, type StatusCode } from "./errors"

export type ErrorHandler = HonoErrorHandler

export function createErrorHandler(config: ErrorMappingsConfig, logger: Logger): ErrorHandler {
  const formatter = createErrorFormatter(config)

  return (err, c) => {
    const requestId = c.get("requestId") ?? "unknown"
    const response = formatter(err, requestId)

    logError(c.get("logger") ?? logger, err, {
      requestId,
      method: c.req.method,
      route: c.req.routePath,
      status: response.error.status,
      code: response.error.code,
    })

    return c.json(response, response.error.status)
  }
}

type ErrorLogMeta = {
  requestId: string
  method: string
  route: string
  status: StatusCode
  code: ErrorCode
}

/**
 * Centralized error logging policy:
 * - 5xx => error with `err`
 * - 4xx => info without `err`, debug with `err`
 */
function logError(logger: Logger, err: unknown, meta: ErrorLogMeta): void {
  const base = { ...meta, op: `${meta.method} ${meta.route}` }

  if (meta.status >= 500) {
    logger.error("Request failed", { ...base, err })
    return
  }

  logger.info("Request failed", base)
  logger.debug("Request failed details", { ...base, err })
}
