import type { Logger } from "@rawcache/logger"
import type { Middleware } from "../server/server"
import type { EnabledRequestLoggingConfig, PathString } from "../server/server-options"

/**
 * Logs one line per completed request.
 *
 * Policy:
 * - 5xx => error
 * - else => config.level
 */
export function requestLoggingMiddleware(
  config: Required<EnabledRequestLoggingConfig>,
  baseLogger: Logger,
): Middleware {
  return async (c, next) => {
    const path = c.req.path

    if (shouldIgnore(path, config.ignorePaths)) {
      await next()
      return
    }

    const start = performance.now()

    try {
      await next()
    } finally {
      const status = c.res.status
      const method = c.req.method
      const route = c.req.routePath
      const userAgent = c.req.header("user-agent")

      const meta = {
        method,
        path,
        route,
        op: `${method} ${route}`,
        status,
        durationMs: Math.round(performance.now() - start),
        ...(userAgent !== undefined && { userAgent }),
      }

      const logger = c.get("logger") ?? baseLogger

      if (status >= 500) {
        logger.error("Request completed", meta)
      } else {
        logger[config.level]("Request completed", meta)
      }
    }
  }
}

function shouldIgnore(path: string, ignorePaths: readonly PathString[]): boolean {
  return ignorePaths.some((ignored) => path === ignored || path.startsWith(`${ignored}/`))
}
