import type { Logger } from "@rawcache/logger"
import type { Middleware } from "../server/server"
import { isNonEmptyString } from "./utils/is-non-empty-string"

/** Puts a request-scoped child logger on the context. */
export function requestLoggerMiddleware(baseLogger: Logger): Middleware {
  return async (c, next) => {
    const requestId = c.get("requestId")
    const bindings = isNonEmptyString(requestId) ? { requestId } : {}

    c.set("logger", baseLogger.child(bindings))

    await next()
  }
}
