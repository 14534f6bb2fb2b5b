import type { Logger } from "@rawcache/logger"
import { Hono } from "hono"
import { createErrorHandler } from "../errors/create-error-handler"
import { createDefaultMiddleware } from "../middleware/create-default-middleware"
import { registerHealthRoutes } from "../routes/health"
import type { Application, Middleware } from "../server/server"
import type { ResolvedServerOptions } from "../server/server-options"

export type BuildAppContext = {
  options: ResolvedServerOptions
  logger: Logger
  isReady: () => boolean
}

export function buildApp(ctx: BuildAppContext): Application {
  const { options, logger, isReady } = ctx

  const app = new Hono()

  registerHealthRoutes(app, options.health, isReady)

  applyMiddleware(app, createDefaultMiddleware(options, logger))

  applyMiddleware(app, options.middleware.pre)
  options.routes(app)
  applyMiddleware(app, options.middleware.post)

  app.notFound((c) =>
    c.json(
      {
        error: {
          status: 404,
          code: "route_not_found",
          message: `No route for ${c.req.method} ${c.req.path}`,
          requestId: c.get("requestId") ?? "unknown",
        },
      },
      404,
    ),
  )

  app.onError(createErrorHandler(options.errorHandling, logger))

  return app
}

function applyMiddleware(app: Application, middleware: readonly Middleware[]): void {
  for (const mw of middleware) app.use("*", mw)
}
