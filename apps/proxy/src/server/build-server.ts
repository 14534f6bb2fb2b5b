import {
  type Application,
  createServer,
  type LifecycleHook,
  type ReadinessCheck,
  type Server,
} from "@rawcache/server"
import type { AppContext } from "../app/create-context"

export type BuiltServer = {
  app: Application
  server: Server
  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
}

export function buildServer(ctx: AppContext): BuiltServer {
  const { config } = ctx
  const { core } = ctx.services

  const startHooks = ctx.createStartHooks(ctx)
  const stopHooks = ctx.createStopHooks(ctx)

  const server = createServer(
    {
      clock: core.clock,
      logger: core.logger,
    },
    {
      host: config.server.host,
      port: config.server.port,
      shutdownTimeoutMs: config.server.shutdownTimeoutMs,

      errorHandling: {
        mappings: {
          repository_not_allowed: { status: 403 },
          file_not_found: { status: 404 },
          invalid_file_path: { status: 400 },
          invalid_file_query: { status: 400 },
          upstream_rejected: { status: 502, message: "Origin rejected the request" },
          upstream_unreachable: { status: 502, message: "Origin is unreachable" },
          upstream_failed: { status: 502, message: "Origin fetch failed" },
          lock_not_acquired: { status: 503, message: "File is busy, retry later" },
        },
      },

      requestId: config.requestId.enabled
        ? {
            enabled: true,
            header: config.requestId.header,
            fallbackToTraceparent: config.requestId.fallbackToTraceparent,
          }
        : { enabled: false },

      requestLogging: config.requestLogging.enabled
        ? { enabled: true, level: config.requestLogging.level }
        : { enabled: false },

      health: {
        enabled: true,
        livenessPath: config.server.livenessPath,
        readinessPath: config.server.readinessPath,
        readinessChecks: createReadinessChecks(ctx),
      },

      routes: (app: Application): void => {
        ctx.registerRoutes(app, config, ctx.services.domains)
      },

      startHooks,
      stopHooks,
    },
  )

  return {
    app: server.app,
    server,
    startHooks,
    stopHooks,
  }
}

function createReadinessChecks(ctx: AppContext): ReadinessCheck[] {
  const { redisClient } = ctx.infra

  if (!redisClient) return []

  return [{ name: "redis", fn: async () => redisClient.isOpen }]
}
