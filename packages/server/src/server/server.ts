import type { Logger } from "@rawcache/logger"
import type { Hono, Context as HonoContext, MiddlewareHandler } from "hono"
import { ServerStartupError } from "../errors/server.errors"
import { buildApp } from "../lifecycle/build-app"
import { createStopper, type ServerHandle } from "../lifecycle/create-stopper"
import { listen } from "../lifecycle/listen"
import type { StopResult } from "../lifecycle/shutdown"
import { type SignalHandler, setupProcessHandlers } from "../lifecycle/signals"
import { startup } from "../lifecycle/startup"
import { resolveOptions, type ServerDependencies, type ServerOptions } from "./server-options"

export type Application = Hono
export type Context = HonoContext
export type Middleware = MiddlewareHandler

export type ServerState = "idle" | "starting" | "started"

export interface Server {
  /** The fully wired application; usable with `app.request()` before `start()`. */
  readonly app: Application
  setupProcessHandlers(): this
  start(): Promise<ServerHandle>
}

export function createServer(deps: ServerDependencies, options: ServerOptions): Server {
  const resolved = resolveOptions(options)
  const { logger, clock } = deps

  let ready = false
  let state: ServerState = "idle"
  let running: ServerHandle | undefined
  let signalHandler: SignalHandler | undefined

  const app = buildApp({ options: resolved, logger, isReady: () => ready })

  const server: Server = {
    app,

    setupProcessHandlers() {
      if (signalHandler) return server

      signalHandler = setupProcessHandlers({
        logger,
        stop: () => running?.stop() ?? noopStop(logger),
      })

      return server
    },

    async start() {
      if (state !== "idle") throw ServerStartupError.alreadyStarted()

      state = "starting"

      try {
        await startup({
          clock,
          logger,
          deadlineMs: clock.nowMs() + resolved.startupTimeoutMs,
          startHooks: resolved.startHooks,
        })

        const address = { host: resolved.host, port: resolved.port }

        running = createStopper({
          server: listen(app, address, logger),
          clock,
          logger,
          address,
          shutdownTimeoutMs: resolved.shutdownTimeoutMs,
          stopHooks: resolved.stopHooks,
          setReady: (value) => {
            ready = value
          },
          onStop: () => {
            signalHandler?.unregister()
            signalHandler = undefined
          },
        })

        ready = true
        state = "started"

        return running
      } catch (err) {
        state = "idle"
        ready = false
        throw err
      }
    },
  }

  return server
}

function noopStop(logger: Logger): Promise<StopResult> {
  logger.warn("Stop called but server not running")

  return Promise.resolve({ ok: true, failures: [], timedOut: false })
}
