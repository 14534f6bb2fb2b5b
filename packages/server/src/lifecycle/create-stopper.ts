import type { Clock, Milliseconds } from "@rawcache/clock"
import type { Logger } from "@rawcache/logger"
import type { LifecycleHook } from "./run-hooks"
import { type Closeable, type StopResult, shutdown } from "./shutdown"

export interface ServerHandle {
  stop(): Promise<StopResult>
  address: { host: string; port: number }
}

export interface StopperContext {
  server: Closeable
  clock: Clock
  logger: Logger
  address: { host: string; port: number }
  shutdownTimeoutMs: Milliseconds
  stopHooks: readonly LifecycleHook[]
  setReady: (value: boolean) => void
  onStop: () => void
}

/** Handle whose `stop()` runs shutdown once; later calls share the first result. */
export function createStopper(ctx: StopperContext): ServerHandle {
  let stopping: Promise<StopResult> | undefined

  return {
    stop: () => {
      stopping ??= runShutdown(ctx)
      return stopping
    },
    address: ctx.address,
  }
}

async function runShutdown(ctx: StopperContext): Promise<StopResult> {
  ctx.setReady(false)

  try {
    return await shutdown({
      server: ctx.server,
      clock: ctx.clock,
      logger: ctx.logger,
      deadlineMs: ctx.clock.nowMs() + ctx.shutdownTimeoutMs,
      stopHooks: ctx.stopHooks,
    })
  } finally {
    ctx.onStop()
  }
}
