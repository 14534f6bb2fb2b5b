import type { Clock, UnixMs } from "@rawcache/clock"
import type { Logger } from "@rawcache/logger"
import { type HookFailure, type LifecycleHook, runHooks } from "./run-hooks"

export interface Closeable {
  close: (callback?: (err?: Error | null) => void) => void
}

export type ShutdownContext = {
  server: Closeable
  clock: Clock
  logger: Logger
  deadlineMs: UnixMs
  stopHooks: readonly LifecycleHook[]
}

/** `ok` is false when a hook failed or the deadline cut shutdown short. */
export type StopResult = {
  ok: boolean
  failures: HookFailure[]
  timedOut: boolean
}

/**
 * Stops accepting connections, then runs every stop hook even if earlier
 * ones failed.
 */
export async function shutdown(ctx: ShutdownContext): Promise<StopResult> {
  ctx.logger.warn("Shutting down gracefully...")

  const closeServer: LifecycleHook = {
    name: "server.close",
    fn: ({ signal }) => closeUntilAborted(ctx.server, signal),
  }

  const { failures, timedOut } = await runHooks(
    { phase: "shutdown", clock: ctx.clock, logger: ctx.logger, deadlineMs: ctx.deadlineMs },
    [closeServer, ...ctx.stopHooks],
  )

  const ok = failures.length === 0 && !timedOut

  ctx.logger.info("Shutdown complete", { ok, failures: failures.length, timedOut })

  return { ok, failures, timedOut }
}

/** Resolves once the server has closed, or as soon as `signal` aborts. */
function closeUntilAborted(server: Closeable, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) return resolve()

    signal.addEventListener("abort", () => resolve(), { once: true })
    server.close((err) => (err ? reject(err) : resolve()))
  })
}
