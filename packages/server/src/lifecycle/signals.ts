import type { Logger } from "@rawcache/logger"
import type { StopResult } from "./shutdown"

export interface SignalHandlerContext {
  logger: Logger
  stop?: () => Promise<StopResult>
  /** @default 10_000 */
  fatalTimeoutMs?: number
  /** @default process.exit */
  exit?: (code: number) => void
}

export interface SignalHandler {
  unregister: () => void
}

type State = { stopping: boolean }

/**
 * Registers process signal handlers for graceful shutdown.
 *
 * SIGINT and SIGTERM stop the server once. An uncaught exception or
 * unhandled rejection stops it and exits with code 1, forcing the exit if
 * stopping takes longer than `fatalTimeoutMs`.
 */
export function setupProcessHandlers(ctx: SignalHandlerContext): SignalHandler {
  const fatalTimeoutMs = ctx.fatalTimeoutMs ?? 10_000
  const exit = ctx.exit ?? ((code: number) => process.exit(code))
  const state: State = { stopping: false }

  const onSignal = (signal: NodeJS.Signals) => {
    ctx.logger.info("Received signal", { signal })

    if (state.stopping) return
    state.stopping = true

    ctx.logger.warn("Shutdown triggered", { reason: signal })
    void runStop(ctx, signal)
  }

  const onFatal = (reason: string, err: unknown) => {
    if (state.stopping) {
      ctx.logger.fatal("Fatal error during shutdown", { reason, err })
      exit(1)
      return
    }

    state.stopping = true
    ctx.logger.fatal("Fatal error", { reason, err })

    const timer = setTimeout(() => {
      ctx.logger.fatal("Forced exit after timeout", { timeoutMs: fatalTimeoutMs })
      exit(1)
    }, fatalTimeoutMs)
    timer.unref()

    void runStop(ctx, reason).finally(() => {
      clearTimeout(timer)
      exit(1)
    })
  }

  const sigintHandler = () => onSignal("SIGINT")
  const sigtermHandler = () => onSignal("SIGTERM")
  const uncaughtHandler = (err: Error) => onFatal("uncaughtException", err)
  const rejectionHandler = (reason: unknown) => onFatal("unhandledRejection", reason)

  process.on("SIGINT", sigintHandler)
  process.on("SIGTERM", sigtermHandler)
  process.on("uncaughtException", uncaughtHandler)
  process.on("unhandledRejection", rejectionHandler)

  return {
    unregister: () => {
      process.off("SIGINT", sigintHandler)
      process.off("SIGTERM", sigtermHandler)
      process.off("uncaughtException", uncaughtHandler)
      process.off("unhandledRejection", rejectionHandler)
    },
  }
}

async function runStop(ctx: SignalHandlerContext, reason: string): Promise<void> {
  if (!ctx.stop) {
    ctx.logger.warn("No stop handler registered", { reason })
    return
  }

  try {
    const result = await ctx.stop()

    if (!result.ok) {
      ctx.logger.error("Shutdown completed with issues", {
        reason,
        failureCount: result.failures.length,
        timedOut: result.timedOut,
      })
    }
  } catch (err) {
    ctx.logger.error("Shutdown failed", { reason, err })
  }
}
