import type { Clock, UnixMs } from "@rawcache/clock"
import type { Logger } from "@rawcache/logger"

export interface LifecycleHookContext {
  /** Aborted when the phase deadline passes. */
  signal: AbortSignal
}

/** Named async step run at startup (connect clients) or shutdown (release them). */
export interface LifecycleHook {
  name: string
  fn: (ctx: LifecycleHookContext) => Promise<void>
}

export interface HookFailure {
  hook: string
  error: unknown
}

export type RunHooksContext = {
  phase: "startup" | "shutdown"
  clock: Clock
  logger: Logger
  deadlineMs: UnixMs
}

export type RunHooksResult = { failures: HookFailure[]; timedOut: boolean }

/**
 * Runs hooks in order until the deadline. Startup stops at the first
 * failure; shutdown keeps going so every resource gets a chance to close.
 */
export async function runHooks(
  ctx: RunHooksContext,
  hooks: readonly LifecycleHook[],
): Promise<RunHooksResult> {
  const failures: HookFailure[] = []

  for (const hook of hooks) {
    const msLeft = ctx.deadlineMs - ctx.clock.nowMs()

    if (msLeft <= 0) {
      ctx.logger.warn(`Skipping remaining ${ctx.phase} hooks due to timeout`)
      return { failures, timedOut: true }
    }

    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), msLeft)

    try {
      await hook.fn({ signal: controller.signal })
      ctx.logger.info(`Executed ${ctx.phase} hook: ${hook.name}`)
    } catch (error) {
      ctx.logger.error(`Hook failed during ${ctx.phase}: ${hook.name}`, { err: error })
      failures.push({ hook: hook.name, error })
      if (ctx.phase === "startup") return { failures, timedOut: false }
    } finally {
      clearTimeout(timeoutId)
    }

    if (controller.signal.aborted || ctx.clock.nowMs() >= ctx.deadlineMs) {
      ctx.logger.warn(`Deadline exceeded during ${ctx.phase} hook: ${hook.name}`)
      return { failures, timedOut: true }
    }
  }

  return { failures, timedOut: false }
}
