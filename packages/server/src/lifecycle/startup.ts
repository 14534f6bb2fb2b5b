import type { Clock, UnixMs } from "@rawcache/clock"
import type { Logger } from "@rawcache/logger"
import { ServerStartupError } from "../errors/server.errors"
import { type LifecycleHook, runHooks } from "./run-hooks"

export type StartupContext = {
  clock: Clock
  logger: Logger
  deadlineMs: UnixMs
  startHooks: readonly LifecycleHook[]
}

/**
 * Runs start hooks in order and stops at the first failure.
 *
 * @throws ServerStartupError when a hook failed or the deadline passed
 */
export async function startup(ctx: StartupContext): Promise<void> {
  ctx.logger.debug("Running startup hooks...")

  const { failures, timedOut } = await runHooks(
    { phase: "startup", clock: ctx.clock, logger: ctx.logger, deadlineMs: ctx.deadlineMs },
    ctx.startHooks,
  )

  if (failures.length > 0 || timedOut) {
    throw ServerStartupError.hooksFailed(failures, timedOut)
  }
}
