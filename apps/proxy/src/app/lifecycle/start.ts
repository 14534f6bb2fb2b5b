import type { LifecycleHook } from "@rawcache/server"
import type { AppContext } from "../create-context"

export function createStartHooks(context: AppContext): LifecycleHook[] {
  const hooks: LifecycleHook[] = []
  const { redisClient } = context.infra

  if (redisClient) {
    hooks.push({
      name: "start:redis",
      fn: async () => {
        if (!redisClient.isOpen) await redisClient.connect()
      },
    })
  }

  return hooks
}

export type CreateStartHooksFn = typeof createStartHooks
