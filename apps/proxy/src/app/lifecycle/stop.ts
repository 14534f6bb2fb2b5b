import type { LifecycleHook } from "@rawcache/server"
import type { AppContext } from "../create-context"

export function createStopHooks(context: AppContext): LifecycleHook[] {
  const hooks: LifecycleHook[] = [
    {
      name: "stop:cache-store",
      fn: async () => {
        await context.infra.store.shutdown()
      },
    },
  ]

  const { dispatcher } = context.infra

  if (dispatcher) {
    hooks.push({
      name: "stop:origin",
      fn: async () => {
        await dispatcher.close()
      },
    })
  }

  return hooks
}

export type CreateStopHooksFn = typeof createStopHooks
