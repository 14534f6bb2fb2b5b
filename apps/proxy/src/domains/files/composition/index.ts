import { MemoryKeyedLock } from "@rawcache/lock"
import type { AppConfig } from "../../../app/config"
import type { CoreServices } from "../../../app/services/core"
import type { InfraClients } from "../../../app/services/infra"
import { FileCacheOrchestrator } from "../services/file-cache-orchestrator"
import { RepositoryWhitelist } from "../services/repository-whitelist"

export type FileServices = {
  orchestrator: FileCacheOrchestrator
  whitelist: RepositoryWhitelist
}

export function createFileServices(
  config: AppConfig,
  core: CoreServices,
  infra: InfraClients,
): FileServices {
  const whitelist = new RepositoryWhitelist(config.repositories)

  if (whitelist.allowsEverything) {
    core.logger.warn("No repository whitelist configured, every repository is allowed")
  }

  const orchestrator = new FileCacheOrchestrator(
    {
      store: infra.store,
      origin: infra.origin,
      lock: new MemoryKeyedLock(),
      clock: core.clock,
      logger: core.logger,
      whitelist,
    },
    {
      ttl: { kind: "seconds", seconds: config.cache.ttlSeconds },
      ...(config.cache.lockTimeoutMs !== undefined && {
        lockTimeoutMs: config.cache.lockTimeoutMs,
      }),
    },
  )

  return { orchestrator, whitelist }
}
