import { HttpOriginClient, type OriginClient } from "@rawcache/origin"
import {
  type CacheStore,
  createRedisClient,
  RedisCacheStore,
  type RedisTextClient,
  SqliteCacheStore,
} from "@rawcache/store"
import Database from "better-sqlite3"
import { Agent, type Dispatcher } from "undici"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"

export type InfraClients = {
  store: CacheStore
  origin: OriginClient

  /** Set when the store is Redis-backed; connected by a start hook. */
  redisClient?: RedisTextClient

  /** Connection pool of the origin client; closed by a stop hook. */
  dispatcher?: Dispatcher
}

export function createInfraClients(config: AppConfig, core: CoreServices): InfraClients {
  const dispatcher = new Agent({ maxRedirections: config.origin.maxRedirections })

  const origin = new HttpOriginClient(
    { logger: core.logger, dispatcher },
    { baseUrl: config.origin.baseUrl, timeoutMs: config.origin.timeoutMs },
  )

  const storeConfig = config.cache.store

  if (storeConfig.kind === "redis") {
    const redisClient = createRedisClient(storeConfig.connection, { logger: core.logger })

    const store = new RedisCacheStore(
      { client: redisClient, logger: core.logger },
      { keyspacePrefix: storeConfig.keyPrefix },
    )

    core.logger.info("Using Redis cache store", { keyPrefix: storeConfig.keyPrefix })

    return { store, origin, redisClient, dispatcher }
  }

  const db = new Database(storeConfig.filePath)
  db.pragma("journal_mode = WAL")

  const store = new SqliteCacheStore(
    { db, clock: core.clock, logger: core.logger },
    {
      ...(storeConfig.sweepIntervalMs !== undefined && {
        sweepIntervalMs: storeConfig.sweepIntervalMs,
      }),
    },
  )

  core.logger.info("Using SQLite cache store", { filePath: storeConfig.filePath })

  return { store, origin, dispatcher }
}
