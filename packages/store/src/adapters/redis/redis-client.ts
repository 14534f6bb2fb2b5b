import type { Logger } from "@rawcache/logger"
import { createClient } from "redis"

export type RedisTtl = { EX: number } | { PX: number } | { EXAT: number }

/**
 * The slice of the node-redis client the cache store relies on. Replies are
 * decoded as UTF-8 strings, so binary payloads must be encoded by the caller.
 */
export type RedisTextClient = {
  isOpen: boolean
  connect(): Promise<unknown>
  close(): Promise<unknown>
  destroy(): void

  get(key: string): Promise<string | null>
  set(key: string, value: string, options: RedisTtl): Promise<string | null>
  del(keys: string | string[]): Promise<number>
}

export type RedisConnectionSettings =
  | { url: string }
  | { host: string; port: number; db: number; password?: string }

export function buildRedisUrl(settings: RedisConnectionSettings): string {
  if ("url" in settings) return settings.url

  const auth = settings.password ? `:${encodeURIComponent(settings.password)}@` : ""

  return `redis://${auth}${settings.host}:${settings.port}/${settings.db}`
}

const MAX_RECONNECT_RETRIES = 3
const RECONNECT_BASE_DELAY_MS = 50
const RECONNECT_MAX_DELAY_MS = 500
const CONNECT_TIMEOUT_MS = 2_000

/**
 * Backoff for node-redis socket reconnects. Gives up with an error after
 * a few retries, which closes the client and rejects the pending `connect()`.
 */
export function reconnectStrategy(retries: number, cause: Error): number | Error {
  if (retries >= MAX_RECONNECT_RETRIES) {
    return new Error(`Redis unreachable after ${retries} reconnect attempts`, { cause })
  }

  return Math.min(RECONNECT_BASE_DELAY_MS * 2 ** retries, RECONNECT_MAX_DELAY_MS)
}

/**
 * Commands fail at once while the socket is down instead of queueing, so
 * callers see a connection error and can fall back.
 */
export function createRedisClient(
  settings: RedisConnectionSettings,
  deps: { logger: Logger },
): RedisTextClient {
  const client = createClient({
    url: buildRedisUrl(settings),
    disableOfflineQueue: true,
    socket: {
      connectTimeout: CONNECT_TIMEOUT_MS,
      reconnectStrategy,
    },
  })

  // node-redis emits socket errors here while it reconnects; an unhandled
  // "error" event would crash the process.
  client.on("error", (err: unknown) => {
    deps.logger.warn("Redis client error", { err })
  })

  return client as unknown as RedisTextClient
}
