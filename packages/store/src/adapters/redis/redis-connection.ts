import type { Logger } from "@rawcache/logger"
import {
  ClientClosedError,
  ClientOfflineError,
  ConnectionTimeoutError,
  SocketClosedUnexpectedlyError,
} from "redis"
import type { RedisTextClient } from "./redis-client"

const connectionErrorCodes = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "EPIPE",
  "ETIMEDOUT",
  "ENOTCONN",
])

export function isConnectionError(err: unknown): boolean {
  if (
    err instanceof ClientClosedError ||
    err instanceof ClientOfflineError ||
    err instanceof ConnectionTimeoutError ||
    err instanceof SocketClosedUnexpectedlyError
  ) {
    return true
  }

  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return connectionErrorCodes.has(err.code)
  }

  return false
}

export type RedisConnectionDeps = {
  client: RedisTextClient
  logger: Logger
}

/**
 * Runs commands against a client that may have lost its connection.
 *
 * A command that fails with a connection-class error triggers one reconnect
 * and one retry. Reconnects requested concurrently share a single attempt,
 * and a caller whose command failed on a connection that has since been
 * replaced retries on the new one without reconnecting again.
 * Any other error, or a failure of the retry itself, is propagated.
 */
export class RedisConnection {
  private reconnecting: Promise<void> | null = null

  /** Bumped by every successful reconnect. */
  private generation = 0

  public constructor(private readonly deps: RedisConnectionDeps) {}

  async run<T>(command: (client: RedisTextClient) => Promise<T>): Promise<T> {
    if (!this.deps.client.isOpen) {
      await this.reconnect(this.generation)
    }

    const generation = this.generation

    try {
      return await command(this.deps.client)
    } catch (err) {
      if (!isConnectionError(err)) throw err

      this.deps.logger.warn("Redis connection lost, reconnecting", { err })

      await this.reconnect(generation)

      return command(this.deps.client)
    }
  }

  /**
   * Opens a fresh connection, unless one was already opened after
   * `seenGeneration`; the caller then retries on that one.
   */
  reconnect(seenGeneration: number): Promise<void> {
    if (this.reconnecting) return this.reconnecting
    if (seenGeneration !== this.generation) return Promise.resolve()

    this.reconnecting = this.openFreshConnection()
      .then(() => {
        this.generation += 1
      })
      .finally(() => {
        this.reconnecting = null
      })

    return this.reconnecting
  }

  async close(): Promise<void> {
    if (this.deps.client.isOpen) {
      await this.deps.client.close()
    }
  }

  private async openFreshConnection(): Promise<void> {
    if (this.deps.client.isOpen) {
      this.deps.client.destroy()
    }

    await this.deps.client.connect()
  }
}
