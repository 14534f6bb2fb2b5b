import type { Logger } from "@rawcache/logger"
import { decodeBase64, encodeBase64 } from "../../core/base64"
import { createMetadataCodec } from "../../core/metadata-codec"
import { StoreError, type StoreOperation } from "../../core/store.errors"
import { assertValidTtl } from "../../core/ttl"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheMetadata } from "../../ports/cache-metadata"
import type { CacheTtl } from "../../ports/cache-options"
import type { CacheResult } from "../../ports/cache-result"
import type { CacheStore } from "../../ports/cache-store"
import type { KeyspacePrefix } from "../../ports/keyspace-prefix"
import type { RedisTextClient, RedisTtl } from "./redis-client"
import { RedisConnection } from "./redis-connection"

export type RedisCacheStoreOptions = {
  /** Prepended to every key. Content keys additionally carry `content:`. */
  keyspacePrefix: KeyspacePrefix
}

export type RedisCacheStoreDeps = {
  client: RedisTextClient
  logger: Logger
}

export class RedisCacheStore implements CacheStore {
  private readonly connection: RedisConnection
  private readonly metadataCodec = createMetadataCodec()

  public constructor(
    deps: RedisCacheStoreDeps,
    private readonly opts: RedisCacheStoreOptions,
  ) {
    this.connection = new RedisConnection({
      client: deps.client,
      logger: deps.logger.child({ module: "redis-cache-store" }),
    })
  }

  async getMetadata(key: CacheKey): Promise<CacheResult<CacheMetadata>> {
    const text = await this.read("getMetadata", key, (c) => c.get(this.metadataKey(key)))

    if (text === null) return { kind: "miss" }

    try {
      return { kind: "hit", value: this.metadataCodec.decode(text) }
    } catch (err) {
      throw StoreError.readFailed("getMetadata", key, err)
    }
  }

  async setMetadata(key: CacheKey, metadata: CacheMetadata, ttl: CacheTtl): Promise<void> {
    assertValidTtl(ttl)
    const text = this.metadataCodec.encode(metadata)

    await this.write("setMetadata", key, (c) =>
      c.set(this.metadataKey(key), text, this.toRedisTtl(ttl)),
    )
  }

  async deleteMetadata(key: CacheKey): Promise<void> {
    await this.remove("deleteMetadata", key, (c) => c.del(this.metadataKey(key)))
  }

  async getContent(key: CacheKey): Promise<CacheResult<Uint8Array>> {
    const text = await this.read("getContent", key, (c) => c.get(this.contentKey(key)))

    if (text === null) return { kind: "miss" }

    return { kind: "hit", value: decodeBase64(text) }
  }

  async setContent(key: CacheKey, content: Uint8Array, ttl: CacheTtl): Promise<void> {
    assertValidTtl(ttl)
    const text = encodeBase64(content)

    await this.write("setContent", key, (c) =>
      c.set(this.contentKey(key), text, this.toRedisTtl(ttl)),
    )
  }

  async deleteContent(key: CacheKey): Promise<void> {
    await this.remove("deleteContent", key, (c) => c.del(this.contentKey(key)))
  }

  async shutdown(): Promise<void> {
    await this.connection.close()
  }

  private async read<T>(
    op: StoreOperation,
    key: CacheKey,
    command: (client: RedisTextClient) => Promise<T>,
  ): Promise<T> {
    try {
      return await this.connection.run(command)
    } catch (err) {
      throw StoreError.readFailed(op, key, err)
    }
  }

  private async write<T>(
    op: StoreOperation,
    key: CacheKey,
    command: (client: RedisTextClient) => Promise<T>,
  ): Promise<void> {
    try {
      await this.connection.run(command)
    } catch (err) {
      throw StoreError.writeFailed(op, key, err)
    }
  }

  private async remove<T>(
    op: StoreOperation,
    key: CacheKey,
    command: (client: RedisTextClient) => Promise<T>,
  ): Promise<void> {
    try {
      await this.connection.run(command)
    } catch (err) {
      throw StoreError.deleteFailed(op, key, err)
    }
  }

  private toRedisTtl(ttl: CacheTtl): RedisTtl {
    if (ttl.kind === "seconds") return { EX: ttl.seconds }
    if (ttl.kind === "milliseconds") return { PX: ttl.milliseconds }

    return { EXAT: Math.floor(ttl.expiresAt.getTime() / 1000) }
  }

  private metadataKey(key: CacheKey): string {
    return `${this.opts.keyspacePrefix}${key}`
  }

  private contentKey(key: CacheKey): string {
    return `${this.opts.keyspacePrefix}content:${key}`
  }
}
