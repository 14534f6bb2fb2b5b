export { MemoryCacheStore, type MemoryCacheStoreDeps } from "./adapters/memory/memory-cache-store"
export {
  RedisCacheStore,
  type RedisCacheStoreDeps,
  type RedisCacheStoreOptions,
} from "./adapters/redis/redis-cache-store"
export {
  buildRedisUrl,
  createRedisClient,
  type RedisConnectionSettings,
  type RedisTextClient,
} from "./adapters/redis/redis-client"
export { isConnectionError, RedisConnection } from "./adapters/redis/redis-connection"
export {
  SqliteCacheStore,
  type SqliteCacheStoreDeps,
  type SqliteCacheStoreOptions,
} from "./adapters/sqlite/sqlite-cache-store"
export { createMetadataCodec } from "./core/metadata-codec"
export { StoreError, type StoreErrorCode, type StoreOperation } from "./core/store.errors"
export { ttlToExpiresAtMs } from "./core/ttl"
export type { CacheKey } from "./ports/cache-key"
export type { CacheMetadata } from "./ports/cache-metadata"
export type { CacheTtl } from "./ports/cache-options"
export type { CacheHit, CacheMiss, CacheResult } from "./ports/cache-result"
export type { CacheStore } from "./ports/cache-store"
export type { Codec } from "./ports/codec"
export type { KeyspacePrefix } from "./ports/keyspace-prefix"
