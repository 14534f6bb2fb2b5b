import type { CacheKey } from "./cache-key"
import type { CacheMetadata } from "./cache-metadata"
import type { CacheTtl } from "./cache-options"
import type { CacheResult } from "./cache-result"

/**
 * Durable storage for cached files, split into a metadata record and a
 * content blob that are read, written and deleted independently.
 *
 * @remarks
 * - A read after the entry's TTL elapsed is a miss, exactly as if it was
 *   never written.
 * - A read after a delete (with no later write) is a miss.
 * - Deleting an absent entry is a no-op.
 * - Backend failures are thrown as `StoreError`. Callers decide whether
 *   to degrade; adapters do not swallow them.
 */
export interface CacheStore {
  getMetadata(key: CacheKey): Promise<CacheResult<CacheMetadata>>
  setMetadata(key: CacheKey, metadata: CacheMetadata, ttl: CacheTtl): Promise<void>
  deleteMetadata(key: CacheKey): Promise<void>

  getContent(key: CacheKey): Promise<CacheResult<Uint8Array>>
  setContent(key: CacheKey, content: Uint8Array, ttl: CacheTtl): Promise<void>
  deleteContent(key: CacheKey): Promise<void>

  /** Release connections and timers. The store must not be used afterwards. */
  shutdown(): Promise<void>
}
