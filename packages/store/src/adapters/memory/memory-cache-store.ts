import type { Clock, UnixMs } from "@rawcache/clock"
import { assertValidTtl, ttlToExpiresAtMs } from "../../core/ttl"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheMetadata } from "../../ports/cache-metadata"
import type { CacheTtl } from "../../ports/cache-options"
import type { CacheResult } from "../../ports/cache-result"
import type { CacheStore } from "../../ports/cache-store"

export type MemoryCacheStoreDeps = {
  clock: Clock
}

type MemoryEntry<T> = {
  value: T
  expiresAtMs: UnixMs
}

/**
 * Process-local store. Expired entries are dropped lazily on read.
 */
export class MemoryCacheStore implements CacheStore {
  private readonly metadata = new Map<CacheKey, MemoryEntry<CacheMetadata>>()
  private readonly content = new Map<CacheKey, MemoryEntry<Uint8Array>>()

  public constructor(private readonly deps: MemoryCacheStoreDeps) {}

  async getMetadata(key: CacheKey): Promise<CacheResult<CacheMetadata>> {
    const entry = this.readEntry(this.metadata, key)

    if (!entry) return { kind: "miss" }

    return { kind: "hit", value: { ...entry.value, cachedAt: new Date(entry.value.cachedAt) } }
  }

  async setMetadata(key: CacheKey, metadata: CacheMetadata, ttl: CacheTtl): Promise<void> {
    assertValidTtl(ttl)

    this.metadata.set(key, {
      value: { ...metadata, cachedAt: new Date(metadata.cachedAt) },
      expiresAtMs: ttlToExpiresAtMs(ttl, this.deps.clock.nowMs()),
    })
  }

  async deleteMetadata(key: CacheKey): Promise<void> {
    this.metadata.delete(key)
  }

  async getContent(key: CacheKey): Promise<CacheResult<Uint8Array>> {
    const entry = this.readEntry(this.content, key)

    if (!entry) return { kind: "miss" }

    return { kind: "hit", value: new Uint8Array(entry.value) }
  }

  async setContent(key: CacheKey, content: Uint8Array, ttl: CacheTtl): Promise<void> {
    assertValidTtl(ttl)

    this.content.set(key, {
      value: new Uint8Array(content),
      expiresAtMs: ttlToExpiresAtMs(ttl, this.deps.clock.nowMs()),
    })
  }

  async deleteContent(key: CacheKey): Promise<void> {
    this.content.delete(key)
  }

  async shutdown(): Promise<void> {
    this.metadata.clear()
    this.content.clear()
  }

  /** Number of live and not yet collected entries, metadata and content combined. */
  size(): number {
    return this.metadata.size + this.content.size
  }

  private readEntry<T>(
    map: Map<CacheKey, MemoryEntry<T>>,
    key: CacheKey,
  ): MemoryEntry<T> | undefined {
    const entry = map.get(key)

    if (!entry) return undefined

    if (entry.expiresAtMs <= this.deps.clock.nowMs()) {
      map.delete(key)
      return undefined
    }

    return entry
  }
}
