import type { Clock, Milliseconds } from "@rawcache/clock"
import type { Logger } from "@rawcache/logger"
import type Database from "better-sqlite3"
import { createMetadataCodec } from "../../core/metadata-codec"
import { StoreError, type StoreOperation } from "../../core/store.errors"
import { assertValidTtl, ttlToExpiresAtMs } from "../../core/ttl"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheMetadata } from "../../ports/cache-metadata"
import type { CacheTtl } from "../../ports/cache-options"
import type { CacheResult } from "../../ports/cache-result"
import type { CacheStore } from "../../ports/cache-store"

export type SqliteCacheStoreDeps = {
  db: Database.Database
  clock: Clock
  logger: Logger
}

export type SqliteCacheStoreOptions = {
  /**
   * Interval of the background sweep that deletes expired rows. Reads never
   * return expired rows regardless; the sweep only reclaims space.
   *
   * Omit to sweep only once, when the store is created.
   */
  sweepIntervalMs?: Milliseconds
}

const schema = `
  CREATE TABLE IF NOT EXISTS cache (
    key        TEXT PRIMARY KEY,
    metadata   TEXT,
    content    BLOB,
    expires_at INTEGER NOT NULL
  )
`

/**
 * Single-file store for deployments without Redis.
 *
 * One row per key holds both the metadata and the content. `expires_at` is
 * in epoch milliseconds and is refreshed by either setter; a setter that
 * lands on an expired row clears the other column first. Empty content is
 * kept as a zero-length blob so it stays distinguishable from a cleared
 * column.
 */
export class SqliteCacheStore implements CacheStore {
  private readonly metadataCodec = createMetadataCodec()
  private readonly logger: Logger
  private readonly sweepTimer: NodeJS.Timeout | null

  private readonly statements: {
    selectMetadata: Database.Statement<[string, number], { metadata: string }>
    selectContent: Database.Statement<[string, number], { content: Buffer }>
    upsertMetadata: Database.Statement<[string, string, number, number]>
    upsertContent: Database.Statement<[string, Buffer, number, number]>
    clearMetadata: Database.Statement<[string]>
    clearContent: Database.Statement<[string]>
    deleteEmpty: Database.Statement<[string]>
    sweep: Database.Statement<[number]>
  }

  public constructor(
    private readonly deps: SqliteCacheStoreDeps,
    opts: SqliteCacheStoreOptions = {},
  ) {
    this.logger = deps.logger.child({ module: "sqlite-cache-store" })

    deps.db.exec(schema)

    this.statements = {
      selectMetadata: deps.db.prepare<[string, number], { metadata: string }>(
        "SELECT metadata FROM cache WHERE key = ? AND expires_at > ? AND metadata IS NOT NULL",
      ),
      selectContent: deps.db.prepare<[string, number], { content: Buffer }>(
        "SELECT content FROM cache WHERE key = ? AND expires_at > ? AND content IS NOT NULL",
      ),
      upsertMetadata: deps.db.prepare<[string, string, number, number]>(
        `INSERT INTO cache (key, metadata, expires_at) VALUES (?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET
           metadata = excluded.metadata,
           content = CASE WHEN cache.expires_at > ? THEN cache.content ELSE NULL END,
           expires_at = excluded.expires_at`,
      ),
      upsertContent: deps.db.prepare<[string, Buffer, number, number]>(
        `INSERT INTO cache (key, content, expires_at) VALUES (?, COALESCE(?, zeroblob(0)), ?)
         ON CONFLICT(key) DO UPDATE SET
           content = excluded.content,
           metadata = CASE WHEN cache.expires_at > ? THEN cache.metadata ELSE NULL END,
           expires_at = excluded.expires_at`,
      ),
      clearMetadata: deps.db.prepare<[string]>("UPDATE cache SET metadata = NULL WHERE key = ?"),
      clearContent: deps.db.prepare<[string]>("UPDATE cache SET content = NULL WHERE key = ?"),
      deleteEmpty: deps.db.prepare<[string]>(
        "DELETE FROM cache WHERE key = ? AND metadata IS NULL AND content IS NULL",
      ),
      sweep: deps.db.prepare<[number]>("DELETE FROM cache WHERE expires_at < ?"),
    }

    this.sweepExpired()

    if (opts.sweepIntervalMs !== undefined) {
      this.sweepTimer = setInterval(() => this.sweepInBackground(), opts.sweepIntervalMs)
      this.sweepTimer.unref()
    } else {
      this.sweepTimer = null
    }
  }

  async getMetadata(key: CacheKey): Promise<CacheResult<CacheMetadata>> {
    const row = this.read("getMetadata", key, () =>
      this.statements.selectMetadata.get(key, this.deps.clock.nowMs()),
    )

    if (!row) return { kind: "miss" }

    try {
      return { kind: "hit", value: this.metadataCodec.decode(row.metadata) }
    } catch (err) {
      throw StoreError.readFailed("getMetadata", key, err)
    }
  }

  async setMetadata(key: CacheKey, metadata: CacheMetadata, ttl: CacheTtl): Promise<void> {
    assertValidTtl(ttl)
    const text = this.metadataCodec.encode(metadata)
    const now = this.deps.clock.nowMs()
    const expiresAt = ttlToExpiresAtMs(ttl, now)

    this.write("setMetadata", key, () =>
      this.statements.upsertMetadata.run(key, text, expiresAt, now),
    )
  }

  async deleteMetadata(key: CacheKey): Promise<void> {
    this.remove("deleteMetadata", key, this.statements.clearMetadata)
  }

  async getContent(key: CacheKey): Promise<CacheResult<Uint8Array>> {
    const row = this.read("getContent", key, () =>
      this.statements.selectContent.get(key, this.deps.clock.nowMs()),
    )

    if (!row) return { kind: "miss" }

    return { kind: "hit", value: new Uint8Array(row.content) }
  }

  async setContent(key: CacheKey, content: Uint8Array, ttl: CacheTtl): Promise<void> {
    assertValidTtl(ttl)
    const blob = Buffer.from(content.buffer, content.byteOffset, content.byteLength)
    const now = this.deps.clock.nowMs()
    const expiresAt = ttlToExpiresAtMs(ttl, now)

    this.write("setContent", key, () =>
      this.statements.upsertContent.run(key, blob, expiresAt, now),
    )
  }

  async deleteContent(key: CacheKey): Promise<void> {
    this.remove("deleteContent", key, this.statements.clearContent)
  }

  async shutdown(): Promise<void> {
    if (this.sweepTimer) clearInterval(this.sweepTimer)
    if (this.deps.db.open) this.deps.db.close()
  }

  /** Deletes rows whose expiry lies in the past. Returns the number removed. */
  sweepExpired(): number {
    const { changes } = this.statements.sweep.run(this.deps.clock.nowMs())

    if (changes > 0) {
      this.logger.debug("Swept expired cache rows", { removed: changes })
    }

    return changes
  }

  private sweepInBackground(): void {
    try {
      this.sweepExpired()
    } catch (err) {
      this.logger.warn("Expired row sweep failed", { err })
    }
  }

  private read<T>(op: StoreOperation, key: CacheKey, query: () => T): T {
    try {
      return query()
    } catch (err) {
      throw StoreError.readFailed(op, key, err)
    }
  }

  private write(op: StoreOperation, key: CacheKey, statement: () => unknown): void {
    try {
      statement()
    } catch (err) {
      throw StoreError.writeFailed(op, key, err)
    }
  }

  private remove(op: StoreOperation, key: CacheKey, clear: Database.Statement<[string]>): void {
    try {
      this.deps.db.transaction(() => {
        clear.run(key)
        this.statements.deleteEmpty.run(key)
      })()
    } catch (err) {
      throw StoreError.deleteFailed(op, key, err)
    }
  }
}
