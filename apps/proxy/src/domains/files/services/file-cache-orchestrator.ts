import type { Clock, Milliseconds } from "@rawcache/clock"
import { type Lock, withLock } from "@rawcache/lock"
import type { Logger } from "@rawcache/logger"
import { type OriginClient, type OriginFileInfo, UpstreamError } from "@rawcache/origin"
import {
  type CacheKey,
  type CacheMetadata,
  type CacheResult,
  type CacheStore,
  type CacheTtl,
  StoreError,
  type StoreOperation,
} from "@rawcache/store"
import { describeFile, type FileKey, toStorageKey } from "../model/file-key"
import { NotFoundError, PermissionError } from "../model/files.errors"
import type { RepositoryWhitelist } from "./repository-whitelist"

export type FileCacheOrchestratorDeps = {
  store: CacheStore
  origin: OriginClient
  lock: Lock
  clock: Clock
  logger: Logger
  whitelist: RepositoryWhitelist
}

export type FileCacheOrchestratorOptions = {
  /** Lifetime of both the metadata and the content of a fetched file. */
  ttl: CacheTtl

  /** Bound on waiting behind another request's fetch of the same file. */
  lockTimeoutMs?: Milliseconds
}

export type CacheStatus = "hit" | "miss"

export type ResolvedFile = {
  content: Uint8Array
  contentType: string
  /** `hit` when served from the store, `miss` when fetched from the origin. */
  cacheStatus: CacheStatus
}

export type ResolveOptions = {
  /** Stops waiting for the file lock. A fetch already under way is not aborted. */
  signal?: AbortSignal
}

type CachedFile = {
  metadata: CacheMetadata
  content: Uint8Array
}

type ReadOutcome<T> = CacheResult<T> | { kind: "failed" }

/**
 * Cache-aside access to origin files.
 *
 * A miss is fetched under a per-file lock, so concurrent callers for the
 * same file share one origin round trip. Content is written before
 * metadata; metadata found without content is purged and treated as a
 * miss. Store failures degrade to origin fetches and are never surfaced.
 */
export class FileCacheOrchestrator {
  private readonly logger: Logger

  public constructor(
    private readonly deps: FileCacheOrchestratorDeps,
    private readonly opts: FileCacheOrchestratorOptions,
  ) {
    this.logger = deps.logger.child({ module: "file-cache" })
  }

  /**
   * @throws PermissionError when the repository is not allowed
   * @throws NotFoundError when the origin has no such file
   * @throws UpstreamError when the origin could not be read
   * @throws LockError when waiting for a concurrent fetch timed out or was aborted
   */
  async resolve(file: FileKey, options: ResolveOptions = {}): Promise<ResolvedFile> {
    this.assertAllowed(file)

    const key = toStorageKey(file)
    const cached = await this.readCached(key)

    if (cached) {
      this.logger.info("Cache hit", { key, size: cached.content.byteLength })
      return toResolved(cached, "hit")
    }

    return withLock(
      this.deps.lock,
      key,
      async () => {
        const filled = await this.readCached(key)

        if (filled) {
          this.logger.info("Cache hit after lock", { key })
          return toResolved(filled, "hit")
        }

        return this.fetchAndStore(file, key)
      },
      {
        ...(this.opts.lockTimeoutMs !== undefined && { timeoutMs: this.opts.lockTimeoutMs }),
        ...(options.signal !== undefined && { signal: options.signal }),
      },
    )
  }

  /**
   * Drops the cached metadata and content. Deleting an entry that is not
   * cached is a no-op.
   *
   * @throws PermissionError when the repository is not allowed
   */
  async invalidate(file: FileKey): Promise<void> {
    this.assertAllowed(file)

    const key = toStorageKey(file)

    await this.attemptWrite("deleteMetadata", key, () => this.deps.store.deleteMetadata(key))
    await this.attemptWrite("deleteContent", key, () => this.deps.store.deleteContent(key))

    this.logger.info("Cache invalidated", { key })
  }

  /** Current metadata for `file`, or `null` when it is not cached. */
  async getMetadata(file: FileKey): Promise<CacheMetadata | null> {
    const key = toStorageKey(file)
    const res = await this.attemptRead("getMetadata", key, () => this.deps.store.getMetadata(key))

    return res.kind === "hit" ? res.value : null
  }

  private assertAllowed(file: FileKey): void {
    if (!this.deps.whitelist.allows(file.owner, file.repository)) {
      this.logger.warn("Repository rejected by whitelist", {
        owner: file.owner,
        repository: file.repository,
      })
      throw PermissionError.notAllowed(file.owner, file.repository)
    }
  }

  private async readCached(key: CacheKey): Promise<CachedFile | null> {
    const metadata = await this.attemptRead("getMetadata", key, () =>
      this.deps.store.getMetadata(key),
    )

    if (metadata.kind !== "hit") return null

    const content = await this.attemptRead("getContent", key, () =>
      this.deps.store.getContent(key),
    )

    if (content.kind === "failed") return null

    if (content.kind === "miss") {
      this.logger.info("Cached metadata has no content, purging", { key })
      await this.attemptWrite("deleteMetadata", key, () => this.deps.store.deleteMetadata(key))
      return null
    }

    return { metadata: metadata.value, content: content.value }
  }

  private async fetchAndStore(file: FileKey, key: CacheKey): Promise<ResolvedFile> {
    this.logger.info("Fetching from origin", { key })

    const info = await this.callOrigin(() => this.deps.origin.fetchInfo(file))

    if (!info) throw NotFoundError.forFile(file)

    const content = await this.contentOf(info)

    const metadata: CacheMetadata = {
      fingerprint: info.fingerprint,
      contentType: info.contentType,
      cachedAt: this.deps.clock.now(),
      size: info.size,
    }

    const contentStored = await this.attemptWrite("setContent", key, () =>
      this.deps.store.setContent(key, content, this.opts.ttl),
    )

    // Without its content the metadata would only be purged on the next read.
    if (contentStored) {
      await this.attemptWrite("setMetadata", key, () =>
        this.deps.store.setMetadata(key, metadata, this.opts.ttl),
      )
    }

    this.logger.info("Cached file from origin", {
      key,
      file: describeFile(file),
      size: content.byteLength,
      contentType: info.contentType,
    })

    return { content, contentType: info.contentType, cacheStatus: "miss" }
  }

  private async contentOf(info: OriginFileInfo): Promise<Uint8Array> {
    if (info.content !== undefined) return info.content

    return this.callOrigin(() => this.deps.origin.download(info.downloadUrl))
  }

  private async callOrigin<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (err) {
      if (err instanceof UpstreamError) throw err
      throw UpstreamError.failed(err)
    }
  }

  private async attemptRead<T>(
    op: StoreOperation,
    key: CacheKey,
    fn: () => Promise<CacheResult<T>>,
  ): Promise<ReadOutcome<T>> {
    try {
      return await fn()
    } catch (err) {
      if (!(err instanceof StoreError)) throw err

      this.logger.warn("Cache read failed, treating as miss", { key, op, err })
      return { kind: "failed" }
    }
  }

  /** @returns `false` when the store failed and the write was skipped */
  private async attemptWrite(
    op: StoreOperation,
    key: CacheKey,
    fn: () => Promise<void>,
  ): Promise<boolean> {
    try {
      await fn()
      return true
    } catch (err) {
      if (!(err instanceof StoreError)) throw err

      this.logger.warn("Cache write failed, continuing without it", { key, op, err })
      return false
    }
  }
}

function toResolved(cached: CachedFile, cacheStatus: CacheStatus): ResolvedFile {
  return {
    content: cached.content,
    contentType: cached.metadata.contentType,
    cacheStatus,
  }
}
