import { assertValidTimeMs } from "../../core/validation/validation"
import type { Lock, LockKey } from "../../ports/lock"
import type { LockLease } from "../../ports/lock-lease"
import type { AcquireOptions, LockConfig } from "../../ports/options"
import { MemoryLease } from "./memory-lock-lease"

type Waiter = {
  grant: (lease: LockLease) => void
}

type LockEntry = {
  waiters: Waiter[]
}

/**
 * In-process keyed mutex.
 *
 * An entry exists only while its key is held. When the holder releases and
 * no waiter is queued the entry is deleted, so the registry never holds
 * more keys than there are in-flight critical sections.
 */
export class MemoryKeyedLock implements Lock {
  private readonly entries = new Map<LockKey, LockEntry>()

  public constructor(private readonly config: LockConfig = {}) {}

  public async acquire(key: LockKey, opts: AcquireOptions = {}): Promise<LockLease | null> {
    if (opts.signal?.aborted) return null

    const timeoutMs = opts.timeoutMs ?? this.config.defaultTimeoutMs
    if (timeoutMs !== undefined) assertValidTimeMs(timeoutMs, "acquire timeoutMs")

    const entry = this.entries.get(key)

    if (!entry) return this.grantFresh(key)
    if (timeoutMs === 0) return null

    return this.enqueue(key, entry, timeoutMs, opts.signal)
  }

  /** Number of keys currently held. */
  public size(): number {
    return this.entries.size
  }

  private grantFresh(key: LockKey): LockLease {
    const entry: LockEntry = { waiters: [] }
    this.entries.set(key, entry)

    return this.createLease(key, entry)
  }

  private createLease(key: LockKey, entry: LockEntry): LockLease {
    return new MemoryLease(key, { onRelease: () => this.handOver(key, entry) })
  }

  private handOver(key: LockKey, entry: LockEntry): void {
    const next = entry.waiters.shift()

    if (next) {
      next.grant(this.createLease(key, entry))
      return
    }

    if (this.entries.get(key) === entry) {
      this.entries.delete(key)
    }
  }

  private enqueue(
    key: LockKey,
    entry: LockEntry,
    timeoutMs: number | undefined,
    signal: AbortSignal | undefined,
  ): Promise<LockLease | null> {
    return new Promise((resolve) => {
      let timer: NodeJS.Timeout | undefined

      const cleanup = () => {
        if (timer) clearTimeout(timer)
        signal?.removeEventListener("abort", giveUp)
      }

      const waiter: Waiter = {
        grant: (lease) => {
          cleanup()
          resolve(lease)
        },
      }

      function giveUp() {
        const index = entry.waiters.indexOf(waiter)
        if (index === -1) return

        entry.waiters.splice(index, 1)
        cleanup()
        resolve(null)
      }

      entry.waiters.push(waiter)

      if (timeoutMs !== undefined) {
        timer = setTimeout(giveUp, timeoutMs)
        timer.unref()
      }

      signal?.addEventListener("abort", giveUp, { once: true })
    })
  }
}
