import type { LockLease } from "./lock-lease"
import type { AcquireOptions } from "./options"

export type LockKey = string

/**
 * Mutual exclusion scoped to a key. Holders of different keys never wait
 * on each other.
 */
export interface Lock {
  /**
   * Acquire the lock for `key`, waiting behind current holders in arrival order.
   * A `timeoutMs` of 0 returns at once when the key is held.
   *
   * @returns The lease, or `null` if the wait timed out or `signal` aborted first.
   */
  acquire(key: LockKey, opts?: AcquireOptions): Promise<LockLease | null>
}
