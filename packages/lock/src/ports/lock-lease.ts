import type { LockKey } from "./lock"

export interface LockLease {
  readonly key: LockKey

  /**
   * Release the lock and hand it to the next waiter, if any.
   * Idempotent; only the first call has an effect.
   */
  release(): Promise<void>
}
