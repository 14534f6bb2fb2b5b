import type { Milliseconds } from "@rawcache/clock"

export type AcquireOptions = {
  /** Max time to wait. Falls back to `LockConfig.defaultTimeoutMs`. */
  timeoutMs?: Milliseconds

  /** Stops waiting early. Has no effect once the lock is held. */
  signal?: AbortSignal
}

export type LockConfig = {
  /**
   * Default wait bound for `acquire()`. `undefined` waits until the
   * current holder releases.
   */
  defaultTimeoutMs?: Milliseconds
}
