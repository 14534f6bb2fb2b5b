import type { Lock, LockKey } from "../ports/lock"
import type { AcquireOptions } from "../ports/options"
import { LockError } from "./lock.errors"

export async function withLock<T>(
  lock: Lock,
  key: LockKey,
  fn: () => Promise<T>,
  opts: AcquireOptions = {},
): Promise<T> {
  if (opts.signal?.aborted) {
    throw LockError.notAcquired(key, "aborted")
  }

  const lease = await lock.acquire(key, opts)

  if (!lease) {
    throw LockError.notAcquired(key, opts.signal?.aborted ? "aborted" : "timeout")
  }

  try {
    return await fn()
  } finally {
    await lease.release()
  }
}
