import { BaseError } from "@rawcache/errors"
import type { LockKey } from "../ports/lock"

export type LockErrorCode = "lock_not_acquired"

export class LockError extends BaseError<LockErrorCode> {
  static notAcquired(key: LockKey, reason: "aborted" | "timeout"): LockError {
    return new LockError(`Failed to acquire lock for ${key} (${reason})`, {
      code: "lock_not_acquired",
      context: { key, reason },
    })
  }
}
