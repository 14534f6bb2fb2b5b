export { MemoryKeyedLock } from "./adapters/memory/memory-keyed-lock"
export { LockError, type LockErrorCode } from "./core/lock.errors"
export { withLock } from "./core/with-lock"
export type { Lock, LockKey } from "./ports/lock"
export type { LockLease } from "./ports/lock-lease"
export type { AcquireOptions, LockConfig } from "./ports/options"
