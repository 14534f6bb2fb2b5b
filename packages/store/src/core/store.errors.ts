import { BaseError } from "@rawcache/errors"
import type { CacheKey } from "../ports/cache-key"

export type StoreErrorCode = "store_read_failed" | "store_write_failed" | "store_delete_failed"

export type StoreOperation =
  | "getMetadata"
  | "setMetadata"
  | "deleteMetadata"
  | "getContent"
  | "setContent"
  | "deleteContent"

export class StoreError extends BaseError<StoreErrorCode> {
  static readFailed(op: StoreOperation, key: CacheKey, cause: unknown): StoreError {
    return new StoreError(`Cache store read failed (${op})`, {
      code: "store_read_failed",
      context: { op, key },
      cause,
    })
  }

  static writeFailed(op: StoreOperation, key: CacheKey, cause: unknown): StoreError {
    return new StoreError(`Cache store write failed (${op})`, {
      code: "store_write_failed",
      context: { op, key },
      cause,
    })
  }

  static deleteFailed(op: StoreOperation, key: CacheKey, cause: unknown): StoreError {
    return new StoreError(`Cache store delete failed (${op})`, {
      code: "store_delete_failed",
      context: { op, key },
      cause,
    })
  }
}
