import type { UnixMs } from "@rawcache/clock"
import type { CacheTtl } from "../ports/cache-options"

/** Absolute expiry instant of `ttl` measured from `nowMs`. */
export function ttlToExpiresAtMs(ttl: CacheTtl, nowMs: UnixMs): UnixMs {
  switch (ttl.kind) {
    case "seconds":
      return nowMs + ttl.seconds * 1000
    case "milliseconds":
      return nowMs + ttl.milliseconds
    case "until":
      return ttl.expiresAt.getTime()
  }
}

export function assertValidTtl(ttl: CacheTtl): void {
  const amount =
    ttl.kind === "seconds"
      ? ttl.seconds
      : ttl.kind === "milliseconds"
        ? ttl.milliseconds
        : ttl.expiresAt.getTime()

  if (!Number.isFinite(amount) || amount <= 0) {
    throw new RangeError(`Invalid cache TTL: ${JSON.stringify(ttl)}`)
  }
}
