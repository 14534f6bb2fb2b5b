import type { UnixMs } from "./time"

export interface Clock {
  /**
   * Current time as a Date object.
   *
   * @remarks
   * Use `nowMs()` for arithmetic and expiry comparisons.
   */
  now(): Date

  nowMs(): UnixMs
}
