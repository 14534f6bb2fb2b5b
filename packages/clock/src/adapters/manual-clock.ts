import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

/**
 * Clock that only moves when told to. Used to drive TTL expiry in tests.
 */
export class ManualClock implements Clock {
  private current: UnixMs

  constructor(start: Date | UnixMs = 0) {
    this.current = typeof start === "number" ? start : start.getTime()
  }

  now(): Date {
    return new Date(this.current)
  }

  nowMs(): UnixMs {
    return this.current
  }

  advanceMs(ms: Milliseconds): void {
    this.current += ms
  }

  set(at: Date | UnixMs): void {
    this.current = typeof at === "number" ? at : at.getTime()
  }
}
