export { ManualClock } from "./adapters/manual-clock"
export { SystemClock } from "./adapters/system-clock"
export type { Clock } from "./ports/clock"
export type * from "./ports/time"
