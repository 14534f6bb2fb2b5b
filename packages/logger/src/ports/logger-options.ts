import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /** Lines below this level are dropped. */
  level: LogLevelName

  /**
   * Render human-readable lines instead of JSON. Meant for local runs only.
   */
  prettify?: boolean
}
