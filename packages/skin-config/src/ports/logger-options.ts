import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /** Minimum level to emit. */
  level: LogLevelName

  /**
   * Pretty-print for humans.
   * Keep this off outside local development; structured JSON is what log processors ingest.
   */
  prettify?: boolean
}
