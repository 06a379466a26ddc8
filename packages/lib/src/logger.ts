import { LOG_PREFIX } from "./internal/constants.js"

export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export interface Logger {
  readonly level: LogLevel
  debug(message: string): void
  /**
   * Human-readable status line. Written to stdout without a prefix.
   */
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

export interface LoggerConfig {
  level?: LogLevel
  stdout?: (line: string) => void
  stderr?: (line: string) => void
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

/**
 * Creates a console-backed logger. Status output goes to stdout so that it
 * interleaves with the launched server's own output; diagnostics go to stderr.
 */
export function createLogger({
  level = "info",
  stdout = (line) => console.log(line),
  stderr = (line) => console.error(line),
}: LoggerConfig = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(level)
  const enabled = (at: LogLevel) =>
    threshold > 0 && LOG_LEVELS.indexOf(at) <= threshold

  return {
    level,
    debug(message) {
      if (enabled("debug")) stderr(`${LOG_PREFIX} ${message}`)
    },
    info(message) {
      if (enabled("info")) stdout(message)
    },
    warn(message) {
      if (enabled("warn")) stderr(`${LOG_PREFIX} ${message}`)
    },
    error(message) {
      if (enabled("error")) stderr(`${LOG_PREFIX} ${message}`)
    },
  }
}

export const silentLogger: Logger = createLogger({ level: "silent" })
