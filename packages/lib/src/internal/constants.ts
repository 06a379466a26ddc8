export const $CONFIG_SOURCE_INTERNAL = Symbol.for("portgate:config-source-internal")

export const LOG_PREFIX = "[portgate]"

export const DEFAULT_INTERVAL_MS = 100
export const DEFAULT_CONNECT_TIMEOUT_MS = 1000
// Node timers fire after 1ms for longer delays
export const MAX_TIMER_MS = 2_147_483_647

export const TERMINATION_SIGNALS = [
  "SIGINT",
  "SIGTERM",
  "SIGQUIT",
  "SIGBREAK",
] as const satisfies readonly NodeJS.Signals[]

// Sent by a terminal to its whole foreground process group
export const TERMINAL_SIGNALS = [
  "SIGINT",
  "SIGQUIT",
] as const satisfies readonly NodeJS.Signals[]

export const FORWARDED_SIGNALS = [
  ...TERMINATION_SIGNALS,
  "SIGHUP",
  "SIGUSR1",
  "SIGUSR2",
] as const satisfies readonly NodeJS.Signals[]
