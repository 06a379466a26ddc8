import { GateError } from "./errors.js"
import { isLogLevel, LOG_LEVELS } from "./logger.js"
import { parseTargetList } from "./target.js"
import { createConfigSource, isConfigSource } from "./config-sources/create-config-source.js"
import {
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_INTERVAL_MS,
  MAX_TIMER_MS,
} from "./internal/constants.js"
import { normalizeCommand } from "./internal/util.js"

import type { LogLevel } from "./logger.js"
import type { ConfigContext, ConfigSource } from "./config-sources/types.js"
import type { PartialConfig, ResolvedConfig } from "./types.js"

export const ENV = {
  targets: "PORTGATE_TARGETS",
  command: "PORTGATE_COMMAND",
  intervalMs: "PORTGATE_INTERVAL_MS",
  timeoutMs: "PORTGATE_TIMEOUT_MS",
  maxAttempts: "PORTGATE_MAX_ATTEMPTS",
  connectTimeoutMs: "PORTGATE_CONNECT_TIMEOUT_MS",
  logLevel: "PORTGATE_LOG_LEVEL",
} as const

export const DEFAULT_CONFIG: ResolvedConfig = {
  targets: [],
  command: null,
  intervalMs: DEFAULT_INTERVAL_MS,
  timeoutMs: Infinity,
  maxAttempts: Infinity,
  connectTimeoutMs: DEFAULT_CONNECT_TIMEOUT_MS,
  logLevel: "info",
}

function invalid(name: string, value: unknown, expected: string): GateError {
  return new GateError(
    `Invalid ${name}: ${JSON.stringify(value)} (expected ${expected})`,
    GateError.InvalidConfig
  )
}

function toNumber(value: unknown): number {
  if (typeof value === "number") return value
  if (typeof value !== "string" || value.trim() === "") return NaN
  const trimmed = value.trim()
  if (/^(infinity|inf)$/i.test(trimmed)) return Infinity
  return Number(trimmed)
}

/**
 * Parses a duration in milliseconds from a number or numeric string.
 * "Infinity" is accepted only when `unbounded` is set. Finite values are
 * capped at `MAX_TIMER_MS`.
 */
export function parseMilliseconds(
  name: string,
  value: unknown,
  { unbounded = false, positive = false }: { unbounded?: boolean; positive?: boolean } = {}
): number {
  const ms = toNumber(value)
  if (ms === Infinity && unbounded) return ms
  if (!Number.isFinite(ms) || ms < 0 || (positive && ms === 0)) {
    throw invalid(
      name,
      value,
      `${positive ? "a positive" : "a non-negative"} number of milliseconds${
        unbounded ? " or Infinity" : ""
      }`
    )
  }
  if (ms > MAX_TIMER_MS) {
    throw invalid(name, value, `at most ${MAX_TIMER_MS} milliseconds`)
  }
  return ms
}

export function parseAttemptCount(name: string, value: unknown): number {
  const count = toNumber(value)
  if (count === Infinity) return count
  if (!Number.isInteger(count) || count < 1) {
    throw invalid(name, value, "a positive integer or Infinity")
  }
  return count
}

export function parseLogLevel(name: string, value: unknown): LogLevel {
  if (typeof value === "string") {
    const level = value.trim().toLowerCase()
    if (isLogLevel(level)) return level
  }
  throw invalid(name, value, `one of ${LOG_LEVELS.join(", ")}`)
}

/**
 * Reads `PORTGATE_*` variables. Unset or empty variables are ignored.
 */
export const envConfigSource: ConfigSource = createConfigSource({
  name: "env",
  load: ({ env }) => {
    const read = (name: string) => {
      const value = env[name]
      return value === undefined || value.trim() === "" ? undefined : value
    }
    const config: PartialConfig = {}

    const targets = read(ENV.targets)
    if (targets !== undefined) config.targets = parseTargetList(targets)

    const command = read(ENV.command)
    if (command !== undefined) config.command = normalizeCommand(command)

    const intervalMs = read(ENV.intervalMs)
    if (intervalMs !== undefined) {
      config.intervalMs = parseMilliseconds(ENV.intervalMs, intervalMs)
    }

    const timeoutMs = read(ENV.timeoutMs)
    if (timeoutMs !== undefined) {
      config.timeoutMs = parseMilliseconds(ENV.timeoutMs, timeoutMs, {
        unbounded: true,
      })
    }

    const maxAttempts = read(ENV.maxAttempts)
    if (maxAttempts !== undefined) {
      config.maxAttempts = parseAttemptCount(ENV.maxAttempts, maxAttempts)
    }

    const connectTimeoutMs = read(ENV.connectTimeoutMs)
    if (connectTimeoutMs !== undefined) {
      config.connectTimeoutMs = parseMilliseconds(
        ENV.connectTimeoutMs,
        connectTimeoutMs,
        { unbounded: true, positive: true }
      )
    }

    const logLevel = read(ENV.logLevel)
    if (logLevel !== undefined) {
      config.logLevel = parseLogLevel(ENV.logLevel, logLevel)
    }

    return config
  },
})

function definedEntries(config: PartialConfig): PartialConfig {
  const result: PartialConfig = {}
  if (config.targets !== undefined) result.targets = config.targets
  if (config.command !== undefined) result.command = config.command
  if (config.intervalMs !== undefined) result.intervalMs = config.intervalMs
  if (config.timeoutMs !== undefined) result.timeoutMs = config.timeoutMs
  if (config.maxAttempts !== undefined) result.maxAttempts = config.maxAttempts
  if (config.connectTimeoutMs !== undefined) {
    result.connectTimeoutMs = config.connectTimeoutMs
  }
  if (config.logLevel !== undefined) result.logLevel = config.logLevel
  return result
}

export interface ResolveConfigOptions extends Partial<ConfigContext> {
  /**
   * Applied after every source, e.g. command-line flags.
   */
  overrides?: PartialConfig
}

/**
 * Loads `sources` in order and merges them over the defaults.
 * Later sources win; `overrides` win over all sources.
 */
export function resolveConfig(
  sources: readonly ConfigSource[],
  { cwd = process.cwd(), env = process.env, overrides = {} }: ResolveConfigOptions = {}
): ResolvedConfig {
  if (sources.some((source) => !isConfigSource(source))) {
    throw new GateError(
      "Invalid config source: must be created with createConfigSource()",
      GateError.InvalidConfig
    )
  }

  let resolved: ResolvedConfig = { ...DEFAULT_CONFIG }
  for (const source of sources) {
    resolved = { ...resolved, ...definedEntries(source.load({ cwd, env })) }
  }
  return { ...resolved, ...definedEntries(overrides) }
}
