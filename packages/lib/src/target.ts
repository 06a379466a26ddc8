import { GateError } from "./errors.js"

import type { ProbeTarget, TargetInput } from "./types.js"

function parsePort(value: number | string, input: string): number {
  const port = typeof value === "number" ? value : Number(value.trim())
  if (
    (typeof value === "string" && !/^\d+$/.test(value.trim())) ||
    !Number.isInteger(port) ||
    port < 1 ||
    port > 65535
  ) {
    throw new GateError(
      `Invalid target "${input}": port must be an integer between 1 and 65535`,
      GateError.InvalidTarget
    )
  }
  return port
}

function createTarget(host: string, port: number | string, input: string): ProbeTarget {
  const trimmedHost = host.trim()
  if (trimmedHost.length === 0) {
    throw new GateError(
      `Invalid target "${input}": host must not be empty`,
      GateError.InvalidTarget
    )
  }
  return Object.freeze({ host: trimmedHost, port: parsePort(port, input) })
}

/**
 * Parses a probe target.
 * @example
 * parseTarget("web:8000")     // { host: "web", port: 8000 }
 * parseTarget("[::1]:5432")   // { host: "::1", port: 5432 }
 * parseTarget({ host: "db", port: 5432 })
 */
export function parseTarget(input: TargetInput): ProbeTarget {
  if (typeof input !== "string") {
    return createTarget(input.host, input.port, `${input.host}:${input.port}`)
  }

  const spec = input.trim()
  const bracketed = /^\[([^\]]*)\]:(.*)$/.exec(spec)
  if (bracketed) {
    return createTarget(bracketed[1], bracketed[2], input)
  }

  const separator = spec.lastIndexOf(":")
  if (separator === -1) {
    throw new GateError(
      `Invalid target "${input}": expected host:port`,
      GateError.InvalidTarget
    )
  }
  const host = spec.slice(0, separator)
  if (host.includes(":")) {
    throw new GateError(
      `Invalid target "${input}": IPv6 hosts must be written as [host]:port`,
      GateError.InvalidTarget
    )
  }
  return createTarget(host, spec.slice(separator + 1), input)
}

export function formatTarget(target: ProbeTarget): string {
  return target.host.includes(":")
    ? `[${target.host}]:${target.port}`
    : `${target.host}:${target.port}`
}

/**
 * Parses a comma or whitespace separated list such as `"web:8000, db:5432"`.
 */
export function parseTargetList(list: string): ProbeTarget[] {
  return list
    .split(/[\s,]+/)
    .filter((entry) => entry.length > 0)
    .map((entry) => parseTarget(entry))
}
