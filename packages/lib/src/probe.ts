import * as net from "node:net"

import { GateError } from "./errors.js"
import { createLogger } from "./logger.js"
import { formatTarget, parseTarget } from "./target.js"
import {
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_INTERVAL_MS,
  MAX_TIMER_MS,
} from "./internal/constants.js"
import { delay, errorCode } from "./internal/util.js"

import type {
  ProbeAttempt,
  ProbeOnceOptions,
  ProbeResult,
  ProbeTarget,
  TargetInput,
  WaitAllResult,
  WaitOptions,
} from "./types.js"

/**
 * Opens a TCP connection to `target` and closes it again straight away.
 * Resolves with the socket error code instead of rejecting.
 */
export function probeOnce(
  target: ProbeTarget,
  { connectTimeoutMs = DEFAULT_CONNECT_TIMEOUT_MS, signal }: ProbeOnceOptions = {}
): Promise<ProbeAttempt> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve({ ok: false, reason: "ABORT_ERR" })
      return
    }

    const socket = net.connect({ host: target.host, port: target.port })
    let settled = false

    const finish = (attempt: ProbeAttempt) => {
      if (settled) return
      settled = true
      signal?.removeEventListener("abort", onAbort)
      socket.destroy()
      resolve(attempt)
    }
    const onAbort = () => finish({ ok: false, reason: "ABORT_ERR" })

    if (Number.isFinite(connectTimeoutMs) && connectTimeoutMs > 0) {
      socket.setTimeout(Math.min(connectTimeoutMs, MAX_TIMER_MS), () =>
        finish({ ok: false, reason: "ETIMEDOUT" })
      )
    }
    socket.once("connect", () => finish({ ok: true }))
    socket.once("error", (error: Error) =>
      finish({ ok: false, reason: errorCode(error) })
    )
    signal?.addEventListener("abort", onAbort, { once: true })
  })
}

function assertDuration(name: string, value: number, allowInfinity: boolean) {
  const valid = allowInfinity
    ? value === Infinity || (Number.isFinite(value) && value >= 0)
    : Number.isFinite(value) && value >= 0
  if (!valid) {
    throw new GateError(
      `Invalid ${name}: ${value} (expected a non-negative number)`,
      GateError.InvalidConfig
    )
  }
  if (Number.isFinite(value) && value > MAX_TIMER_MS) {
    throw new GateError(
      `Invalid ${name}: ${value} (expected at most ${MAX_TIMER_MS}ms)`,
      GateError.InvalidConfig
    )
  }
}

/**
 * Blocks until `target` accepts TCP connections, retrying at a fixed interval.
 *
 * Refused connections, DNS failures and connect timeouts are all retried the
 * same way. Without `timeoutMs` or `maxAttempts` the wait is unbounded.
 * Rejects only on invalid input; otherwise resolves with a `ProbeResult`.
 *
 * @example
 * ```ts
 * const result = await waitForTarget("web:8000", { timeoutMs: 30_000 })
 * if (!result.ok) console.error(result.error.message)
 * ```
 */
export async function waitForTarget(
  input: TargetInput | ProbeTarget,
  options: WaitOptions = {}
): Promise<ProbeResult> {
  const target = parseTarget(input)
  const {
    intervalMs = DEFAULT_INTERVAL_MS,
    timeoutMs = Infinity,
    maxAttempts = Infinity,
    connectTimeoutMs = DEFAULT_CONNECT_TIMEOUT_MS,
    signal,
    logger = createLogger(),
    probe = probeOnce,
  } = options

  assertDuration("interval", intervalMs, false)
  assertDuration("timeout", timeoutMs, true)
  assertDuration("connect timeout", connectTimeoutMs, true)
  if (connectTimeoutMs === 0) {
    throw new GateError(
      "Invalid connect timeout: 0 (expected a positive number)",
      GateError.InvalidConfig
    )
  }
  if (!(maxAttempts === Infinity || (Number.isInteger(maxAttempts) && maxAttempts >= 1))) {
    throw new GateError(
      `Invalid max attempts: ${maxAttempts} (expected a positive integer)`,
      GateError.InvalidConfig
    )
  }

  const label = formatTarget(target)
  const startedAt = Date.now()
  const deadline = startedAt + timeoutMs
  let attempts = 0
  let lastReason = "no attempt made"

  const failed = (error: GateError): ProbeResult => ({
    ok: false,
    error,
    target,
    attempts,
    durationMs: Date.now() - startedAt,
  })
  const aborted = () =>
    failed(
      new GateError(`Stopped waiting for ${label}`, GateError.Aborted, {
        target,
      })
    )
  const unavailable = () =>
    failed(
      new GateError(
        `${label} did not accept connections after ${attempts} attempt(s) in ${
          Date.now() - startedAt
        }ms (last error: ${lastReason})`,
        GateError.DependencyUnavailable,
        { target, reason: lastReason }
      )
    )

  logger.info(`Waiting for ${label}...`)
  options.onWaiting?.(target)

  while (true) {
    if (signal?.aborted) return aborted()

    attempts++
    const remaining = deadline - Date.now()
    const attempt = await probe(target, {
      connectTimeoutMs: Math.max(1, Math.min(connectTimeoutMs, remaining)),
      signal,
    })

    if (attempt.ok) {
      logger.info(`${label} is ready!`)
      options.onReady?.(target, attempts)
      return {
        ok: true,
        error: null,
        target,
        attempts,
        durationMs: Date.now() - startedAt,
      }
    }

    if (signal?.aborted) return aborted()

    lastReason = attempt.reason
    logger.debug(`${label} not reachable (${attempt.reason}), attempt ${attempts}`)
    options.onAttemptFailed?.(target, attempts, attempt.reason)

    if (attempts >= maxAttempts || Date.now() >= deadline) {
      return unavailable()
    }

    await delay(Math.min(intervalMs, deadline - Date.now()), signal)
  }
}

/**
 * Waits for each target in order. `timeoutMs` is a budget shared by all of
 * them; `maxAttempts` applies to each target separately.
 */
export async function waitForTargets(
  targets: readonly (TargetInput | ProbeTarget)[],
  options: WaitOptions = {}
): Promise<WaitAllResult> {
  const startedAt = Date.now()
  const timeoutMs = options.timeoutMs ?? Infinity
  const probes: ProbeResult[] = []

  for (const target of targets) {
    const result = await waitForTarget(target, {
      ...options,
      timeoutMs: Math.max(0, timeoutMs - (Date.now() - startedAt)),
    })
    probes.push(result)
    if (!result.ok) {
      return { ok: false, error: result.error, probes }
    }
  }

  return { ok: true, error: null, probes }
}
