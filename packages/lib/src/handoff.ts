import { spawn } from "node:child_process"

import { GateError, exitCodeFor, signalExitCode } from "./errors.js"
import { createLogger } from "./logger.js"
import { FORWARDED_SIGNALS, TERMINAL_SIGNALS } from "./internal/constants.js"
import { createSignalForwarder } from "./internal/signal-handler.js"
import {
  errorCode,
  formatCommand,
  normalizeCommand,
  toSpawnArgs,
} from "./internal/util.js"

import type {
  ChildHandle,
  CommandInput,
  HandoffOptions,
  HandoffResult,
} from "./types.js"

/**
 * Launches `command` as the long-running process this gate stands in for.
 *
 * The child shares this process' stdio, receives every forwarded signal, and
 * its exit status is reported back unchanged (`128 + n` when killed by signal
 * n), so callers can `process.exit(result.exitCode)` and look like the server
 * to whatever supervises them. A launch failure is never retried.
 */
export function handoff(
  input: CommandInput,
  options: HandoffOptions = {}
): Promise<HandoffResult> {
  const command = normalizeCommand(input)
  const {
    cwd = process.cwd(),
    env = process.env,
    forwardSignals = FORWARDED_SIGNALS,
    terminal = process.stdin.isTTY === true,
    spawn: spawnFn = spawn,
    signals = process,
    logger = createLogger(),
    onHandoff,
    onExit,
  } = options

  const { file, args } = toSpawnArgs(command, env.PATH ?? env.Path)
  const commandLine = formatCommand(command)

  return new Promise((resolve) => {
    const launchFailed = (error: Error) => {
      const gateError = new GateError(
        `Failed to launch ${commandLine}: ${error.message}`,
        GateError.LaunchFailed,
        { reason: errorCode(error), cause: error }
      )
      logger.error(gateError.message)
      resolve({
        ok: false,
        error: gateError,
        exitCode: exitCodeFor(gateError),
        signal: null,
        pid: undefined,
      })
    }

    let child: ChildHandle
    try {
      child = spawnFn(file, args, {
        cwd,
        env,
        stdio: "inherit",
        shell: false,
      })
    } catch (error) {
      launchFailed(error instanceof Error ? error : new Error(String(error)))
      return
    }

    const forwarder = createSignalForwarder({
      child,
      forward: forwardSignals,
      delivered: terminal ? TERMINAL_SIGNALS : [],
      signals,
      onForwarded: (sig) => logger.debug(`Forwarding ${sig} to ${commandLine}`),
    })
    let settled = false

    child.once("error", (error) => {
      if (settled) return
      settled = true
      forwarder.cleanup()
      launchFailed(error)
    })

    child.once("exit", (code, signal) => {
      if (settled) return
      settled = true
      forwarder.cleanup()
      const exitCode = code ?? (signal ? signalExitCode(signal) : 1)
      logger.debug(
        `${commandLine} exited with ${signal ? `signal ${signal}` : `code ${exitCode}`}`
      )
      onExit?.(exitCode, signal)
      resolve({ ok: true, error: null, exitCode, signal, pid: child.pid })
    })

    if (child.pid !== undefined) {
      logger.debug(`Launched ${commandLine} (pid ${child.pid})`)
      onHandoff?.(child.pid)
    }
  })
}
