import { constants } from "node:os"

import type { ProbeTarget } from "./types.js"

export type GateErrorCode =
  | typeof GateError.InvalidTarget
  | typeof GateError.InvalidCommand
  | typeof GateError.InvalidConfig
  | typeof GateError.DependencyUnavailable
  | typeof GateError.Aborted
  | typeof GateError.ProcessTerminated
  | typeof GateError.LaunchFailed

export interface GateErrorOptions {
  target?: ProbeTarget
  /**
   * Underlying errno code (e.g. "ENOENT") or signal name (e.g. "SIGTERM").
   */
  reason?: string
  cause?: unknown
}

export class GateError extends Error {
  readonly code: GateErrorCode
  readonly target?: ProbeTarget
  readonly reason?: string
  constructor(message: string, code: GateErrorCode, options?: GateErrorOptions) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause })
    this.name = "GateError"
    this.code = code
    this.target = options?.target
    this.reason = options?.reason
  }

  static InvalidTarget = "invalid-target" as const
  static InvalidCommand = "invalid-command" as const
  static InvalidConfig = "invalid-config" as const
  static DependencyUnavailable = "dependency-unavailable" as const
  static Aborted = "aborted" as const
  static ProcessTerminated = "process-terminated" as const
  static LaunchFailed = "launch-failed" as const
}

/**
 * Conventional shell exit status for a process killed by `signal`.
 */
export function signalExitCode(signal: string): number {
  for (const [name, signum] of Object.entries(constants.signals)) {
    if (name === signal && typeof signum === "number") return 128 + signum
  }
  return 1
}

/**
 * Maps a gate failure to the exit status the gate process should report.
 */
export function exitCodeFor(error: GateError): number {
  switch (error.code) {
    case GateError.InvalidTarget:
    case GateError.InvalidCommand:
    case GateError.InvalidConfig:
      return 2
    case GateError.DependencyUnavailable:
      return 1
    case GateError.Aborted:
      return 130
    case GateError.ProcessTerminated:
      return error.reason ? signalExitCode(error.reason) : 1
    case GateError.LaunchFailed:
      if (error.reason === "ENOENT") return 127
      if (error.reason === "EACCES") return 126
      return 1
  }
}
