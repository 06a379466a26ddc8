import type { SpawnOptions } from "node:child_process"

import type { GateError } from "./errors.js"
import type { Logger, LogLevel } from "./logger.js"

/**
 * A TCP endpoint the gate waits on before launching its command.
 */
export interface ProbeTarget {
  readonly host: string
  readonly port: number
}

/**
 * A target as accepted from users: `"web:8000"`, `"[::1]:5432"` or an object.
 */
export type TargetInput = string | { host: string; port: number | string }

/**
 * Outcome of a single connection attempt.
 * `reason` is the socket error code (e.g. "ECONNREFUSED", "ENOTFOUND").
 */
export type ProbeAttempt = { ok: true } | { ok: false; reason: string }

export interface ProbeOnceOptions {
  /**
   * Maximum time in milliseconds a single connect may take.
   */
  connectTimeoutMs?: number
  signal?: AbortSignal
}

export type ProbeFn = (
  target: ProbeTarget,
  options: ProbeOnceOptions
) => Promise<ProbeAttempt>

/**
 * Lifecycle callbacks raised while waiting on a target.
 */
export interface ProbeHooks {
  onWaiting?: (target: ProbeTarget) => void
  onAttemptFailed?: (target: ProbeTarget, attempt: number, reason: string) => void
  onReady?: (target: ProbeTarget, attempts: number) => void
}

export interface WaitOptions extends ProbeHooks {
  /**
   * Fixed delay between attempts.
   * @default 100
   */
  intervalMs?: number
  /**
   * Give up after this many milliseconds.
   * @default Infinity
   */
  timeoutMs?: number
  /**
   * Give up after this many failed attempts.
   * @default Infinity
   */
  maxAttempts?: number
  /**
   * @default 1000
   */
  connectTimeoutMs?: number
  signal?: AbortSignal
  logger?: Logger
  /**
   * Replaces the TCP connect check, mainly for tests.
   */
  probe?: ProbeFn
}

export type ProbeResult =
  | {
      ok: true
      error: null
      target: ProbeTarget
      attempts: number
      durationMs: number
    }
  | {
      ok: false
      /**
       * `GateError.DependencyUnavailable` when a bound was hit,
       * `GateError.Aborted` when the signal fired.
       */
      error: GateError
      target: ProbeTarget
      attempts: number
      durationMs: number
    }

export type WaitAllResult =
  | { ok: true; error: null; probes: ProbeResult[] }
  | { ok: false; error: GateError; probes: ProbeResult[] }

/**
 * A parsed command line.
 */
export interface CommandSpec {
  cmd: string
  args: string[]
}

/**
 * A command as accepted from users: a command-line string, an argv array,
 * or an already parsed spec.
 */
export type CommandInput = string | readonly string[] | CommandSpec

/**
 * The subset of `ChildProcess` the handoff relies on.
 */
export interface ChildHandle {
  readonly pid?: number
  kill(signal?: NodeJS.Signals): boolean
  once(
    event: "exit",
    listener: (code: number | null, signal: NodeJS.Signals | null) => void
  ): this
  once(event: "error", listener: (error: Error) => void): this
}

export type SpawnFn = (
  command: string,
  args: string[],
  options: SpawnOptions
) => ChildHandle

/**
 * Registers and removes process-level signal listeners.
 * Defaults to the global `process`.
 */
export interface SignalSource {
  on(signal: NodeJS.Signals, listener: () => void): unknown
  removeListener(signal: NodeJS.Signals, listener: () => void): unknown
}

export interface HandoffOptions {
  /**
   * @default process.cwd()
   */
  cwd?: string
  /**
   * Environment for the launched process.
   * @default process.env
   */
  env?: NodeJS.ProcessEnv
  /**
   * Signals received by the gate that are passed on to the launched process.
   */
  forwardSignals?: readonly NodeJS.Signals[]
  /**
   * Whether this process runs in the foreground of a terminal. The terminal
   * then sends SIGINT and SIGQUIT (Ctrl-C, Ctrl-\) to the launched process
   * directly, so they are not forwarded again.
   * @default process.stdin.isTTY === true
   */
  terminal?: boolean
  /**
   * @default import("node:child_process").spawn
   */
  spawn?: SpawnFn
  signals?: SignalSource
  logger?: Logger
  onHandoff?: (pid: number | undefined) => void
  onExit?: (exitCode: number, signal: NodeJS.Signals | null) => void
}

export type HandoffResult =
  | {
      ok: true
      error: null
      /**
       * The launched process' exit code, or `128 + n` when killed by signal n.
       */
      exitCode: number
      signal: NodeJS.Signals | null
      pid: number | undefined
    }
  | {
      ok: false
      /**
       * Always `GateError.LaunchFailed`.
       */
      error: GateError
      exitCode: number
      signal: null
      pid: undefined
    }

/**
 * Definition of a gate: what to wait for and what to launch afterwards.
 */
export interface GateDefinition {
  targets: readonly TargetInput[]
  command: CommandInput
}

export interface GateRunOptions
  extends Omit<WaitOptions, "signal">,
    Omit<HandoffOptions, "logger"> {
  /**
   * Aborts probing. Has no effect once the command has been launched.
   */
  signal?: AbortSignal
}

export interface Gate {
  readonly targets: readonly ProbeTarget[]
  readonly command: CommandSpec
  /**
   * Waits for every target in order, then launches the command exactly once.
   * Never throws.
   */
  run(options?: GateRunOptions): Promise<GateResult>
}

export type GatePhase = "probing" | "handoff"

export type GateResult =
  | {
      ok: true
      error: null
      exitCode: number
      signal: NodeJS.Signals | null
      probes: ProbeResult[]
      durationMs: number
    }
  | {
      ok: false
      error: GateError
      /**
       * Phase the gate was in when it failed.
       */
      phase: GatePhase
      exitCode: number
      probes: ProbeResult[]
      durationMs: number
    }

/**
 * Gate settings after merging every config source.
 */
export interface ResolvedConfig {
  targets: ProbeTarget[]
  command: CommandSpec | null
  intervalMs: number
  timeoutMs: number
  maxAttempts: number
  connectTimeoutMs: number
  logLevel: LogLevel
}

/**
 * A partial config as produced by a single source (env, a YAML file, CLI flags).
 */
export type PartialConfig = Partial<ResolvedConfig>
