import { EventEmitter } from "node:events"
import { mock } from "node:test"
import type { SpawnOptions } from "node:child_process"

import type {
  ChildHandle,
  ProbeAttempt,
  ProbeFn,
  ProbeTarget,
  SignalSource,
} from "../types.js"
import { createLogger, type Logger } from "../logger.js"

export class FakeChild extends EventEmitter implements ChildHandle {
  readonly pid: number | undefined
  readonly killed: NodeJS.Signals[] = []
  /**
   * When set, `kill()` makes the child exit with the received signal.
   */
  exitOnKill = true

  constructor(pid?: number) {
    super()
    this.pid = pid
  }

  kill(signal: NodeJS.Signals = "SIGTERM"): boolean {
    this.killed.push(signal)
    if (this.exitOnKill) {
      setImmediate(() => this.emit("exit", null, signal))
    }
    return true
  }
}

export interface MockSpawnBehavior {
  exitCode?: number | null
  exitSignal?: NodeJS.Signals
  exitDelay?: number
  /**
   * Emits an "error" with this errno code instead of exiting.
   */
  errorCode?: string
  /**
   * Leave the child running; the test drives "exit" itself.
   */
  manual?: boolean
  throws?: Error
  onSpawn?: (child: FakeChild, file: string, args: string[]) => void
}

export function createMockSpawn(behavior: MockSpawnBehavior = {}) {
  const children: FakeChild[] = []
  const spawn = mock.fn(
    (file: string, args: string[], _options: SpawnOptions): ChildHandle => {
      if (behavior.throws) throw behavior.throws

      const child = new FakeChild(behavior.errorCode ? undefined : 4242)
      children.push(child)
      behavior.onSpawn?.(child, file, args)

      if (behavior.errorCode) {
        const error = Object.assign(
          new Error(`spawn ${file} ${behavior.errorCode}`),
          { code: behavior.errorCode }
        )
        setImmediate(() => child.emit("error", error))
      } else if (!behavior.manual) {
        setTimeout(() => {
          child.emit(
            "exit",
            behavior.exitSignal ? null : behavior.exitCode ?? 0,
            behavior.exitSignal ?? null
          )
        }, behavior.exitDelay ?? 0)
      }
      return child
    }
  )
  return { spawn, children }
}

/**
 * An in-memory stand-in for `process` signal registration.
 */
export class FakeSignals implements SignalSource {
  private readonly listeners = new Map<NodeJS.Signals, Set<() => void>>()

  on(signal: NodeJS.Signals, listener: () => void): this {
    const set = this.listeners.get(signal) ?? new Set()
    set.add(listener)
    this.listeners.set(signal, set)
    return this
  }

  removeListener(signal: NodeJS.Signals, listener: () => void): this {
    this.listeners.get(signal)?.delete(listener)
    return this
  }

  emit(signal: NodeJS.Signals): void {
    for (const listener of [...(this.listeners.get(signal) ?? [])]) {
      listener()
    }
  }

  count(signal?: NodeJS.Signals): number {
    if (signal) return this.listeners.get(signal)?.size ?? 0
    let total = 0
    for (const set of this.listeners.values()) total += set.size
    return total
  }
}

/**
 * A probe that fails `failures` times with `reason`, then succeeds.
 */
export function createScriptedProbe(
  failures: number,
  reason = "ECONNREFUSED"
): { probe: ProbeFn; calls: ProbeTarget[] } {
  const calls: ProbeTarget[] = []
  const probe: ProbeFn = async (target): Promise<ProbeAttempt> => {
    calls.push(target)
    return calls.length > failures ? { ok: true } : { ok: false, reason }
  }
  return { probe, calls }
}

export function createCapturingLogger(level: Logger["level"] = "debug") {
  const stdout: string[] = []
  const stderr: string[] = []
  const logger = createLogger({
    level,
    stdout: (line) => stdout.push(line),
    stderr: (line) => stderr.push(line),
  })
  return { logger, stdout, stderr }
}
