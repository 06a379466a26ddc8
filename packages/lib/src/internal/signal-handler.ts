import { TERMINATION_SIGNALS } from "./constants.js"

import type { ChildHandle, SignalSource } from "../types.js"

export interface SignalHandlerConfig {
  abortSignal?: AbortSignal
  signals?: SignalSource
  onProcessTerminated: (signal: NodeJS.Signals) => void
  onAborted: () => void
}

export interface SignalHandler {
  cleanup(): void
}

/**
 * Listens for termination signals (SIGINT, SIGTERM, etc.) and an optional
 * abort signal while the gate is still probing.
 */
export function createSignalHandler({
  abortSignal,
  signals = process,
  onAborted,
  onProcessTerminated,
}: SignalHandlerConfig): SignalHandler {
  const terminationListenerCleanups = TERMINATION_SIGNALS.map((sig) => {
    const handleSignal = () => {
      onProcessTerminated(sig)
    }
    signals.on(sig, handleSignal)
    return () => {
      signals.removeListener(sig, handleSignal)
    }
  })

  let abortCleanup: (() => void) | null = null
  if (abortSignal) {
    const handleAbort = () => {
      onAborted()
    }
    abortSignal.addEventListener("abort", handleAbort, { once: true })
    abortCleanup = () => {
      abortSignal.removeEventListener("abort", handleAbort)
    }
  }

  return {
    cleanup(): void {
      terminationListenerCleanups.forEach((cleanup) => cleanup())
      abortCleanup?.()
    },
  }
}

export interface SignalForwarderConfig {
  child: ChildHandle
  forward: readonly NodeJS.Signals[]
  /**
   * Signals the child has already received on its own. They are still
   * handled here but not passed on a second time.
   */
  delivered?: readonly NodeJS.Signals[]
  signals?: SignalSource
  onForwarded?: (signal: NodeJS.Signals) => void
}

/**
 * Passes signals received by this process on to the launched child.
 * While registered, the listeners also keep this process from exiting on
 * them, so the child decides how to shut down.
 */
export function createSignalForwarder({
  child,
  forward,
  delivered = [],
  signals = process,
  onForwarded,
}: SignalForwarderConfig): SignalHandler {
  const cleanups = forward.map((sig) => {
    const handleSignal = () => {
      if (delivered.includes(sig)) return
      onForwarded?.(sig)
      child.kill(sig)
    }
    signals.on(sig, handleSignal)
    return () => {
      signals.removeListener(sig, handleSignal)
    }
  })

  return {
    cleanup(): void {
      cleanups.forEach((cleanup) => cleanup())
    },
  }
}
