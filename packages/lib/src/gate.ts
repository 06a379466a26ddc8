import { GateError, exitCodeFor } from "./errors.js"
import { handoff } from "./handoff.js"
import { createLogger } from "./logger.js"
import { waitForTargets } from "./probe.js"
import { parseTarget } from "./target.js"
import { createSignalHandler } from "./internal/signal-handler.js"
import { formatCommand, normalizeCommand } from "./internal/util.js"

import type {
  Gate,
  GateDefinition,
  GateResult,
  GateRunOptions,
  WaitAllResult,
} from "./types.js"

/**
 * Creates a gate that launches `command` once every target accepts TCP
 * connections.
 * @throws {GateError} when the definition has no targets, an invalid target,
 * or an empty command.
 * @example
 * const result = await gate({
 *   targets: ["web:8000"],
 *   command: 'nginx -g "daemon off;"',
 * }).run()
 * process.exit(result.exitCode)
 */
export function gate(definition: GateDefinition): Gate {
  if (definition.targets.length === 0) {
    throw new GateError(
      "A gate needs at least one target to wait for",
      GateError.InvalidConfig
    )
  }
  const targets = definition.targets.map((target) => parseTarget(target))
  const command = normalizeCommand(definition.command)

  return {
    targets,
    command,

    async run(options: GateRunOptions = {}): Promise<GateResult> {
      const startedAt = Date.now()
      const logger = options.logger ?? createLogger()
      const controller = new AbortController()
      const state: { terminatedBy: NodeJS.Signals | null } = {
        terminatedBy: null,
      }

      if (options.signal?.aborted) {
        const error = new GateError("Aborted", GateError.Aborted)
        return {
          ok: false,
          error,
          phase: "probing",
          exitCode: exitCodeFor(error),
          probes: [],
          durationMs: 0,
        }
      }

      const signalHandler = createSignalHandler({
        abortSignal: options.signal,
        signals: options.signals,
        onAborted: () => controller.abort(),
        onProcessTerminated: (sig) => {
          state.terminatedBy = sig
          logger.warn(`Received ${sig} while waiting, not launching`)
          controller.abort()
        },
      })

      let waited: WaitAllResult
      try {
        waited = await waitForTargets(targets, {
          ...options,
          logger,
          signal: controller.signal,
        })
      } catch (error) {
        if (!(error instanceof GateError)) throw error
        waited = { ok: false, error, probes: [] }
      } finally {
        signalHandler.cleanup()
      }

      if (!waited.ok) {
        let error = waited.error
        if (state.terminatedBy && error.code === GateError.Aborted) {
          error = new GateError(
            `Received ${state.terminatedBy} before ${formatCommand(command)} was launched`,
            GateError.ProcessTerminated,
            { reason: state.terminatedBy }
          )
        }
        if (error.code === GateError.DependencyUnavailable) {
          logger.error(error.message)
        }
        return {
          ok: false,
          error,
          phase: "probing",
          exitCode: exitCodeFor(error),
          probes: waited.probes,
          durationMs: Date.now() - startedAt,
        }
      }

      const launched = await handoff(command, { ...options, logger })
      if (!launched.ok) {
        return {
          ok: false,
          error: launched.error,
          phase: "handoff",
          exitCode: launched.exitCode,
          probes: waited.probes,
          durationMs: Date.now() - startedAt,
        }
      }

      return {
        ok: true,
        error: null,
        exitCode: launched.exitCode,
        signal: launched.signal,
        probes: waited.probes,
        durationMs: Date.now() - startedAt,
      }
    },
  }
}
