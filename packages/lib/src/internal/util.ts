import * as path from "node:path"
import * as fs from "node:fs"

import { GateError } from "../errors.js"
import type { CommandInput, CommandSpec } from "../types.js"

/**
 * Small cross-platform command-line splitter.
 * - Splits on whitespace outside of single/double quotes
 * - Strips the surrounding quotes
 * - Does NOT implement shell semantics (no pipes, redirects, expansion)
 *
 * Enough for commands like:
 * - `nginx -g "daemon off;"`
 * - `"C:\\Program Files\\nodejs\\node.exe" server.js`
 */
export function parseCommandLine(command: string): CommandSpec {
  const tokens: string[] = []
  let current = ""
  let inToken = false
  let quoteChar: '"' | "'" | null = null

  for (const ch of command) {
    if (ch === '"' || ch === "'") {
      if (quoteChar === null) {
        quoteChar = ch
        inToken = true
        continue
      }

      if (quoteChar === ch) {
        quoteChar = null
        continue
      }

      // Other quote type inside quotes is literal
      current += ch
      continue
    }

    if (quoteChar === null && /\s/.test(ch)) {
      if (inToken) {
        tokens.push(current)
        current = ""
        inToken = false
      }
      continue
    }

    current += ch
    inToken = true
  }

  if (quoteChar !== null) {
    throw new GateError(
      `Invalid command: unterminated ${quoteChar} in "${command}"`,
      GateError.InvalidCommand
    )
  }

  if (inToken) {
    tokens.push(current)
  }

  return toCommandSpec(tokens, command)
}

function toCommandSpec(tokens: readonly string[], source: string): CommandSpec {
  const [cmd, ...args] = tokens
  if (cmd === undefined || cmd.length === 0) {
    throw new GateError(`Invalid command: "${source}"`, GateError.InvalidCommand)
  }
  return { cmd, args }
}

function isCommandSpec(input: CommandInput): input is CommandSpec {
  return typeof input === "object" && "cmd" in input
}

/**
 * Normalizes every accepted command form into a `CommandSpec`.
 */
export function normalizeCommand(input: CommandInput): CommandSpec {
  if (typeof input === "string") {
    return parseCommandLine(input)
  }
  if (isCommandSpec(input)) {
    return toCommandSpec([input.cmd, ...input.args], input.cmd)
  }
  return toCommandSpec(input, input.join(" "))
}

function isExecutable(candidate: string): boolean {
  try {
    if (!fs.statSync(candidate, { throwIfNoEntry: false })?.isFile()) return false
    if (process.platform !== "win32") fs.accessSync(candidate, fs.constants.X_OK)
    return true
  } catch {
    // ENOTDIR, EACCES on a PATH entry: keep searching
    return false
  }
}

/**
 * Resolves an executable from PATH.
 * `spawn` with `shell: false` does not search PATH the way a shell does on
 * every platform, and on Windows .cmd/.bat files must be run through cmd.exe.
 *
 * @param cmd - The command name to resolve (e.g., "nginx", "node")
 * @param pathEnv - The PATH environment variable value
 */
export function resolveExecutable(
  cmd: string,
  pathEnv: string | undefined
): { cmd: string; needsCmdWrapper: boolean } {
  if (path.isAbsolute(cmd) || cmd.includes("/") || cmd.includes(path.sep)) {
    return { cmd, needsCmdWrapper: false }
  }

  if (!pathEnv) {
    return { cmd, needsCmdWrapper: false }
  }

  const pathDirs = pathEnv.split(path.delimiter)
  const extensions =
    process.platform === "win32" ? ["", ".exe", ".cmd", ".bat"] : [""]

  for (const dir of pathDirs) {
    if (!dir) continue

    for (const ext of extensions) {
      const candidate = path.join(dir, `${cmd}${ext}`)
      if (isExecutable(candidate)) {
        const needsCmdWrapper =
          process.platform === "win32" && (ext === ".cmd" || ext === ".bat")
        return { cmd: candidate, needsCmdWrapper }
      }
    }
  }

  // Not found: spawn reports ENOENT
  return { cmd, needsCmdWrapper: false }
}

/**
 * Builds the final argv for `spawn`, wrapping Windows batch files in cmd.exe.
 */
export function toSpawnArgs(
  command: CommandSpec,
  pathEnv: string | undefined
): { file: string; args: string[] } {
  const { cmd, needsCmdWrapper } = resolveExecutable(command.cmd, pathEnv)
  if (needsCmdWrapper) {
    return {
      file: process.env.ComSpec ?? "cmd.exe",
      args: ["/d", "/s", "/c", cmd, ...command.args],
    }
  }
  return { file: cmd, args: [...command.args] }
}

export function formatCommand(command: CommandSpec): string {
  return [command.cmd, ...command.args]
    .map((part) => (/[\s"']/.test(part) || part === "" ? JSON.stringify(part) : part))
    .join(" ")
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts. Never rejects; callers
 * check `signal.aborted` afterwards.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve()
      return
    }
    const onAbort = () => {
      clearTimeout(timer)
      resolve()
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort)
      resolve()
    }, ms)
    signal?.addEventListener("abort", onAbort, { once: true })
  })
}

export function errorCode(error: Error): string {
  if ("code" in error && typeof error.code === "string") {
    return error.code
  }
  return error.message
}
