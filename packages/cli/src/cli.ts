import * as fs from "node:fs"
import { parseArgs } from "node:util"

import {
  createLogger,
  envConfigSource,
  exitCodeFor,
  gate,
  GateError,
  normalizeCommand,
  parseAttemptCount,
  parseMilliseconds,
  parseTarget,
  resolveConfig,
} from "portgate"
import { yamlFile } from "@portgate/config-yaml"
import type {
  ConfigSource,
  PartialConfig,
  ProbeFn,
  ResolvedConfig,
  SignalSource,
  SpawnFn,
} from "portgate"

export const USAGE = `Usage: portgate [options] <host:port>... -- <command> [args...]

Waits until every host:port accepts TCP connections, then runs <command>
in the foreground and exits with its exit code.

Options:
  -c, --config <file>       Read targets and settings from a YAML file
  -i, --interval <ms>       Delay between connection attempts (default 100)
  -t, --timeout <ms>        Give up after this long (default: wait forever)
  -n, --max-attempts <n>    Give up after n failed attempts per target
      --connect-timeout <ms>
                            Limit for a single connection attempt (default 1000)
  -q, --quiet               Only print errors
  -v, --verbose             Print every failed attempt
  -h, --help                Show this help
      --version             Show the version

Environment:
  PORTGATE_TARGETS, PORTGATE_COMMAND, PORTGATE_INTERVAL_MS,
  PORTGATE_TIMEOUT_MS, PORTGATE_MAX_ATTEMPTS,
  PORTGATE_CONNECT_TIMEOUT_MS, PORTGATE_LOG_LEVEL`

export interface CliContext {
  env?: NodeJS.ProcessEnv
  cwd?: string
  stdout?: (line: string) => void
  stderr?: (line: string) => void
  spawn?: SpawnFn
  signals?: SignalSource
  probe?: ProbeFn
}

export interface ParsedCli {
  help: boolean
  version: boolean
  configFile: string | undefined
  overrides: PartialConfig
}

function readVersion(): string {
  const manifest: unknown = JSON.parse(
    fs.readFileSync(new URL("../package.json", import.meta.url), "utf8")
  )
  if (
    typeof manifest === "object" &&
    manifest !== null &&
    "version" in manifest &&
    typeof manifest.version === "string"
  ) {
    return manifest.version
  }
  return "unknown"
}

function parseOptions(args: readonly string[]) {
  return parseArgs({
    args: [...args],
    allowPositionals: true,
    strict: true,
    options: {
      config: { type: "string", short: "c" },
      interval: { type: "string", short: "i" },
      timeout: { type: "string", short: "t" },
      "max-attempts": { type: "string", short: "n" },
      "connect-timeout": { type: "string" },
      quiet: { type: "boolean", short: "q" },
      verbose: { type: "boolean", short: "v" },
      help: { type: "boolean", short: "h" },
      version: { type: "boolean" },
    },
  })
}

/**
 * Parses `argv` (without the node and script paths). Everything after the
 * first `--` is the command to launch.
 * @throws {GateError} on unknown options or invalid values
 */
export function parseCliArgs(argv: readonly string[]): ParsedCli {
  const separator = argv.indexOf("--")
  const optionArgs = separator === -1 ? argv : argv.slice(0, separator)
  const commandArgs = separator === -1 ? [] : argv.slice(separator + 1)

  let parsed: ReturnType<typeof parseOptions>
  try {
    parsed = parseOptions(optionArgs)
  } catch (error) {
    throw new GateError(
      error instanceof Error ? error.message : String(error),
      GateError.InvalidConfig,
      { cause: error }
    )
  }

  const { values, positionals } = parsed
  const overrides: PartialConfig = {}

  if (positionals.length > 0) {
    overrides.targets = positionals.map((target) => parseTarget(target))
  }
  if (commandArgs.length > 0) {
    overrides.command = normalizeCommand(commandArgs)
  }
  if (values.interval !== undefined) {
    overrides.intervalMs = parseMilliseconds("--interval", values.interval)
  }
  if (values.timeout !== undefined) {
    overrides.timeoutMs = parseMilliseconds("--timeout", values.timeout, {
      unbounded: true,
    })
  }
  if (values["max-attempts"] !== undefined) {
    overrides.maxAttempts = parseAttemptCount(
      "--max-attempts",
      values["max-attempts"]
    )
  }
  if (values["connect-timeout"] !== undefined) {
    overrides.connectTimeoutMs = parseMilliseconds(
      "--connect-timeout",
      values["connect-timeout"],
      { unbounded: true, positive: true }
    )
  }
  if (values.quiet === true && values.verbose === true) {
    throw new GateError(
      "--quiet and --verbose cannot be combined",
      GateError.InvalidConfig
    )
  }
  if (values.quiet === true) overrides.logLevel = "error"
  if (values.verbose === true) overrides.logLevel = "debug"

  return {
    help: values.help === true,
    version: values.version === true,
    configFile: values.config,
    overrides,
  }
}

/**
 * Runs the gate for the given arguments and resolves with the exit code
 * the process should exit with.
 */
export async function runCli(
  argv: readonly string[],
  {
    env = process.env,
    cwd = process.cwd(),
    stdout = (line) => console.log(line),
    stderr = (line) => console.error(line),
    spawn,
    signals,
    probe,
  }: CliContext = {}
): Promise<number> {
  const usageError = (message: string) => {
    stderr(`portgate: ${message}`)
    stderr(`Run "portgate --help" for usage.`)
    return 2
  }

  let cli: ParsedCli
  let config: ResolvedConfig
  try {
    cli = parseCliArgs(argv)
    if (cli.help) {
      stdout(USAGE)
      return 0
    }
    if (cli.version) {
      stdout(readVersion())
      return 0
    }

    const sources: ConfigSource[] = []
    if (cli.configFile !== undefined) sources.push(yamlFile(cli.configFile))
    sources.push(envConfigSource)
    config = resolveConfig(sources, { cwd, env, overrides: cli.overrides })
  } catch (error) {
    if (!(error instanceof GateError)) throw error
    if (error.code === GateError.InvalidConfig) return usageError(error.message)
    stderr(`portgate: ${error.message}`)
    return exitCodeFor(error)
  }

  if (config.targets.length === 0) {
    return usageError("no targets given (expected host:port)")
  }
  if (config.command === null) {
    return usageError('no command given (expected "-- <command> [args...]")')
  }

  const logger = createLogger({ level: config.logLevel, stdout, stderr })
  const result = await gate({
    targets: config.targets,
    command: config.command,
  }).run({
    intervalMs: config.intervalMs,
    timeoutMs: config.timeoutMs,
    maxAttempts: config.maxAttempts,
    connectTimeoutMs: config.connectTimeoutMs,
    logger,
    cwd,
    env,
    spawn,
    signals,
    probe,
  })

  return result.exitCode
}
