import {
  createConfigSource,
  GateError,
  normalizeCommand,
  parseAttemptCount,
  parseLogLevel,
  parseMilliseconds,
  parseTarget,
  parseTargetList,
} from "portgate"
import type { ConfigSource, PartialConfig, ProbeTarget } from "portgate"
import * as fs from "node:fs"
import * as path from "node:path"
import { parse as parseYaml } from "yaml"

/**
 * Options for the `yamlFile()` config source.
 */
export interface YamlFileOptions {
  /**
   * When true, a missing file yields an empty config instead of an error.
   * @default false
   */
  optional?: boolean
}

const KNOWN_KEYS = new Set([
  "targets",
  "command",
  "interval",
  "timeout",
  "maxAttempts",
  "connectTimeout",
  "logLevel",
])

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function invalid(file: string, message: string, cause?: unknown): GateError {
  return new GateError(`${file}: ${message}`, GateError.InvalidConfig, {
    cause,
  })
}

function parseTargets(file: string, value: unknown): ProbeTarget[] {
  if (typeof value === "string") {
    return parseTargetList(value)
  }
  if (!Array.isArray(value)) {
    throw invalid(file, '"targets" must be a list of host:port entries')
  }
  return value.map((entry: unknown, index) => {
    if (typeof entry === "string") {
      return parseTarget(entry)
    }
    if (
      isRecord(entry) &&
      typeof entry.host === "string" &&
      (typeof entry.port === "number" || typeof entry.port === "string")
    ) {
      return parseTarget({ host: entry.host, port: entry.port })
    }
    throw invalid(
      file,
      `"targets[${index}]" must be "host:port" or { host, port }`
    )
  })
}

function parseCommand(file: string, value: unknown) {
  if (typeof value === "string") {
    return normalizeCommand(value)
  }
  if (Array.isArray(value)) {
    const argv: string[] = []
    for (const part of value) {
      if (typeof part !== "string" && typeof part !== "number") {
        throw invalid(file, '"command" entries must be strings')
      }
      argv.push(String(part))
    }
    return normalizeCommand(argv)
  }
  throw invalid(file, '"command" must be a string or a list of arguments')
}

/**
 * Converts a parsed YAML document into a partial gate config.
 * `file` is only used in error messages.
 */
export function toGateConfig(file: string, document: unknown): PartialConfig {
  if (document === null || document === undefined) {
    return {}
  }
  if (!isRecord(document)) {
    throw invalid(file, "expected a mapping at the top level")
  }

  const unknownKeys = Object.keys(document).filter((key) => !KNOWN_KEYS.has(key))
  if (unknownKeys.length > 0) {
    throw invalid(file, `unknown key(s): ${unknownKeys.join(", ")}`)
  }

  const config: PartialConfig = {}
  try {
    if (document.targets !== undefined) {
      config.targets = parseTargets(file, document.targets)
    }
    if (document.command !== undefined) {
      config.command = parseCommand(file, document.command)
    }
    if (document.interval !== undefined) {
      config.intervalMs = parseMilliseconds("interval", document.interval)
    }
    if (document.timeout !== undefined) {
      config.timeoutMs = parseMilliseconds("timeout", document.timeout, {
        unbounded: true,
      })
    }
    if (document.maxAttempts !== undefined) {
      config.maxAttempts = parseAttemptCount("maxAttempts", document.maxAttempts)
    }
    if (document.connectTimeout !== undefined) {
      config.connectTimeoutMs = parseMilliseconds(
        "connectTimeout",
        document.connectTimeout,
        { unbounded: true, positive: true }
      )
    }
    if (document.logLevel !== undefined) {
      config.logLevel = parseLogLevel("logLevel", document.logLevel)
    }
  } catch (error) {
    if (error instanceof GateError && !error.message.startsWith(`${file}:`)) {
      throw invalid(file, error.message, error)
    }
    throw error
  }
  return config
}

/**
 * Parses the text of a gate file.
 */
export function parseGateYaml(file: string, content: string): PartialConfig {
  let document: unknown
  try {
    document = parseYaml(content, { strict: true })
  } catch (error) {
    throw invalid(
      file,
      `failed to parse YAML: ${error instanceof Error ? error.message : String(error)}`,
      error
    )
  }
  return toGateConfig(file, document)
}

/**
 * A config source backed by a YAML gate file, resolved against the
 * context's cwd.
 *
 * @example
 * ```yaml
 * # portgate.yaml
 * targets:
 *   - web:8000
 *   - { host: db, port: 5432 }
 * interval: 100
 * timeout: 30000
 * command: nginx -g "daemon off;"
 * ```
 */
export function yamlFile(
  filePath: string,
  { optional = false }: YamlFileOptions = {}
): ConfigSource {
  return createConfigSource({
    name: filePath,
    load: ({ cwd }) => {
      const resolved = path.resolve(cwd, filePath)
      if (!fs.existsSync(resolved)) {
        if (optional) return {}
        throw invalid(filePath, "file not found")
      }
      let content: string
      try {
        content = fs.readFileSync(resolved, "utf8")
      } catch (error) {
        throw invalid(
          filePath,
          `failed to read: ${error instanceof Error ? error.message : String(error)}`,
          error
        )
      }
      return parseGateYaml(filePath, content)
    },
  })
}
