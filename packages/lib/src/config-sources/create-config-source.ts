import { $CONFIG_SOURCE_INTERNAL } from "../internal/constants.js"
import type { ConfigSource, ConfigSourceConfig } from "./types.js"

/**
 * Creates a config source usable with `resolveConfig`.
 *
 * @example
 * ```ts
 * import { createConfigSource } from "portgate"
 *
 * export const fixed = createConfigSource({
 *   name: "fixed",
 *   load: () => ({ intervalMs: 500 }),
 * })
 * ```
 */
export function createConfigSource(config: ConfigSourceConfig): ConfigSource {
  return { ...config, [$CONFIG_SOURCE_INTERNAL]: true } satisfies ConfigSource
}

export function isConfigSource(value: unknown): value is ConfigSource {
  return (
    typeof value === "object" &&
    value !== null &&
    $CONFIG_SOURCE_INTERNAL in value
  )
}
