import type { $CONFIG_SOURCE_INTERNAL } from "../internal/constants.js"
import type { PartialConfig } from "../types.js"

/**
 * Context provided to config sources when they are loaded.
 */
export interface ConfigContext {
  /**
   * Directory relative paths are resolved against.
   */
  cwd: string
  env: NodeJS.ProcessEnv
}

/**
 * A config source produces part of the gate's settings, e.g. from the
 * environment or a YAML file. Later sources override earlier ones.
 */
export interface ConfigSourceConfig {
  /**
   * Used in error messages (e.g. "env", "portgate.yaml").
   */
  name: string
  load: (ctx: ConfigContext) => PartialConfig
}

export interface ConfigSource extends ConfigSourceConfig {
  readonly name: string

  load(ctx: ConfigContext): PartialConfig
  readonly [$CONFIG_SOURCE_INTERNAL]: true
}
