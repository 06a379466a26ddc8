export { gate } from "./gate.js"
export { waitForTarget, waitForTargets, probeOnce } from "./probe.js"
export { handoff } from "./handoff.js"
export { parseTarget, parseTargetList, formatTarget } from "./target.js"
export { GateError, exitCodeFor, signalExitCode } from "./errors.js"
export { createLogger, silentLogger, isLogLevel, LOG_LEVELS } from "./logger.js"
export {
  ENV,
  DEFAULT_CONFIG,
  envConfigSource,
  resolveConfig,
  parseMilliseconds,
  parseAttemptCount,
  parseLogLevel,
} from "./config.js"
export { createConfigSource } from "./config-sources/create-config-source.js"
export { normalizeCommand, parseCommandLine, formatCommand } from "./internal/util.js"
export { FORWARDED_SIGNALS, TERMINATION_SIGNALS } from "./internal/constants.js"

export type { GateErrorCode, GateErrorOptions } from "./errors.js"
export type { Logger, LoggerConfig, LogLevel } from "./logger.js"
export type { ResolveConfigOptions } from "./config.js"
export type {
  ConfigContext,
  ConfigSource,
  ConfigSourceConfig,
} from "./config-sources/types.js"
export type {
  ProbeTarget,
  TargetInput,
  ProbeAttempt,
  ProbeOnceOptions,
  ProbeFn,
  ProbeHooks,
  WaitOptions,
  ProbeResult,
  WaitAllResult,
  CommandSpec,
  CommandInput,
  ChildHandle,
  SpawnFn,
  SignalSource,
  HandoffOptions,
  HandoffResult,
  GateDefinition,
  GateRunOptions,
  Gate,
  GatePhase,
  GateResult,
  ResolvedConfig,
  PartialConfig,
} from "./types.js"
