import type { CliArgs, LogLevelName } from "./cli.js"
import { DEFAULT_RADIUS } from "./diagnostics.js"

// CHANGE: define config merging rules and defaults
// WHY: ensure CLI flags override config file and defaults deterministically
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolved radius is a non-negative integer
// COMPLEXITY: O(1)/O(1)

export interface FileConfig {
  readonly logLevel?: LogLevelName
  readonly radius?: number
  readonly color?: boolean
}

export interface ResolvedConfig {
  readonly logLevel: LogLevelName
  readonly radius: number
  readonly color: boolean
}

export const defaultConfig: ResolvedConfig = {
  logLevel: "error",
  radius: DEFAULT_RADIUS,
  color: false
}

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .laxjson.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  logLevel: cli.logLevel ?? fileConfig?.logLevel ?? defaultConfig.logLevel,
  radius: cli.radius ?? fileConfig?.radius ?? defaultConfig.radius,
  color: cli.color ?? fileConfig?.color ?? defaultConfig.color
})
