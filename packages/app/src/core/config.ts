import type { CliArgs } from "./cli.js"
import { DEFAULT_MAX_DEPTH } from "./parser.js"
import type { Conformance } from "./scanner.js"
import { DEFAULT_INDENT } from "./serializer.js"

// CHANGE: define config merging rules and defaults
// WHY: ensure CLI flags override config file and defaults deterministically
// QUOTE(TZ): "Priority: CLI flags > config file > defaults."
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every resolved field is defined
// COMPLEXITY: O(1)/O(1)

export interface FileConfig {
  readonly conformance?: Conformance
  readonly maxDepth?: number
  readonly maxInputBytes?: number
  readonly memoryLimitBytes?: number
  readonly indent?: number
}

export interface ResolvedConfig {
  readonly conformance: Conformance
  readonly maxDepth: number
  readonly maxInputBytes: number
  /** 0 means no ceiling. */
  readonly memoryLimitBytes: number
  readonly indent: number
}

export const DEFAULT_CONFIG_PATH = "./.jsontree.json"

export const defaultConfig: ResolvedConfig = {
  conformance: "lenient",
  maxDepth: DEFAULT_MAX_DEPTH,
  maxInputBytes: 8 * 1024 * 1024,
  memoryLimitBytes: 0,
  indent: DEFAULT_INDENT
}

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .jsontree.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  conformance: cli.conformance ?? fileConfig?.conformance ?? defaultConfig.conformance,
  maxDepth: cli.maxDepth ?? fileConfig?.maxDepth ?? defaultConfig.maxDepth,
  maxInputBytes: cli.maxInputBytes ?? fileConfig?.maxInputBytes ?? defaultConfig.maxInputBytes,
  memoryLimitBytes: cli.memoryLimitBytes ?? fileConfig?.memoryLimitBytes ?? defaultConfig.memoryLimitBytes,
  indent: cli.indent ?? fileConfig?.indent ?? defaultConfig.indent
})
