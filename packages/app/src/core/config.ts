import type { CliArgs } from "./cli.js"
import type { ValidatorOptions } from "./validator.js"
import { DEFAULT_MAX_DEPTH } from "./validator.js"

// CHANGE: define config merging rules and defaults
// WHY: ensure CLI flags override config file and defaults deterministically
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: 1 ≤ maxDepth ≤ MAX_DEPTH_CEILING, concurrency ≥ 1
// COMPLEXITY: O(1)/O(1)

export interface FileConfig {
  readonly maxDepth?: number
  readonly concurrency?: number
}

export interface ResolvedConfig {
  readonly validator: ValidatorOptions
  readonly concurrency: number
}

export const DEFAULT_CONCURRENCY = 4

export const DEFAULT_CONFIG_PATH = "./.json-validator.json"

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .json-validator.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  validator: { maxDepth: cli.maxDepth ?? fileConfig?.maxDepth ?? DEFAULT_MAX_DEPTH },
  concurrency: cli.concurrency ?? fileConfig?.concurrency ?? DEFAULT_CONCURRENCY
})
