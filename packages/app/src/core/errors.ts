import { Match } from "effect"

import type { CliError } from "./cli.js"

// CHANGE: unify error algebra for the CLI tool
// WHY: provide typed failures for program flow and exit codes
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: invalid JSON is a verdict, never an AppError
// COMPLEXITY: O(1)/O(1)

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly path: string; readonly message: string }

export type AppError = CliError | ConfigError | FileError

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (path: string, message: string): FileError => ({
  _tag: "FileError",
  path,
  message
})

/**
 * Render an AppError as a single diagnostic line.
 *
 * @pure true
 * @complexity O(1)
 */
export const renderAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.when({ _tag: "CliError" }, (value) => `error: ${value.message}`),
    Match.when({ _tag: "ConfigError" }, (value) => `error: invalid config: ${value.message}`),
    Match.when({ _tag: "FileError" }, (value) => `error: ${value.path}: ${value.message}`),
    Match.exhaustive
  )
