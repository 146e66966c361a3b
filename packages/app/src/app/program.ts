import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Console, Effect, Logger, LogLevel } from "effect"
import * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs, usage } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { DEFAULT_CONFIG_PATH, resolveConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { renderAppError } from "../core/errors.js"
import { buildReport, hasInvalid, renderHumanReport, renderJsonReport } from "../core/report.js"
import { tokenize } from "../core/tokenizer.js"
import type { FileResult, Report } from "../core/types.js"
import { describeValidationError } from "../core/validation-error.js"
import { decodeSource, invalid, validateText } from "../core/verdict.js"
import { loadConfigFile } from "../shell/config-file.js"
import { readSourceFile } from "../shell/source-file.js"

// CHANGE: orchestrate batch validation with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀files: exitCode = 2 ⇔ ∃f ∈ files: verdict(f) = Invalid
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: report emitted at most once; each file gets an isolated pipeline
// COMPLEXITY: O(total input size)

export interface ProgramResult {
  readonly report: Report
  readonly exitCode: number
}

export const EXIT_VALID = 0
export const EXIT_INVALID = 2
export const EXIT_FAILURE = 1

const emptyReport: Report = buildReport([])

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const emitReport = (report: Report, cli: CliArgs): Effect.Effect<void> => {
  if (cli.silent) {
    return Effect.void
  }
  return writeStdout(cli.json ? renderJsonReport(report) : renderHumanReport(report))
}

const checkFile = (
  path: string,
  config: ResolvedConfig,
  withTokens: boolean
): Effect.Effect<FileResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    yield* _(Effect.logDebug("validating"))
    const bytes = yield* _(readSourceFile(path))
    const decoded = decodeSource(bytes)
    if (Either.isLeft(decoded)) {
      return { path, verdict: invalid(decoded.left), tokens: undefined }
    }
    const verdict = validateText(decoded.right, config.validator)
    yield* _(
      verdict._tag === "Valid"
        ? Effect.logDebug("valid")
        : Effect.logDebug(`invalid: ${describeValidationError(verdict.error)}`)
    )
    return {
      path,
      verdict,
      tokens: withTokens ? tokenize(decoded.right) : undefined
    }
  }).pipe(Effect.annotateLogs("file", path))

const runValidation = (
  cli: CliArgs
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const configFile = yield* _(loadConfigFile(cli.configPath ?? DEFAULT_CONFIG_PATH, cli.configExplicit))
    const config = resolveConfig(cli, configFile)
    yield* _(
      Effect.logDebug(
        `checking ${cli.files.length} file(s), maxDepth=${config.validator.maxDepth}, concurrency=${config.concurrency}`
      )
    )
    const results = yield* _(
      Effect.forEach(cli.files, (path) => checkFile(path, config, cli.tokens), {
        concurrency: config.concurrency
      })
    )
    const report = buildReport(results)
    yield* _(emitReport(report, cli))
    return { report, exitCode: hasInvalid(report) ? EXIT_INVALID : EXIT_VALID }
  })

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with report and exit code.
 *
 * @pure false
 * @effect FileSystem, Console
 * @invariant exitCode is deterministic for fixed inputs
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    if (cli.help) {
      yield* _(writeStdout(usage))
      return { report: emptyReport, exitCode: EXIT_VALID }
    }
    return yield* _(
      runValidation(cli).pipe(Logger.withMinimumLogLevel(cli.verbose ? LogLevel.Debug : LogLevel.Info))
    )
  })

/**
 * Run the CLI and fold every AppError into a stderr diagnostic.
 *
 * @returns process exit code: 0 valid, 2 invalid, 1 failure.
 *
 * @pure false
 * @effect FileSystem, Console
 * @invariant never fails; AppError maps to EXIT_FAILURE
 */
export const runProgram = (
  argv: ReadonlyArray<string>
): Effect.Effect<number, never, FileSystemService> =>
  runCli(argv).pipe(
    Effect.map((result) => result.exitCode),
    Effect.catchAll((error) => Console.error(renderAppError(error)).pipe(Effect.as(EXIT_FAILURE)))
  )
