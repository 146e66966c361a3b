import { describeToken } from "./token.js"
import type { TokenDump } from "./tokenizer.js"
import type { FileResult, Report } from "./types.js"
import type { ValidationErrorKind } from "./validation-error.js"
import { describeValidationError, formatValidationError } from "./validation-error.js"
import type { Verdict } from "./verdict.js"

// CHANGE: build structured reports and render output formats
// WHY: keep reporting pure and deterministic across output modes
// REF: req-report-1
// SOURCE: n/a
// FORMAT THEOREM: ∀r: render(r) lists every file exactly once, in input order
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: summary counts match the verdicts
// COMPLEXITY: O(n)

/**
 * Build a Report from per-file results.
 *
 * @pure true
 * @complexity O(n)
 */
export const buildReport = (files: ReadonlyArray<FileResult>): Report => {
  const valid = files.filter((file) => file.verdict._tag === "Valid").length
  return {
    files,
    summary: { valid, invalid: files.length - valid }
  }
}

export const hasInvalid = (report: Report): boolean => report.summary.invalid > 0

const formatVerdict = (path: string, verdict: Verdict): string =>
  verdict._tag === "Valid"
    ? `${path}: valid`
    : `${path}: invalid: ${formatValidationError(verdict.error)}`

const formatTokens = (dump: TokenDump): ReadonlyArray<string> => {
  const lines = dump.tokens.map((token) =>
    `  ${token.position.line}:${token.position.column} ${describeToken(token)}`
  )
  if (dump.error === undefined) {
    return lines
  }
  const { line, column } = dump.error.position
  return [...lines, `  ${line}:${column} error: ${describeValidationError(dump.error)}`]
}

/**
 * Render a human-readable report.
 *
 * @param report - Report data.
 * @returns Multi-line string for stdout.
 *
 * @pure true
 * @invariant the last line is the summary
 * @complexity O(n)
 */
export const renderHumanReport = (report: Report): string => {
  const fileLines = report.files.flatMap((file) => [
    formatVerdict(file.path, file.verdict),
    ...(file.tokens === undefined ? [] : formatTokens(file.tokens))
  ])
  const summary =
    `Checked ${report.files.length} file(s): ${report.summary.valid} valid, ${report.summary.invalid} invalid`
  return [...fileLines, summary].join("\n")
}

type JsonFileEntry =
  | { readonly path: string; readonly valid: true }
  | {
    readonly path: string
    readonly valid: false
    readonly error: {
      readonly kind: ValidationErrorKind
      readonly message: string
      readonly offset: number
      readonly line: number
      readonly column: number
    }
  }

const jsonFile = (file: FileResult): JsonFileEntry =>
  file.verdict._tag === "Valid"
    ? { path: file.path, valid: true }
    : {
      path: file.path,
      valid: false,
      error: {
        kind: file.verdict.error._tag,
        message: describeValidationError(file.verdict.error),
        offset: file.verdict.error.position.offset,
        line: file.verdict.error.position.line,
        column: file.verdict.error.position.column
      }
    }

/**
 * Render report as JSON text.
 *
 * @pure true
 * @invariant output parses back into { files, summary }
 * @complexity O(n)
 */
export const renderJsonReport = (report: Report): string =>
  JSON.stringify(
    {
      files: report.files.map(jsonFile),
      summary: report.summary
    },
    null,
    2
  )
