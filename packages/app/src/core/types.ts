import type { TokenDump } from "./tokenizer.js"
import type { Verdict } from "./verdict.js"

// CHANGE: define result types shared by the program and the report renderers
// WHY: keep IO-free data structures reusable across output formats and tests
// REF: req-report-types-1
// SOURCE: n/a
// FORMAT THEOREM: ∀r ∈ Report: r.summary.valid + r.summary.invalid = |r.files|
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: files keep the order they were given on the command line
// COMPLEXITY: O(1)/O(1)

export interface FileResult {
  readonly path: string
  readonly verdict: Verdict
  readonly tokens: TokenDump | undefined
}

export interface Summary {
  readonly valid: number
  readonly invalid: number
}

export interface Report {
  readonly files: ReadonlyArray<FileResult>
  readonly summary: Summary
}
