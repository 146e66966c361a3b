import { Match } from "effect"

import type { Position } from "./token.js"

// CHANGE: model lexical and grammar failures as one tagged union
// WHY: the first failure anywhere in the pipeline is surfaced unchanged to the caller
// REF: req-validation-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ ValidationError: e.position locates the offending character
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: LexError ⊂ ValidationError
// COMPLEXITY: O(1)/O(1)

export type UnexpectedCharacter = {
  readonly _tag: "UnexpectedCharacter"
  readonly position: Position
  readonly found: string
}
export type InvalidString = {
  readonly _tag: "InvalidString"
  readonly position: Position
  readonly reason: string
}
export type InvalidNumber = {
  readonly _tag: "InvalidNumber"
  readonly position: Position
  readonly text: string
}
export type InvalidEncoding = {
  readonly _tag: "InvalidEncoding"
  readonly position: Position
  readonly reason: string
}

export type LexError = UnexpectedCharacter | InvalidString | InvalidNumber | InvalidEncoding

export type UnexpectedToken = { readonly _tag: "UnexpectedToken"; readonly position: Position; readonly found: string }
export type ExpectedToken = {
  readonly _tag: "ExpectedToken"
  readonly position: Position
  readonly expected: string
  readonly found: string
}
export type ExpectedString = { readonly _tag: "ExpectedString"; readonly position: Position; readonly found: string }
export type UnexpectedEof = { readonly _tag: "UnexpectedEof"; readonly position: Position; readonly expected: string }
export type TrailingData = { readonly _tag: "TrailingData"; readonly position: Position; readonly found: string }
export type TooDeep = { readonly _tag: "TooDeep"; readonly position: Position; readonly limit: number }

export type GrammarError =
  | UnexpectedToken
  | ExpectedToken
  | ExpectedString
  | UnexpectedEof
  | TrailingData
  | TooDeep

export type ValidationError = LexError | GrammarError

export type ValidationErrorKind = ValidationError["_tag"]

export const unexpectedCharacter = (position: Position, found: string): UnexpectedCharacter => ({
  _tag: "UnexpectedCharacter",
  position,
  found
})

export const invalidString = (position: Position, reason: string): InvalidString => ({
  _tag: "InvalidString",
  position,
  reason
})

export const invalidNumber = (position: Position, text: string): InvalidNumber => ({
  _tag: "InvalidNumber",
  position,
  text
})

export const invalidEncoding = (position: Position, reason: string): InvalidEncoding => ({
  _tag: "InvalidEncoding",
  position,
  reason
})

export const unexpectedToken = (position: Position, found: string): UnexpectedToken => ({
  _tag: "UnexpectedToken",
  position,
  found
})

export const expectedToken = (position: Position, expected: string, found: string): ExpectedToken => ({
  _tag: "ExpectedToken",
  position,
  expected,
  found
})

export const expectedString = (position: Position, found: string): ExpectedString => ({
  _tag: "ExpectedString",
  position,
  found
})

export const unexpectedEof = (position: Position, expected: string): UnexpectedEof => ({
  _tag: "UnexpectedEof",
  position,
  expected
})

export const trailingData = (position: Position, found: string): TrailingData => ({
  _tag: "TrailingData",
  position,
  found
})

export const tooDeep = (position: Position, limit: number): TooDeep => ({
  _tag: "TooDeep",
  position,
  limit
})

/**
 * Describe a single source character for diagnostics.
 *
 * @param char - One character, or "" at end of input.
 *
 * @pure true
 * @complexity O(1)
 */
export const describeCharacter = (char: string): string => {
  if (char.length === 0) {
    return "end of input"
  }
  const code = char.codePointAt(0) ?? 0
  if (code < 0x20 || code === 0x7f || code > 0x7e) {
    return `U+${code.toString(16).toUpperCase().padStart(4, "0")}`
  }
  return `'${char}'`
}

/**
 * Human-readable message for an error, without its position.
 *
 * @pure true
 * @invariant every error kind has a message
 * @complexity O(1)
 */
export const describeValidationError = (error: ValidationError): string =>
  Match.value(error).pipe(
    Match.when({ _tag: "UnexpectedCharacter" }, (value) => `unexpected character ${value.found}`),
    Match.when({ _tag: "InvalidString" }, (value) => `invalid string: ${value.reason}`),
    Match.when({ _tag: "InvalidNumber" }, (value) => `invalid number '${value.text}'`),
    Match.when({ _tag: "InvalidEncoding" }, (value) => `invalid encoding: ${value.reason}`),
    Match.when({ _tag: "UnexpectedToken" }, (value) => `unexpected ${value.found}`),
    Match.when({ _tag: "ExpectedToken" }, (value) => `expected ${value.expected} but found ${value.found}`),
    Match.when({ _tag: "ExpectedString" }, (value) => `expected string key but found ${value.found}`),
    Match.when({ _tag: "UnexpectedEof" }, (value) => `unexpected end of input, expected ${value.expected}`),
    Match.when({ _tag: "TrailingData" }, (value) => `unexpected ${value.found} after the root value`),
    Match.when({ _tag: "TooDeep" }, (value) => `nesting exceeds the maximum depth of ${value.limit}`),
    Match.exhaustive
  )

export const formatValidationError = (error: ValidationError): string =>
  `${describeValidationError(error)} at line ${error.position.line}, column ${error.position.column}`
