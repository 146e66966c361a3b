import * as Either from "effect/Either"

import type { KeywordTag, Position, Token } from "./token.js"
import { keywordTags, numberLiteral, punctuationByChar, simpleToken, stringLiteral } from "./token.js"
import type { LexError } from "./validation-error.js"
import {
  describeCharacter,
  invalidEncoding,
  invalidNumber,
  invalidString,
  unexpectedCharacter
} from "./validation-error.js"

// CHANGE: implement a lazy, restartable JSON tokenizer
// WHY: the validator pulls one token at a time so memory tracks depth, not input size
// REF: req-tokenizer-1
// SOURCE: RFC 8259 §2, §6, §7
// FORMAT THEOREM: ∀s: tokens(s) after reset() = tokens(s) (determinism)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the scan offset only moves forward between resets
// COMPLEXITY: O(n) over the whole input

export interface Tokenizer {
  /** Next token, or the first lexical error. Keeps returning EndOfInput once reached. */
  readonly next: () => Either.Either<Token, LexError>
  /** Rewind to the start of the source. */
  readonly reset: () => void
  /** Current scan position, just past the last token returned. */
  readonly position: () => Position
}

interface ScanState {
  offset: number
  line: number
  column: number
}

const NUMBER_PATTERN = /^-?(?:0|[1-9][0-9]*)(?:\.[0-9]+)?(?:[eE][+-]?[0-9]+)?$/
const HEX4_PATTERN = /^[0-9a-fA-F]{4}$/
const WORD_CHAR_PATTERN = /^[A-Za-z0-9_$]$/

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  "\"": "\"",
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t"
}

const isWhitespace = (char: string): boolean => char === " " || char === "\t" || char === "\n" || char === "\r"

const isDigit = (char: string): boolean => char >= "0" && char <= "9"

const isNumberChar = (char: string): boolean =>
  isDigit(char) || char === "-" || char === "+" || char === "." || char === "e" || char === "E"

const isHighSurrogate = (code: number): boolean => code >= 0xd800 && code <= 0xdbff

const isLowSurrogate = (code: number): boolean => code >= 0xdc00 && code <= 0xdfff

const snapshot = (state: ScanState): Position => ({
  offset: state.offset,
  line: state.line,
  column: state.column
})

// Only valid for offsets on the current line.
const ahead = (state: ScanState, units: number): Position => ({
  offset: state.offset + units,
  line: state.line,
  column: state.column + units
})

const step = (state: ScanState, source: string, units: number): void => {
  if (source.charAt(state.offset) === "\n") {
    state.line += 1
    state.column = 1
  } else {
    state.column += 1
  }
  state.offset += units
}

const skipWhitespace = (state: ScanState, source: string): void => {
  while (isWhitespace(source.charAt(state.offset))) {
    step(state, source, 1)
  }
}

// 0 = lone surrogate, 1 = BMP code unit, 2 = well-formed pair
const codePointWidth = (source: string, offset: number): 0 | 1 | 2 => {
  const code = source.charCodeAt(offset)
  if (isLowSurrogate(code)) {
    return 0
  }
  if (isHighSurrogate(code)) {
    return isLowSurrogate(source.charCodeAt(offset + 1)) ? 2 : 0
  }
  return 1
}

const scanEscape = (
  state: ScanState,
  source: string
): Either.Either<string, LexError> => {
  const start = snapshot(state)
  const marker = source.charAt(state.offset + 1)
  if (marker === "u") {
    const hex = source.slice(state.offset + 2, state.offset + 6)
    if (!HEX4_PATTERN.test(hex)) {
      return Either.left(invalidString(start, "\\u must be followed by four hex digits"))
    }
    for (let index = 0; index < 6; index++) {
      step(state, source, 1)
    }
    return Either.right(String.fromCharCode(Number.parseInt(hex, 16)))
  }
  const decoded = SIMPLE_ESCAPES[marker]
  if (decoded === undefined) {
    const found = marker.length === 0 ? "end of input" : describeCharacter(marker)
    return Either.left(invalidString(start, `invalid escape sequence \\ followed by ${found}`))
  }
  step(state, source, 1)
  step(state, source, 1)
  return Either.right(decoded)
}

const scanString = (state: ScanState, source: string): Either.Either<Token, LexError> => {
  const start = snapshot(state)
  step(state, source, 1)
  let value = ""
  while (state.offset < source.length) {
    const char = source.charAt(state.offset)
    if (char === "\"") {
      step(state, source, 1)
      return Either.right(stringLiteral(value, start))
    }
    if (char === "\\") {
      const escaped = scanEscape(state, source)
      if (Either.isLeft(escaped)) {
        return Either.left(escaped.left)
      }
      value += escaped.right
      continue
    }
    if (source.charCodeAt(state.offset) < 0x20) {
      return Either.left(
        invalidString(snapshot(state), `unescaped control character ${describeCharacter(char)}`)
      )
    }
    const width = codePointWidth(source, state.offset)
    if (width === 0) {
      return Either.left(invalidEncoding(snapshot(state), "unpaired surrogate in string"))
    }
    value += source.slice(state.offset, state.offset + width)
    step(state, source, width)
  }
  return Either.left(invalidString(start, "unterminated string"))
}

const scanNumber = (state: ScanState, source: string): Either.Either<Token, LexError> => {
  const start = snapshot(state)
  let end = state.offset
  while (isNumberChar(source.charAt(end))) {
    end += 1
  }
  const text = source.slice(state.offset, end)
  if (!NUMBER_PATTERN.test(text)) {
    return Either.left(invalidNumber(start, text))
  }
  for (let index = 0; index < text.length; index++) {
    step(state, source, 1)
  }
  return Either.right(numberLiteral(text, start))
}

const scanKeyword = (
  state: ScanState,
  source: string,
  word: string,
  tag: KeywordTag
): Either.Either<Token, LexError> => {
  let end = state.offset
  while (WORD_CHAR_PATTERN.test(source.charAt(end))) {
    end += 1
  }
  const candidate = source.slice(state.offset, end)
  if (candidate === word) {
    const start = snapshot(state)
    for (let index = 0; index < word.length; index++) {
      step(state, source, 1)
    }
    return Either.right(simpleToken(tag, start))
  }
  let mismatch = 0
  while (mismatch < word.length && candidate.charAt(mismatch) === word.charAt(mismatch)) {
    mismatch += 1
  }
  return Either.left(
    unexpectedCharacter(ahead(state, mismatch), describeCharacter(source.charAt(state.offset + mismatch)))
  )
}

const scanToken = (state: ScanState, source: string): Either.Either<Token, LexError> => {
  skipWhitespace(state, source)
  const start = snapshot(state)
  if (state.offset >= source.length) {
    return Either.right(simpleToken("EndOfInput", start))
  }
  const char = source.charAt(state.offset)
  const punctuation = punctuationByChar[char]
  if (punctuation !== undefined) {
    step(state, source, 1)
    return Either.right(simpleToken(punctuation, start))
  }
  if (char === "\"") {
    return scanString(state, source)
  }
  if (char === "-" || isDigit(char)) {
    return scanNumber(state, source)
  }
  const keyword = keywordTags.find((entry) => entry.word.charAt(0) === char)
  if (keyword !== undefined) {
    return scanKeyword(state, source, keyword.word, keyword.tag)
  }
  const width = codePointWidth(source, state.offset)
  if (width === 0) {
    return Either.left(invalidEncoding(start, "unpaired surrogate"))
  }
  return Either.left(unexpectedCharacter(start, describeCharacter(source.slice(state.offset, state.offset + width))))
}

/**
 * Create a pull-based tokenizer over an immutable source.
 *
 * @param source - Decoded JSON text.
 * @returns Tokenizer cursor positioned at offset 0.
 *
 * @pure false (owns a private scan position)
 * @invariant next() never rewinds; reset() restores the initial state
 * @complexity O(1) per call, amortized O(n) per full scan
 */
export const makeTokenizer = (source: string): Tokenizer => {
  const state: ScanState = { offset: 0, line: 1, column: 1 }
  return {
    next: () => scanToken(state, source),
    reset: () => {
      state.offset = 0
      state.line = 1
      state.column = 1
    },
    position: () => snapshot(state)
  }
}

export interface TokenDump {
  readonly tokens: ReadonlyArray<Token>
  readonly error: LexError | undefined
}

/**
 * Collect every token of a source, stopping at the first lexical error.
 *
 * @pure true
 * @invariant the last token is EndOfInput when error is undefined
 * @complexity O(n)
 */
export const tokenize = (source: string): TokenDump => {
  const tokenizer = makeTokenizer(source)
  const tokens: Array<Token> = []
  for (;;) {
    const next = tokenizer.next()
    if (Either.isLeft(next)) {
      return { tokens, error: next.left }
    }
    tokens.push(next.right)
    if (next.right._tag === "EndOfInput") {
      return { tokens, error: undefined }
    }
  }
}
