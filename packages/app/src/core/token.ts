import { Match } from "effect"

// CHANGE: define the lexical token algebra for JSON text
// WHY: give the validator a closed set of tags to match exhaustively
// REF: req-token-1
// SOURCE: RFC 8259 §2 (structural characters), §3 (literal names)
// FORMAT THEOREM: ∀t ∈ Token: t.position.offset < |source| ∨ t._tag = "EndOfInput"
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: tokens are immutable and carry the position of their first character
// COMPLEXITY: O(1)/O(1)

export interface Position {
  /** 0-based UTF-16 code unit index. */
  readonly offset: number
  /** 1-based. */
  readonly line: number
  /** 1-based; a surrogate pair occupies one column. */
  readonly column: number
}

export const startPosition: Position = { offset: 0, line: 1, column: 1 }

export type PunctuationTag =
  | "ObjectOpen"
  | "ObjectClose"
  | "ArrayOpen"
  | "ArrayClose"
  | "Colon"
  | "Comma"

export type KeywordTag = "True" | "False" | "Null"

export type SimpleTag = PunctuationTag | KeywordTag | "EndOfInput"

type TaggedToken<Tag extends SimpleTag> = {
  readonly _tag: Tag
  readonly position: Position
}

export type SimpleToken = { readonly [Tag in SimpleTag]: TaggedToken<Tag> }[SimpleTag]

export type StringLiteral = {
  readonly _tag: "StringLiteral"
  readonly value: string
  readonly position: Position
}

export type NumberLiteral = {
  readonly _tag: "NumberLiteral"
  readonly text: string
  readonly value: number
  readonly position: Position
}

export type Token = SimpleToken | StringLiteral | NumberLiteral

export type TokenTag = Token["_tag"]

export const simpleToken = (tag: SimpleTag, position: Position): Token => ({
  _tag: tag,
  position
})

export const stringLiteral = (value: string, position: Position): Token => ({
  _tag: "StringLiteral",
  value,
  position
})

export const numberLiteral = (text: string, position: Position): Token => ({
  _tag: "NumberLiteral",
  text,
  value: Number(text),
  position
})

export const punctuationByChar: Readonly<Record<string, PunctuationTag>> = {
  "{": "ObjectOpen",
  "}": "ObjectClose",
  "[": "ArrayOpen",
  "]": "ArrayClose",
  ":": "Colon",
  ",": "Comma"
}

export const keywordTags: ReadonlyArray<{ readonly word: string; readonly tag: KeywordTag }> = [
  { word: "true", tag: "True" },
  { word: "false", tag: "False" },
  { word: "null", tag: "Null" }
]

/**
 * Render a token the way diagnostics quote it.
 *
 * @pure true
 * @invariant output is a single line
 * @complexity O(n) where n = token text length
 */
export const describeToken = (token: Token): string =>
  Match.value(token).pipe(
    Match.when({ _tag: "ObjectOpen" }, () => "'{'"),
    Match.when({ _tag: "ObjectClose" }, () => "'}'"),
    Match.when({ _tag: "ArrayOpen" }, () => "'['"),
    Match.when({ _tag: "ArrayClose" }, () => "']'"),
    Match.when({ _tag: "Colon" }, () => "':'"),
    Match.when({ _tag: "Comma" }, () => "','"),
    Match.when({ _tag: "True" }, () => "true"),
    Match.when({ _tag: "False" }, () => "false"),
    Match.when({ _tag: "Null" }, () => "null"),
    Match.when({ _tag: "EndOfInput" }, () => "end of input"),
    Match.when({ _tag: "StringLiteral" }, (value) => `string ${JSON.stringify(value.value)}`),
    Match.when({ _tag: "NumberLiteral" }, (value) => `number ${value.text}`),
    Match.exhaustive
  )

export const isValueStart = (token: Token): boolean =>
  token._tag === "ObjectOpen" ||
  token._tag === "ArrayOpen" ||
  token._tag === "StringLiteral" ||
  token._tag === "NumberLiteral" ||
  token._tag === "True" ||
  token._tag === "False" ||
  token._tag === "Null"
