import * as Either from "effect/Either"

import type { Token } from "./token.js"
import { describeToken, isValueStart } from "./token.js"
import type { TokenCursor } from "./token-cursor.js"
import type { ValidationError } from "./validation-error.js"
import {
  expectedString,
  expectedToken,
  tooDeep,
  trailingData,
  unexpectedEof,
  unexpectedToken
} from "./validation-error.js"

// CHANGE: validate the token stream with a depth-bounded recursive descent
// WHY: one procedure per grammar rule; an explicit counter bounds the call stack
// REF: req-validator-1
// SOURCE: RFC 8259 §2–§5
// FORMAT THEOREM: validate(c) = Right ⇔ tokens(c) ∈ L(value) · EndOfInput ∧ depth ≤ maxDepth
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the first failure is returned unchanged; no recovery
// COMPLEXITY: O(n) time, O(depth) stack

export interface ValidatorOptions {
  readonly maxDepth: number
}

export const DEFAULT_MAX_DEPTH = 512

/** Upper bound for maxDepth. Each nesting level costs two frames (parseValue, container). */
export const MAX_DEPTH_CEILING = 1024

export const defaultValidatorOptions: ValidatorOptions = { maxDepth: DEFAULT_MAX_DEPTH }

type Step = Either.Either<void, ValidationError>

const ok: Step = Either.right(undefined)

const fail = (error: ValidationError): Step => Either.left(error)

const enterContainer = (open: Token, depth: number, options: ValidatorOptions): Step =>
  depth > options.maxDepth ? fail(tooDeep(open.position, options.maxDepth)) : ok

const parseValue = (
  cursor: TokenCursor,
  token: Token,
  depth: number,
  options: ValidatorOptions
): Step => {
  switch (token._tag) {
    case "ObjectOpen":
      return parseObject(cursor, token, depth + 1, options)
    case "ArrayOpen":
      return parseArray(cursor, token, depth + 1, options)
    case "StringLiteral":
    case "NumberLiteral":
    case "True":
    case "False":
    case "Null":
      return ok
    case "EndOfInput":
      return fail(unexpectedEof(token.position, "value"))
    default:
      return fail(unexpectedToken(token.position, describeToken(token)))
  }
}

// Reads `string ':'` and returns the token that starts the member's value.
const parseMember = (cursor: TokenCursor, key: Token): Either.Either<Token, ValidationError> => {
  if (key._tag === "EndOfInput") {
    return Either.left(unexpectedEof(key.position, "string key"))
  }
  if (key._tag !== "StringLiteral") {
    return Either.left(expectedString(key.position, describeToken(key)))
  }
  const colon = cursor.advance()
  if (Either.isLeft(colon)) {
    return Either.left(colon.left)
  }
  if (colon.right._tag === "EndOfInput") {
    return Either.left(unexpectedEof(colon.right.position, "':'"))
  }
  if (colon.right._tag !== "Colon") {
    return Either.left(expectedToken(colon.right.position, "':'", describeToken(colon.right)))
  }
  const value = cursor.advance()
  if (Either.isLeft(value)) {
    return Either.left(value.left)
  }
  if (value.right._tag === "EndOfInput") {
    return Either.left(unexpectedEof(value.right.position, "value"))
  }
  if (!isValueStart(value.right)) {
    return Either.left(expectedToken(value.right.position, "value", describeToken(value.right)))
  }
  return Either.right(value.right)
}

// Consumes the token after a member or element: the closer, or a comma that must
// not be followed by the closer. Right(true) means the container is finished.
const parseSeparator = (
  cursor: TokenCursor,
  closer: "ObjectClose" | "ArrayClose",
  expected: string
): Either.Either<boolean, ValidationError> => {
  const separator = cursor.advance()
  if (Either.isLeft(separator)) {
    return Either.left(separator.left)
  }
  const token = separator.right
  if (token._tag === closer) {
    return Either.right(true)
  }
  if (token._tag === "EndOfInput") {
    return Either.left(unexpectedEof(token.position, expected))
  }
  if (token._tag !== "Comma") {
    return Either.left(expectedToken(token.position, expected, describeToken(token)))
  }
  const following = cursor.peek()
  if (Either.isLeft(following)) {
    return Either.left(following.left)
  }
  if (following.right._tag === closer) {
    return Either.left(unexpectedToken(following.right.position, describeToken(following.right)))
  }
  return Either.right(false)
}

const parseObject = (
  cursor: TokenCursor,
  open: Token,
  depth: number,
  options: ValidatorOptions
): Step => {
  const entered = enterContainer(open, depth, options)
  if (Either.isLeft(entered)) {
    return entered
  }
  const first = cursor.peek()
  if (Either.isLeft(first)) {
    return Either.left(first.left)
  }
  if (first.right._tag === "ObjectClose") {
    cursor.advance()
    return ok
  }
  for (;;) {
    const key = cursor.advance()
    if (Either.isLeft(key)) {
      return Either.left(key.left)
    }
    const member = parseMember(cursor, key.right)
    if (Either.isLeft(member)) {
      return Either.left(member.left)
    }
    const value = parseValue(cursor, member.right, depth, options)
    if (Either.isLeft(value)) {
      return value
    }
    const done = parseSeparator(cursor, "ObjectClose", "',' or '}'")
    if (Either.isLeft(done)) {
      return Either.left(done.left)
    }
    if (done.right) {
      return ok
    }
  }
}

const parseArray = (
  cursor: TokenCursor,
  open: Token,
  depth: number,
  options: ValidatorOptions
): Step => {
  const entered = enterContainer(open, depth, options)
  if (Either.isLeft(entered)) {
    return entered
  }
  const first = cursor.peek()
  if (Either.isLeft(first)) {
    return Either.left(first.left)
  }
  if (first.right._tag === "ArrayClose") {
    cursor.advance()
    return ok
  }
  for (;;) {
    const element = cursor.advance()
    if (Either.isLeft(element)) {
      return Either.left(element.left)
    }
    const value = parseValue(cursor, element.right, depth, options)
    if (Either.isLeft(value)) {
      return value
    }
    const done = parseSeparator(cursor, "ArrayClose", "',' or ']'")
    if (Either.isLeft(done)) {
      return Either.left(done.left)
    }
    if (done.right) {
      return ok
    }
  }
}

/**
 * Validate that a token stream holds exactly one JSON value followed by EndOfInput.
 *
 * @param cursor - Token cursor positioned at the first token.
 * @param options - Depth limit.
 * @returns Right(void) when valid, Left with the first error otherwise.
 *
 * @pure false (consumes the cursor)
 * @invariant any token or lexical failure after the root value is TrailingData
 * @complexity O(n)
 */
export const validateTokens = (
  cursor: TokenCursor,
  options: ValidatorOptions = defaultValidatorOptions
): Either.Either<void, ValidationError> => {
  const first = cursor.advance()
  if (Either.isLeft(first)) {
    return Either.left(first.left)
  }
  if (first.right._tag === "EndOfInput") {
    return fail(unexpectedEof(first.right.position, "value"))
  }
  const root = parseValue(cursor, first.right, 0, options)
  if (Either.isLeft(root)) {
    return root
  }
  const rest = cursor.advance()
  if (Either.isLeft(rest)) {
    return fail(trailingData(rest.left.position, "content"))
  }
  if (rest.right._tag !== "EndOfInput") {
    return fail(trailingData(rest.right.position, describeToken(rest.right)))
  }
  return ok
}
