import type * as Either from "effect/Either"

import type { Token } from "./token.js"
import type { Tokenizer } from "./tokenizer.js"
import type { LexError } from "./validation-error.js"

// CHANGE: wrap the tokenizer in a single-token lookahead cursor
// WHY: the grammar needs to look at one token before consuming it
// REF: req-token-cursor-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c: c.peek() = c.advance() when called back to back
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: at most one token is buffered
// COMPLEXITY: O(1)/O(1)

export interface TokenCursor {
  readonly peek: () => Either.Either<Token, LexError>
  readonly advance: () => Either.Either<Token, LexError>
}

export const makeTokenCursor = (tokenizer: Tokenizer): TokenCursor => {
  let lookahead: Either.Either<Token, LexError> | undefined
  const peek = (): Either.Either<Token, LexError> => {
    if (lookahead === undefined) {
      lookahead = tokenizer.next()
    }
    return lookahead
  }
  const advance = (): Either.Either<Token, LexError> => {
    const current = peek()
    lookahead = undefined
    return current
  }
  return { peek, advance }
}
