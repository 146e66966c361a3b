export type { Position, Token, TokenTag } from "./core/token.js"
export { describeToken, startPosition } from "./core/token.js"
export type { TokenCursor } from "./core/token-cursor.js"
export { makeTokenCursor } from "./core/token-cursor.js"
export type { TokenDump, Tokenizer } from "./core/tokenizer.js"
export { makeTokenizer, tokenize } from "./core/tokenizer.js"
export type { GrammarError, LexError, ValidationError, ValidationErrorKind } from "./core/validation-error.js"
export { describeValidationError, formatValidationError } from "./core/validation-error.js"
export type { ValidatorOptions } from "./core/validator.js"
export { DEFAULT_MAX_DEPTH, defaultValidatorOptions, MAX_DEPTH_CEILING, validateTokens } from "./core/validator.js"
export type { Verdict } from "./core/verdict.js"
export { decodeSource, isValid, validateBytes, validateText } from "./core/verdict.js"
