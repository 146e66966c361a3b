import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import type { ValidationError } from "../../src/core/validation-error.js"
import { DEFAULT_MAX_DEPTH, MAX_DEPTH_CEILING } from "../../src/core/validator.js"
import type { Verdict } from "../../src/core/verdict.js"
import { validateBytes, validateText } from "../../src/core/verdict.js"

const errorOf = (verdict: Verdict): ValidationError => {
  if (verdict._tag === "Valid") {
    throw new Error("expected an invalid verdict")
  }
  return verdict.error
}

const kindOf = (text: string): string => {
  const verdict = validateText(text)
  return verdict._tag === "Valid" ? "Valid" : verdict.error._tag
}

const nestedArrays = (depth: number): string => "[".repeat(depth) + "]".repeat(depth)

const nestedObjects = (depth: number): string => `{"a":`.repeat(depth) + "1" + "}".repeat(depth)

const encode = (text: string): Uint8Array => new TextEncoder().encode(text)

describe("validateText: accepted documents", () => {
  it.effect("accepts empty containers and mixed members", () =>
    Effect.sync(() => {
      expect(validateText("{}")).toEqual({ _tag: "Valid" })
      expect(validateText("[]")).toEqual({ _tag: "Valid" })
      expect(validateText(`{"a": 1, "b": [true, false, null]}`)).toEqual({ _tag: "Valid" })
    }))

  it.effect("accepts scalar roots and surrounding whitespace", () =>
    Effect.sync(() => {
      for (const text of [`"x"`, "42", "-0.5e-2", "true", "false", "null", " \n\t{ }\r\n", `{"": ""}`]) {
        expect(kindOf(text)).toBe("Valid")
      }
    }))

  it.effect("is deterministic across runs", () =>
    Effect.sync(() => {
      for (const text of [`{"k": [1, {"z": null}]}`, `{"a": 01}`, "[1,]"]) {
        expect(validateText(text)).toEqual(validateText(text))
      }
    }))
})

describe("validateText: rejected documents", () => {
  it.effect("rejects a leading zero as InvalidNumber", () =>
    Effect.sync(() => {
      expect(errorOf(validateText(`{"a": 01}`))).toEqual({
        _tag: "InvalidNumber",
        position: { offset: 6, line: 1, column: 7 },
        text: "01"
      })
    }))

  it.effect("rejects trailing commas at the closer", () =>
    Effect.sync(() => {
      expect(errorOf(validateText(`{"a": 1,}`))).toEqual({
        _tag: "UnexpectedToken",
        position: { offset: 8, line: 1, column: 9 },
        found: "'}'"
      })
      expect(errorOf(validateText("[1,]"))).toEqual({
        _tag: "UnexpectedToken",
        position: { offset: 3, line: 1, column: 4 },
        found: "']'"
      })
    }))

  it.effect("rejects unterminated strings and short unicode escapes", () =>
    Effect.sync(() => {
      expect(kindOf(`{"a": "unterminated`)).toBe("InvalidString")
      expect(kindOf("\"\\u12\"")).toBe("InvalidString")
    }))

  it.effect("rejects input without a value as UnexpectedEof", () =>
    Effect.sync(() => {
      expect(errorOf(validateText(""))).toEqual({
        _tag: "UnexpectedEof",
        position: { offset: 0, line: 1, column: 1 },
        expected: "value"
      })
      expect(kindOf("  \n ")).toBe("UnexpectedEof")
    }))

  it.effect("rejects unfinished containers as UnexpectedEof", () =>
    Effect.sync(() => {
      expect(errorOf(validateText("{"))).toMatchObject({ _tag: "UnexpectedEof", expected: "string key" })
      expect(errorOf(validateText(`{"a"`))).toMatchObject({ _tag: "UnexpectedEof", expected: "':'" })
      expect(errorOf(validateText(`{"a":`))).toMatchObject({ _tag: "UnexpectedEof", expected: "value" })
      expect(errorOf(validateText(`{"a":1`))).toMatchObject({ _tag: "UnexpectedEof", expected: "',' or '}'" })
      expect(errorOf(validateText("["))).toMatchObject({ _tag: "UnexpectedEof", expected: "value" })
      expect(errorOf(validateText("[1"))).toMatchObject({ _tag: "UnexpectedEof", expected: "',' or ']'" })
    }))

  it.effect("requires string keys", () =>
    Effect.sync(() => {
      expect(errorOf(validateText(`{1: 2}`))).toEqual({
        _tag: "ExpectedString",
        position: { offset: 1, line: 1, column: 2 },
        found: "number 1"
      })
      expect(kindOf("{,}")).toBe("ExpectedString")
      expect(kindOf(`{"a": 1, true: 2}`)).toBe("ExpectedString")
    }))

  it.effect("reports missing colons, values and separators as ExpectedToken", () =>
    Effect.sync(() => {
      expect(errorOf(validateText(`{"a" 1}`))).toEqual({
        _tag: "ExpectedToken",
        position: { offset: 5, line: 1, column: 6 },
        expected: "':'",
        found: "number 1"
      })
      expect(errorOf(validateText(`{"a": }`))).toEqual({
        _tag: "ExpectedToken",
        position: { offset: 6, line: 1, column: 7 },
        expected: "value",
        found: "'}'"
      })
      expect(errorOf(validateText(`{"a": 1 "b": 2}`))).toEqual({
        _tag: "ExpectedToken",
        position: { offset: 8, line: 1, column: 9 },
        expected: "',' or '}'",
        found: "string \"b\""
      })
      expect(errorOf(validateText("[1 2]"))).toMatchObject({
        _tag: "ExpectedToken",
        expected: "',' or ']'",
        found: "number 2"
      })
    }))

  it.effect("rejects misplaced punctuation as UnexpectedToken", () =>
    Effect.sync(() => {
      expect(errorOf(validateText("[1,,2]"))).toEqual({
        _tag: "UnexpectedToken",
        position: { offset: 3, line: 1, column: 4 },
        found: "','"
      })
      expect(kindOf("]")).toBe("UnexpectedToken")
      expect(kindOf(":")).toBe("UnexpectedToken")
      expect(kindOf("[:]")).toBe("UnexpectedToken")
    }))

  it.effect("surfaces lexical errors inside containers unchanged", () =>
    Effect.sync(() => {
      expect(errorOf(validateText("[truex]"))).toEqual({
        _tag: "UnexpectedCharacter",
        position: { offset: 5, line: 1, column: 6 },
        found: "'x'"
      })
      expect(kindOf("[1, 'a']")).toBe("UnexpectedCharacter")
      expect(kindOf(`{"a": 1.}`)).toBe("InvalidNumber")
    }))
})

describe("validateText: trailing data", () => {
  it.effect("rejects anything after the root value", () =>
    Effect.sync(() => {
      expect(errorOf(validateText("{} x"))).toEqual({
        _tag: "TrailingData",
        position: { offset: 3, line: 1, column: 4 },
        found: "content"
      })
      expect(errorOf(validateText("{}{}"))).toEqual({
        _tag: "TrailingData",
        position: { offset: 2, line: 1, column: 3 },
        found: "'{'"
      })
    }))

  it.effect("holds for every accepted document", () =>
    Effect.sync(() => {
      const accepted = ["{}", "[]", `{"a": [1, 2]}`, `"s"`, "1", "null", "[[], {}]"]
      for (const text of accepted) {
        expect(kindOf(text)).toBe("Valid")
        expect(kindOf(`${text} x`)).toBe("TrailingData")
        expect(kindOf(`${text}\n0`)).toBe("TrailingData")
      }
    }))
})

describe("validateText: depth limit", () => {
  it.effect("accepts nesting up to the limit and rejects one more level", () =>
    Effect.sync(() => {
      const options = { maxDepth: 8 }
      expect(validateText(nestedArrays(8), options)).toEqual({ _tag: "Valid" })
      expect(errorOf(validateText(nestedArrays(9), options))).toEqual({
        _tag: "TooDeep",
        position: { offset: 8, line: 1, column: 9 },
        limit: 8
      })
    }))

  it.effect("counts objects and arrays together", () =>
    Effect.sync(() => {
      const options = { maxDepth: 2 }
      expect(kindOf(`{"a": []}`)).toBe("Valid")
      expect(validateText(`{"a": [{}]}`, options)).toEqual({
        _tag: "Invalid",
        error: { _tag: "TooDeep", position: { offset: 7, line: 1, column: 8 }, limit: 2 }
      })
      expect(errorOf(validateText(`{"a":{"a":{}}}`, options)).position.offset).toBe(10)
    }))

  it.effect("accepts objects nested to the highest allowed limit", () =>
    Effect.sync(() => {
      const options = { maxDepth: MAX_DEPTH_CEILING }
      expect(validateText(nestedObjects(MAX_DEPTH_CEILING), options)).toEqual({ _tag: "Valid" })
      expect(validateText(nestedArrays(MAX_DEPTH_CEILING), options)).toEqual({ _tag: "Valid" })
      expect(errorOf(validateText(nestedObjects(MAX_DEPTH_CEILING + 1), options))).toEqual({
        _tag: "TooDeep",
        position: { offset: 5 * MAX_DEPTH_CEILING, line: 1, column: 5 * MAX_DEPTH_CEILING + 1 },
        limit: MAX_DEPTH_CEILING
      })
    }))

  it.effect("stops early on pathological nesting with the default limit", () =>
    Effect.sync(() => {
      expect(validateText(nestedArrays(DEFAULT_MAX_DEPTH))).toEqual({ _tag: "Valid" })
      expect(errorOf(validateText("[".repeat(1_000_000)))).toEqual({
        _tag: "TooDeep",
        position: { offset: DEFAULT_MAX_DEPTH, line: 1, column: DEFAULT_MAX_DEPTH + 1 },
        limit: DEFAULT_MAX_DEPTH
      })
    }))
})

describe("validateBytes", () => {
  it.effect("decodes UTF-8 before validating", () =>
    Effect.sync(() => {
      expect(validateBytes(encode(`{"é": "ü"}`))).toEqual({ _tag: "Valid" })
    }))

  it.effect("rejects invalid UTF-8 as InvalidEncoding", () =>
    Effect.sync(() => {
      expect(errorOf(validateBytes(new Uint8Array([0x7b, 0xff, 0x7d])))).toEqual({
        _tag: "InvalidEncoding",
        position: { offset: 0, line: 1, column: 1 },
        reason: "input is not valid UTF-8"
      })
    }))

  it.effect("does not strip a byte order mark", () =>
    Effect.sync(() => {
      expect(errorOf(validateBytes(new Uint8Array([0xef, 0xbb, 0xbf, 0x7b, 0x7d])))).toEqual({
        _tag: "UnexpectedCharacter",
        position: { offset: 0, line: 1, column: 1 },
        found: "U+FEFF"
      })
    }))

  it.effect("treats zero bytes as an empty document", () =>
    Effect.sync(() => {
      expect(errorOf(validateBytes(new Uint8Array(0)))._tag).toBe("UnexpectedEof")
    }))
})
