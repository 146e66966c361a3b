import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { parseCliArgs } from "../../src/core/cli.js"

const parse = (...args: ReadonlyArray<string>) => parseCliArgs(["node", "json-validator", ...args])

const leftMessage = (...args: ReadonlyArray<string>): string => {
  const parsed = parse(...args)
  return Either.isLeft(parsed) ? parsed.left.message : "parsed"
}

describe("parseCliArgs", () => {
  it.effect("collects positional files around flags", () =>
    Effect.sync(() => {
      const parsed = parse("a.json", "--max-depth", "10", "--json", "b.json")
      expect(parsed).toEqual(
        Either.right({
          files: ["a.json", "b.json"],
          configPath: undefined,
          configExplicit: false,
          maxDepth: 10,
          concurrency: undefined,
          json: true,
          silent: false,
          tokens: false,
          verbose: false,
          help: false
        })
      )
    }))

  it.effect("accepts inline values and an explicit config", () =>
    Effect.sync(() => {
      const parsed = parse("--max-depth=3", "--concurrency=2", "--config", "cfg.json", "x.json")
      expect(Either.isRight(parsed)).toBe(true)
      if (Either.isRight(parsed)) {
        expect(parsed.right.maxDepth).toBe(3)
        expect(parsed.right.concurrency).toBe(2)
        expect(parsed.right.configPath).toBe("cfg.json")
        expect(parsed.right.configExplicit).toBe(true)
      }
    }))

  it.effect("treats everything after -- as files", () =>
    Effect.sync(() => {
      const parsed = parse("--silent", "--", "--odd.json", "-")
      expect(Either.map(parsed, (args) => args.files)).toEqual(Either.right(["--odd.json", "-"]))
    }))

  it.effect("allows --help without files", () =>
    Effect.sync(() => {
      expect(Either.map(parse("--help"), (args) => args.help)).toEqual(Either.right(true))
      expect(Either.map(parse("-h"), (args) => args.help)).toEqual(Either.right(true))
    }))

  it.effect("rejects bad input", () =>
    Effect.sync(() => {
      expect(leftMessage()).toBe("No input files given")
      expect(leftMessage("--nope", "a.json")).toBe("Unknown flag: --nope")
      expect(leftMessage("-x", "a.json")).toBe("Unknown flag: -x")
      expect(leftMessage("a.json", "--config")).toBe("Missing value for --config")
      expect(leftMessage("--max-depth", "--json", "a.json")).toBe("Missing value for --max-depth")
      expect(leftMessage("--max-depth=abc", "a.json")).toBe("Invalid integer for --max-depth: abc")
      expect(leftMessage("--max-depth=0", "a.json")).toBe("--max-depth must be between 1 and 1024, got 0")
      expect(leftMessage("--max-depth=5000", "a.json")).toBe("--max-depth must be between 1 and 1024, got 5000")
      expect(leftMessage("--json=yes", "a.json")).toBe("--json does not take a value")
    }))
})
