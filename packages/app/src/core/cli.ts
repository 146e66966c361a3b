import * as Either from "effect/Either"

import { MAX_DEPTH_CEILING } from "./validator.js"

// CHANGE: implement deterministic CLI parsing for json-validator
// WHY: keep CLI decoding pure and testable at the boundary
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.help ∨ |args.files| ≥ 1
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags are rejected
// COMPLEXITY: O(n) where n = argv length

export interface CliArgs {
  readonly files: ReadonlyArray<string>
  readonly configPath: string | undefined
  readonly configExplicit: boolean
  readonly maxDepth: number | undefined
  readonly concurrency: number | undefined
  readonly json: boolean
  readonly silent: boolean
  readonly tokens: boolean
  readonly verbose: boolean
  readonly help: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

export const usage = [
  "Usage: json-validator [options] <file...>",
  "",
  "Options:",
  "  --max-depth <n>     maximum nesting of objects and arrays (1-" + String(MAX_DEPTH_CEILING) + ")",
  "  --concurrency <n>   number of files validated at once",
  "  --config <path>     config file (default ./.json-validator.json)",
  "  --json              print the report as JSON",
  "  --silent            print nothing; rely on the exit code",
  "  --tokens            list the tokens of each file",
  "  --verbose           debug logging on stderr",
  "  --help              show this message",
  "",
  "Exit codes: 0 all files valid, 2 some file invalid, 1 runtime error"
].join("\n")

const isFlag = (value: string): boolean => value.startsWith("-") && value !== "-"

const defaultArgs: CliArgs = {
  files: [],
  configPath: undefined,
  configExplicit: false,
  maxDepth: undefined,
  concurrency: undefined,
  json: false,
  silent: false,
  tokens: false,
  verbose: false,
  help: false
}

const parseIntegerInRange = (
  flagName: string,
  value: string,
  min: number,
  max: number
): Either.Either<number, CliError> => {
  if (!/^[0-9]+$/.test(value)) {
    return Either.left(cliError(`Invalid integer for --${flagName}: ${value}`))
  }
  const parsed = Number(value)
  if (parsed < min || parsed > max) {
    return Either.left(cliError(`--${flagName} must be between ${min} and ${max}, got ${value}`))
  }
  return Either.right(parsed)
}

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

type ParsedFlag = { readonly next: CliArgs; readonly consumed: number }

const setParsedFlag = (next: CliArgs, consumed: number): Either.Either<ParsedFlag, CliError> =>
  Either.right({ next, consumed })

const parseValueFlag = (
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: string) => Either.Either<CliArgs, CliError>
): Either.Either<ParsedFlag, CliError> =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (value) =>
    Either.map(update(current, value), (next) => ({
      next,
      consumed: inlineValue === undefined ? 2 : 1
    })))

const booleanFlag = (
  flagName: string,
  inlineValue: string | undefined,
  next: CliArgs
): Either.Either<ParsedFlag, CliError> =>
  inlineValue === undefined
    ? setParsedFlag(next, 1)
    : Either.left(cliError(`--${flagName} does not take a value`))

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<ParsedFlag, CliError>

const flagParsers: Record<string, FlagParser> = {
  json: (current, inlineValue) => booleanFlag("json", inlineValue, { ...current, json: true }),
  silent: (current, inlineValue) => booleanFlag("silent", inlineValue, { ...current, silent: true }),
  tokens: (current, inlineValue) => booleanFlag("tokens", inlineValue, { ...current, tokens: true }),
  verbose: (current, inlineValue) => booleanFlag("verbose", inlineValue, { ...current, verbose: true }),
  help: (current, inlineValue) => booleanFlag("help", inlineValue, { ...current, help: true }),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (args, value) =>
      Either.right({
        ...args,
        configPath: value,
        configExplicit: true
      })),
  "max-depth": (current, inlineValue, nextValue) =>
    parseValueFlag("max-depth", current, inlineValue, nextValue, (args, value) =>
      Either.map(
        parseIntegerInRange("max-depth", value, 1, MAX_DEPTH_CEILING),
        (maxDepth) => ({ ...args, maxDepth })
      )),
  concurrency: (current, inlineValue, nextValue) =>
    parseValueFlag("concurrency", current, inlineValue, nextValue, (args, value) =>
      Either.map(
        parseIntegerInRange("concurrency", value, 1, Number.MAX_SAFE_INTEGER),
        (concurrency) => ({ ...args, concurrency })
      ))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): Either.Either<ParsedFlag, CliError> => {
  if (raw === "-h") {
    return setParsedFlag({ ...current, help: true }, 1)
  }
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const separator = raw.indexOf("=")
  const name = separator === -1 ? raw.slice(2) : raw.slice(2, separator)
  const inlineValue = separator === -1 ? undefined : raw.slice(separator + 1)
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant every positional argument (and everything after "--") is a file path
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  let args = defaultArgs
  let files: Array<string> = []
  let index = 0
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (current === "--") {
      files = [...files, ...rawArgs.slice(index + 1)]
      break
    }
    if (!isFlag(current)) {
      files = [...files, current]
      index += 1
      continue
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  if (files.length === 0 && !args.help) {
    return Either.left(cliError("No input files given"))
  }
  return Either.right({ ...args, files })
}
