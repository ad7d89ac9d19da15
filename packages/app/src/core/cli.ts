import { Match } from "effect"
import * as Either from "effect/Either"

import { MAX_TREE_DEPTH } from "./heap.js"
import type { Conformance } from "./scanner.js"

// CHANGE: implement deterministic CLI parsing for jsontree
// WHY: keep CLI decoding pure and testable at the boundary
// QUOTE(TZ): "jsontree check|format|minify <file...>"
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands ∧ |args.files| ≥ 1
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags are rejected; inputs are file paths, never stdin
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "check" | "format" | "minify"

export interface CliArgs {
  readonly command: CliCommand
  readonly files: ReadonlyArray<string>
  readonly configPath: string | undefined
  readonly configPathExplicit: boolean
  readonly conformance: Conformance | undefined
  readonly maxDepth: number | undefined
  readonly maxInputBytes: number | undefined
  readonly memoryLimitBytes: number | undefined
  readonly indent: number | undefined
  readonly write: boolean
  readonly json: boolean
  readonly silent: boolean
  readonly verbose: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

export const MAX_DEPTH_LIMIT = MAX_TREE_DEPTH
export const MAX_INDENT = 16

const isFlag = (value: string): boolean => value.startsWith("-") && value !== "-"

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("check", () => Either.right<CliCommand>("check")),
    Match.when("format", () => Either.right<CliCommand>("format")),
    Match.when("minify", () => Either.right<CliCommand>("minify")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

const defaultArgs = (command: CliCommand): CliArgs => ({
  command,
  files: [],
  configPath: undefined,
  configPathExplicit: false,
  conformance: undefined,
  maxDepth: undefined,
  maxInputBytes: undefined,
  memoryLimitBytes: undefined,
  indent: undefined,
  write: false,
  json: false,
  silent: false,
  verbose: false
})

const parseInteger = (
  flagName: string,
  value: string,
  min: number,
  max: number
): Either.Either<number, CliError> => {
  const parsed = /^\d+$/u.test(value) ? Number(value) : Number.NaN
  if (!Number.isSafeInteger(parsed) || parsed < min || parsed > max) {
    return Either.left(cliError(`Invalid value for --${flagName}: ${value} (expected integer ${min}..${max})`))
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

interface FlagStep {
  readonly next: CliArgs
  readonly consumed: number
}

const setParsedFlag = (next: CliArgs, consumed: number): Either.Either<FlagStep, CliError> =>
  Either.right({ next, consumed })

const parseValueFlag = (
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: string) => Either.Either<CliArgs, CliError>
): Either.Either<FlagStep, CliError> =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (value) =>
    Either.map(update(current, value), (next) => ({
      next,
      consumed: inlineValue === undefined ? 2 : 1
    })))

const parseIntegerFlag = (
  flagName: string,
  min: number,
  max: number,
  update: (args: CliArgs, value: number) => CliArgs
): FlagParser =>
(current, inlineValue, nextValue) =>
  parseValueFlag(flagName, current, inlineValue, nextValue, (args, value) =>
    Either.map(parseInteger(flagName, value, min, max), (parsed) => update(args, parsed)))

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<FlagStep, CliError>

const flagParsers: Record<string, FlagParser> = {
  json: (current) => setParsedFlag({ ...current, json: true }, 1),
  silent: (current) => setParsedFlag({ ...current, silent: true }, 1),
  verbose: (current) => setParsedFlag({ ...current, verbose: true }, 1),
  write: (current) => setParsedFlag({ ...current, write: true }, 1),
  strict: (current) => setParsedFlag({ ...current, conformance: "strict" }, 1),
  lenient: (current) => setParsedFlag({ ...current, conformance: "lenient" }, 1),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (args, value) =>
      Either.right({
        ...args,
        configPath: value,
        configPathExplicit: true
      })),
  "max-depth": parseIntegerFlag("max-depth", 1, MAX_DEPTH_LIMIT, (args, value) => ({ ...args, maxDepth: value })),
  "max-bytes": parseIntegerFlag(
    "max-bytes",
    1,
    Number.MAX_SAFE_INTEGER,
    (args, value) => ({ ...args, maxInputBytes: value })
  ),
  "memory-limit": parseIntegerFlag(
    "memory-limit",
    0,
    Number.MAX_SAFE_INTEGER,
    (args, value) => ({ ...args, memoryLimitBytes: value })
  ),
  indent: parseIntegerFlag("indent", 0, MAX_INDENT, (args, value) => ({ ...args, indent: value }))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): Either.Either<FlagStep, CliError> => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const body = raw.slice(2)
  const separator = body.indexOf("=")
  const name = separator === -1 ? body : body.slice(0, separator)
  const inlineValue = separator === -1 ? undefined : body.slice(separator + 1)
  const parser = Object.hasOwn(flagParsers, name) ? flagParsers[name] : undefined
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

const parseRest = (
  rawArgs: ReadonlyArray<string>,
  initial: CliArgs
): Either.Either<CliArgs, CliError> => {
  let args = initial
  const files: Array<string> = []
  let index = 1
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (current === "-") {
      return Either.left(cliError("Reading from stdin is not supported; pass a file path"))
    }
    if (!isFlag(current)) {
      files.push(current)
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
  if (files.length === 0) {
    return Either.left(cliError(`No input files given to ${args.command}`))
  }
  if (args.write && args.command === "check") {
    return Either.left(cliError("--write only applies to format and minify"))
  }
  return Either.right({ ...args, files })
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant the first argument after the script is the command
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  const first = rawArgs[0]
  if (first === undefined || isFlag(first)) {
    return Either.left(cliError("Missing command (expected check, format or minify)"))
  }
  return Either.flatMap(parseCommand(first), (command) => parseRest(rawArgs, defaultArgs(command)))
}
