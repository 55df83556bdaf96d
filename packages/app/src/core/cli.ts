import { Match } from "effect"
import * as Either from "effect/Either"

import { MAX_DEPTH_LIMIT } from "./parse.js"

// CHANGE: decode json-value command lines into typed arguments
// WHY: keep CLI decoding pure and testable at the boundary
// QUOTE(TZ): "json-value [format|compact|check] [--input <path>] [--output <path>]"
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "format" | "compact" | "check"

export interface CliArgs {
  readonly command: CliCommand
  readonly commandExplicit: boolean
  readonly input: string | undefined
  readonly output: string | undefined
  readonly indent: string | undefined
  readonly configPath: string
  readonly configPathExplicit: boolean
  readonly maxDepth: number | undefined
  readonly silent: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

export const cliError = (message: string): CliError => ({ _tag: "CliError", message })

export const DEFAULT_CONFIG_PATH = "./.json-value.json"

const isFlag = (value: string): boolean => value.startsWith("-") && value !== "-"

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("format", () => Either.right<CliCommand>("format")),
    Match.when("compact", () => Either.right<CliCommand>("compact")),
    Match.when("check", () => Either.right<CliCommand>("check")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

/**
 * Decode an --indent value: "tab", a space count, or literal text.
 *
 * @pure true
 * @invariant parseIndent("0") = Right("")
 * @complexity O(n)
 */
export const parseIndent = (value: string): Either.Either<string, CliError> => {
  if (value === "tab") {
    return Either.right("\t")
  }
  if (/^\d+$/u.test(value)) {
    const count = Number(value)
    return count > 16
      ? Either.left(cliError(`Indent width must be at most 16, got ${value}`))
      : Either.right(" ".repeat(count))
  }
  return /^[ \t]+$/u.test(value)
    ? Either.right(value)
    : Either.left(cliError(`Invalid indent: ${JSON.stringify(value)}`))
}

export const parsePositiveInteger = (flagName: string, value: string): Either.Either<number, CliError> =>
  /^[1-9]\d*$/u.test(value) && Number.isSafeInteger(Number(value))
    ? Either.right(Number(value))
    : Either.left(cliError(`--${flagName} expects a positive integer, got ${value}`))

export const parseMaxDepth = (value: string): Either.Either<number, CliError> =>
  Either.flatMap(parsePositiveInteger("max-depth", value), (depth) =>
    depth > MAX_DEPTH_LIMIT
      ? Either.left(cliError(`--max-depth must be at most ${MAX_DEPTH_LIMIT}, got ${value}`))
      : Either.right(depth))

const defaultArgs = (command: CliCommand, commandExplicit: boolean): CliArgs => ({
  command,
  commandExplicit,
  input: undefined,
  output: undefined,
  indent: undefined,
  configPath: DEFAULT_CONFIG_PATH,
  configPathExplicit: false,
  maxDepth: undefined,
  silent: false
})

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

type ParsedFlag = Either.Either<{ readonly next: CliArgs; readonly consumed: number }, CliError>

const parseValueFlag = (
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: string) => Either.Either<CliArgs, CliError>
): ParsedFlag =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (value) =>
    Either.map(update(current, value), (next) => ({
      next,
      consumed: inlineValue === undefined ? 2 : 1
    })))

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => ParsedFlag

const flagParsers: Record<string, FlagParser> = {
  silent: (current, inlineValue) =>
    inlineValue === undefined
      ? Either.right({ next: { ...current, silent: true }, consumed: 1 })
      : Either.left(cliError("--silent takes no value")),
  input: (current, inlineValue, nextValue) =>
    parseValueFlag("input", current, inlineValue, nextValue, (args, value) => Either.right({ ...args, input: value })),
  output: (current, inlineValue, nextValue) =>
    parseValueFlag("output", current, inlineValue, nextValue, (args, value) => Either.right({ ...args, output: value })),
  indent: (current, inlineValue, nextValue) =>
    parseValueFlag("indent", current, inlineValue, nextValue, (args, value) =>
      Either.map(parseIndent(value), (indent) => ({ ...args, indent }))),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (args, value) =>
      Either.right({
        ...args,
        configPath: value,
        configPathExplicit: true
      })),
  "max-depth": (current, inlineValue, nextValue) =>
    parseValueFlag("max-depth", current, inlineValue, nextValue, (args, value) =>
      Either.map(parseMaxDepth(value), (maxDepth) => ({ ...args, maxDepth })))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): ParsedFlag => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const body = raw.slice(2)
  const separator = body.indexOf("=")
  const name = separator === -1 ? body : body.slice(0, separator)
  const inlineValue = separator === -1 ? undefined : body.slice(separator + 1)
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

interface ParsedCommand {
  readonly command: CliCommand
  readonly explicit: boolean
  readonly startIndex: number
}

const parseCommandFromArgs = (
  rawArgs: ReadonlyArray<string>
): Either.Either<ParsedCommand, CliError> => {
  const first = rawArgs[0]
  if (first === undefined || isFlag(first)) {
    return Either.right({ command: "format", explicit: false, startIndex: 0 })
  }
  const commandEither = parseCommand(first)
  if (Either.isLeft(commandEither)) {
    return Either.left(commandEither.left)
  }
  return Either.right({ command: commandEither.right, explicit: true, startIndex: 1 })
}

const parseFlags = (
  rawArgs: ReadonlyArray<string>,
  startIndex: number,
  initial: CliArgs
): Either.Either<CliArgs, CliError> => {
  let args = initial
  let index = startIndex
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      return Either.left(cliError(`Unexpected positional argument: ${current}`))
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array (node binary and script first).
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant command defaults to format when omitted
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  const commandEither = parseCommandFromArgs(rawArgs)
  if (Either.isLeft(commandEither)) {
    return Either.left(commandEither.left)
  }
  const parsed = commandEither.right
  return parseFlags(rawArgs, parsed.startIndex, defaultArgs(parsed.command, parsed.explicit))
}
