import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Match } from "effect"
import * as Either from "effect/Either"
import type * as Stream from "effect/Stream"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { resolveConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { renderError } from "../core/errors.js"
import { renderAs } from "../core/render.js"
import type { Value } from "../core/value.js"
import { loadConfigFile } from "../shell/config-file.js"
import { readJsonFile, writeJsonFile } from "../shell/json-file.js"
import { parseFromStream } from "../shell/json-stream.js"

// CHANGE: orchestrate format/compact/check with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// QUOTE(TZ): "format (default): parse input (file or stdin) and print indented text"
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀cmd: run(cmd) returns exitCode ∈ {0,1}
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: output emitted at most once
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly output: string
  readonly exitCode: number
}

export type Stdin = Stream.Stream<Uint8Array, AppError>

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const emit = (output: string, silent: boolean): Effect.Effect<void> => silent ? Effect.void : writeStdout(output)

const usesStdin = (path: string | undefined): path is undefined | "-" => path === undefined || path === "-"

const readInput = (
  cli: CliArgs,
  config: ResolvedConfig,
  stdin: Stdin
): Effect.Effect<Value, AppError, FileSystemService> =>
  usesStdin(cli.input)
    ? parseFromStream(stdin, { maxDepth: config.maxDepth })
    : readJsonFile(cli.input, { maxDepth: config.maxDepth })

const handleCheck = (
  cli: CliArgs,
  config: ResolvedConfig,
  stdin: Stdin
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const parsed = yield* _(Effect.either(readInput(cli, config, stdin)))
    const result: ProgramResult = Either.match(parsed, {
      onLeft: (error) => ({ output: renderError(error), exitCode: 1 }),
      onRight: () => ({ output: "valid", exitCode: 0 })
    })
    yield* _(emit(result.output, cli.silent))
    return result
  })

const handleRender = (
  cli: CliArgs,
  config: ResolvedConfig,
  stdin: Stdin
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const value = yield* _(readInput(cli, config, stdin))
    if (!usesStdin(cli.output)) {
      yield* _(writeJsonFile(cli.output, value, { format: config.format, indent: config.indent }))
      return { output: "", exitCode: 0 }
    }
    const output = renderAs(value, config.format, config.indent)
    yield* _(emit(output, cli.silent))
    return { output, exitCode: 0 }
  })

const executeCommand = (
  cli: CliArgs,
  config: ResolvedConfig,
  stdin: Stdin
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Match.value(cli.command).pipe(
    Match.when("check", () => handleCheck(cli, config, stdin)),
    Match.when("format", () => handleRender(cli, config, stdin)),
    Match.when("compact", () => handleRender(cli, config, stdin)),
    Match.exhaustive
  )

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @param stdin - Byte source used when no --input file is given.
 * @returns ProgramResult with the emitted text and exit code.
 *
 * @pure false
 * @effect FileSystem, Console
 * @invariant exitCode is deterministic for fixed inputs
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>,
  stdin: Stdin
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    const fileConfig = yield* _(loadConfigFile(cli.configPath, cli.configPathExplicit))
    const config = resolveConfig(cli, fileConfig)
    return yield* _(executeCommand(cli, config, stdin))
  })
