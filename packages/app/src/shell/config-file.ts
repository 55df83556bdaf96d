import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import { pipe } from "effect/Function"
import * as ParseResult from "effect/ParseResult"
import * as S from "effect/Schema"

import { parseIndent } from "../core/cli.js"
import type { FileConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { configError, fileError } from "../core/errors.js"
import { MAX_DEPTH_LIMIT } from "../core/parse.js"

// CHANGE: decode .json-value.json with schema validation
// WHY: keep boundary data typed and reject invalid config early
// QUOTE(TZ): "decoded with effect/Schema and reported with ParseResult.TreeFormatter on failure"
// REF: req-config-file-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c: decode(c) = Right(cfg) → cfg fields have correct types
// PURITY: SHELL
// EFFECT: Effect<FileConfig | undefined, AppError, FileSystem>
// INVARIANT: missing optional config yields undefined
// COMPLEXITY: O(n)

const RawConfigSchema = S.partial(
  S.Struct({
    indent: S.Union(S.String, S.Number.pipe(S.int(), S.between(0, 16))),
    compact: S.Boolean,
    maxDepth: S.Number.pipe(S.int(), S.between(1, MAX_DEPTH_LIMIT))
  })
)

const ConfigSchema = S.parseJson(RawConfigSchema)

type RawIndent = string | number

const decodeIndent = (indent: RawIndent | undefined): Effect.Effect<string | undefined, AppError> => {
  if (indent === undefined) {
    return Effect.succeed(undefined)
  }
  return pipe(
    parseIndent(String(indent)),
    Either.match({
      onLeft: (error) => Effect.fail(configError(`indent: ${error.message}`)),
      onRight: (value) => Effect.succeed(value)
    })
  )
}

export const decodeConfig = (raw: string): Effect.Effect<FileConfig, AppError> =>
  Effect.gen(function*(_) {
    const config = yield* _(
      S.decodeUnknown(ConfigSchema)(raw).pipe(
        Effect.mapError((error) => configError(ParseResult.TreeFormatter.formatErrorSync(error)))
      )
    )
    const indent = yield* _(decodeIndent(config.indent))
    return {
      ...(indent === undefined ? {} : { indent }),
      ...(config.compact === undefined ? {} : { compact: config.compact }),
      ...(config.maxDepth === undefined ? {} : { maxDepth: config.maxDepth })
    }
  })

export const loadConfigFile = (
  path: string,
  explicit: boolean
): Effect.Effect<FileConfig | undefined, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => fileError(error.message)))
    )
    if (!exists) {
      if (explicit) {
        return yield* _(Effect.fail(fileError(`Config file not found: ${path}`)))
      }
      return
    }
    const contents = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(error.message)))
    )
    return yield* _(decodeConfig(contents))
  })
