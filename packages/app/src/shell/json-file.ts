import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"

import type { AppError } from "../core/errors.js"
import { fileError } from "../core/errors.js"
import type { ParseOptions } from "../core/parse.js"
import { parseFromString } from "../core/parse.js"
import type { OutputFormat } from "../core/render.js"
import { renderAs } from "../core/render.js"
import type { Value } from "../core/value.js"

// CHANGE: read and write JSON documents on disk through the platform FileSystem
// WHY: file access stays in the shell while parsing and rendering remain pure
// QUOTE(TZ): "readJsonFile(path, options?) → Effect<Value, AppError, FileSystem>"
// REF: req-json-file-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v, p: write(p, v) ; read(p) = v
// PURITY: SHELL
// EFFECT: Effect<Value | void, AppError, FileSystem>
// INVARIANT: written files end with exactly one newline
// COMPLEXITY: O(n)

export interface WriteOptions {
  readonly format: OutputFormat
  readonly indent?: string
}

export const readJsonFile = (
  path: string,
  options: ParseOptions = {}
): Effect.Effect<Value, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const contents = yield* _(
      fs.readFileString(path).pipe(
        Effect.mapError((error) => fileError(`Cannot read ${path}: ${error.message}`))
      )
    )
    return yield* _(parseFromString(contents, options))
  })

export const writeJsonFile = (
  path: string,
  value: Value,
  options: WriteOptions
): Effect.Effect<void, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const payload = `${renderAs(value, options.format, options.indent)}\n`
    yield* _(
      fs.writeFileString(path, payload).pipe(
        Effect.mapError((error) => fileError(`Cannot write ${path}: ${error.message}`))
      )
    )
  })
