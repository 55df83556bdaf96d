#!/usr/bin/env node
import { NodeContext, NodeRuntime, NodeStream } from "@effect/platform-node"
import { Effect } from "effect"

import { fileError, renderError } from "../core/errors.js"
import { runCli } from "./program.js"

// CHANGE: wire CLI program into Node runtime with proper teardown
// WHY: execute effects with platform services and typed error handling
// QUOTE(TZ): "Output goes to --output (file) or stdout"
// REF: req-main-1
// SOURCE: n/a
// FORMAT THEOREM: runMain(program) terminates with exitCode from ProgramResult
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext>
// INVARIANT: any failure is written to stderr and exits with 1
// COMPLEXITY: O(1)

const stdin = NodeStream.fromReadable(
  () => process.stdin,
  (error) => fileError(`Cannot read stdin: ${String(error)}`)
)

const main = Effect.gen(function*(_) {
  const result = yield* _(runCli(process.argv, stdin))
  if (result.exitCode !== 0) {
    yield* _(
      Effect.sync(() => {
        process.exitCode = result.exitCode
      })
    )
  }
}).pipe(
  Effect.catchAll((error) =>
    Effect.sync(() => {
      process.stderr.write(`${renderError(error)}\n`)
      process.exitCode = 1
    })
  )
)

NodeRuntime.runMain(Effect.provide(main, NodeContext.layer))
