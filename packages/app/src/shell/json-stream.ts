import * as Effect from "effect/Effect"
import * as Stream from "effect/Stream"

import type { JsonError } from "../core/errors.js"
import type { ParseOptions } from "../core/parse.js"
import { parseFromString } from "../core/parse.js"
import type { Value } from "../core/value.js"

// CHANGE: parse a complete document delivered as a byte stream
// WHY: stdin and sockets arrive in chunks; the parser consumes one finished text
// QUOTE(TZ): "parseFromStream(stream, options?) → collects a Stream<Uint8Array> as UTF-8 text, then parses"
// REF: req-json-stream-1
// SOURCE: n/a
// FORMAT THEOREM: ∀chunks: parseFromStream(chunks) = parseFromString(utf8(concat(chunks)))
// PURITY: SHELL
// EFFECT: Effect<Value, JsonError | E, R>
// INVARIANT: multi-byte characters split across chunks decode intact
// COMPLEXITY: O(n)

export const parseFromStream = <E, R>(
  stream: Stream.Stream<Uint8Array, E, R>,
  options: ParseOptions = {}
): Effect.Effect<Value, JsonError | E, R> =>
  stream.pipe(
    Stream.decodeText("utf-8"),
    Stream.mkString,
    Effect.flatMap((text) => parseFromString(text, options))
  )
