import { Match } from "effect"

import type { CliError } from "./cli.js"

// CHANGE: unify error algebra for the value model, parser and CLI shell
// WHY: every failure is a typed value; nothing is thrown across the public API
// QUOTE(TZ): "every violation raises a descriptive, non-recoverable error"
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type Kind = "String" | "Number" | "Bool" | "Null" | "Array" | "Object"

export type NumberKind = "Integer" | "Float"

export type ParseError = {
  readonly _tag: "ParseError"
  readonly message: string
  readonly position: number
}
export type EmptyInput = { readonly _tag: "EmptyInput"; readonly message: string }

export type KindMismatch = {
  readonly _tag: "KindMismatch"
  readonly operation: string
  readonly expected: ReadonlyArray<Kind>
  readonly actual: Kind
  readonly message: string
}
export type NumberKindMismatch = {
  readonly _tag: "NumberKindMismatch"
  readonly requested: NumberKind
  readonly actual: NumberKind
  readonly message: string
}
export type IndexOutOfRange = {
  readonly _tag: "IndexOutOfRange"
  readonly index: number
  readonly size: number
  readonly message: string
}
export type MissingKey = { readonly _tag: "MissingKey"; readonly key: string; readonly message: string }
export type EmptyArray = { readonly _tag: "EmptyArray"; readonly message: string }
export type InvalidNumber = { readonly _tag: "InvalidNumber"; readonly message: string }
export type InvalidInput = { readonly _tag: "InvalidInput"; readonly path: string; readonly message: string }

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }

export type JsonError = ParseError | EmptyInput

export type AccessError = KindMismatch | NumberKindMismatch | IndexOutOfRange | MissingKey | EmptyArray

export type ValueError = AccessError | InvalidNumber | InvalidInput

export type AppError =
  | JsonError
  | ValueError
  | CliError
  | ConfigError
  | FileError

export const parseError = (message: string, position: number): ParseError => ({
  _tag: "ParseError",
  message,
  position
})

export const emptyInput = (): EmptyInput => ({
  _tag: "EmptyInput",
  message: "Cannot parse empty input or input containing only whitespace"
})

const formatKinds = (kinds: ReadonlyArray<Kind>): string => kinds.join(" or ")

export const kindMismatch = (
  operation: string,
  expected: ReadonlyArray<Kind>,
  actual: Kind
): KindMismatch => ({
  _tag: "KindMismatch",
  operation,
  expected,
  actual,
  message: `Cannot ${operation}: value holds ${actual}, expected ${formatKinds(expected)}`
})

export const numberKindMismatch = (requested: NumberKind, actual: NumberKind): NumberKindMismatch => ({
  _tag: "NumberKindMismatch",
  requested,
  actual,
  message: `Number holds ${actual}, cannot read it as ${requested}`
})

export const indexOutOfRange = (index: number, size: number): IndexOutOfRange => ({
  _tag: "IndexOutOfRange",
  index,
  size,
  message: `Array index ${index} out of range for size ${size}`
})

export const missingKey = (key: string): MissingKey => ({
  _tag: "MissingKey",
  key,
  message: `Object has no field "${key}"`
})

export const emptyArray = (): EmptyArray => ({
  _tag: "EmptyArray",
  message: "Cannot pop from an empty array"
})

export const invalidNumber = (message: string): InvalidNumber => ({
  _tag: "InvalidNumber",
  message
})

export const invalidInput = (path: string, message: string): InvalidInput => ({
  _tag: "InvalidInput",
  path,
  message
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

/**
 * Render any application error as a single human-readable line.
 *
 * @param error - Error value from any layer.
 * @returns Message suitable for stderr.
 *
 * @pure true
 * @invariant output never contains a newline for single-line messages
 * @complexity O(1)
 */
export const renderError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("ParseError", (value) => `${value.message} (at offset ${value.position})`),
    Match.tag("InvalidInput", (value) => value.path.length === 0 ? value.message : `${value.path}: ${value.message}`),
    Match.tag(
      "EmptyInput",
      "KindMismatch",
      "NumberKindMismatch",
      "IndexOutOfRange",
      "MissingKey",
      "EmptyArray",
      "InvalidNumber",
      "CliError",
      "ConfigError",
      "FileError",
      (value) => value.message
    ),
    Match.exhaustive
  )
