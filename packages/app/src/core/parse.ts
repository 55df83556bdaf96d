import * as Either from "effect/Either"
import * as SortedMap from "effect/SortedMap"

import type { Cursor } from "./cursor.js"
import { makeCursor, peek, peekNonWhitespace, read, readCount } from "./cursor.js"
import type { JsonError, ParseError } from "./errors.js"
import { emptyInput, parseError } from "./errors.js"
import type { NumberRepr } from "./number.js"
import { makeFloat, makeInteger } from "./number.js"
import type { Key, Value } from "./value.js"
import { bool, fromNumberRepr, jsonNull, KeyOrder, string } from "./value.js"

// CHANGE: recursive-descent JSON reader over an explicit cursor
// WHY: one production per routine keeps every grammar edge case local and testable
// QUOTE(TZ): "consume a character stream and produce exactly one well-formed Value, or fail with a precise diagnostic"
// REF: req-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s: parse(s) = Right(v) → toCompactString(v) re-parses to v
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: no partial result is ever returned; nesting depth ≤ maxDepth
// COMPLEXITY: O(n) where n = input length

export interface ParseOptions {
  readonly maxDepth?: number
}

export const DEFAULT_MAX_DEPTH = 512

// hard ceiling on nesting; larger requests are clamped
export const MAX_DEPTH_LIMIT = 1024

export type NextKind = "string" | "number" | "bool" | "null" | "array" | "object" | "end" | "error"

interface ParserState {
  readonly cursor: Cursor
  readonly maxDepth: number
  depth: number
}

type Result<A> = Either.Either<A, ParseError>

const describeChar = (char: string | undefined): string => char === undefined ? "end of input" : `'${char}'`

const isDigit = (char: string): boolean => char >= "0" && char <= "9"

const isHexDigit = (char: string): boolean => /^[0-9a-fA-F]$/u.test(char)

const isNumberChar = (char: string): boolean =>
  isDigit(char) || char === "." || char === "-" || char === "+" || char === "e" || char === "E"

const ESCAPABLE = new Set(["\"", "\\", "/", "b", "f", "n", "r", "t", "u"])

const INTEGER_PATTERN = /^-?\d+$/u
const FLOAT_PATTERN = /^-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?$/u
const FLOAT_LEADING_ZERO = /^-?0\d/u

/**
 * Classify the next token by its first character.
 *
 * @pure true
 * @complexity O(1)
 */
export const detectNextKind = (char: string | undefined): NextKind => {
  if (char === undefined) {
    return "end"
  }
  if (char === "-" || isDigit(char)) {
    return "number"
  }
  switch (char) {
    case "\"":
      return "string"
    case "t":
    case "f":
      return "bool"
    case "n":
      return "null"
    case "[":
      return "array"
    case "{":
      return "object"
    default:
      return "error"
  }
}

const fail = <A>(message: string, position: number): Result<A> => Either.left(parseError(message, position))

const parseRawString = (cursor: Cursor): Result<string> => {
  const start = cursor.index
  const opening = read(cursor)
  if (opening !== "\"") {
    return fail(`Error while parsing string, expected '"', got ${describeChar(opening)}`, start)
  }
  let escaped = false
  let hexDigitsToRead = 0
  for (;;) {
    const position = cursor.index
    const char = read(cursor)
    if (char === undefined) {
      return fail("Error while parsing string, unexpected end of input", position)
    }
    if (hexDigitsToRead > 0) {
      if (!isHexDigit(char)) {
        return fail(`Error while parsing string, \\u must be followed by 4 hex digits, got ${describeChar(char)}`, position)
      }
      hexDigitsToRead -= 1
    }
    if (char === "\"" && !escaped) {
      return Either.right(cursor.text.slice(start + 1, position))
    }
    if (char.charCodeAt(0) < 0x20) {
      return fail("Error while parsing string, unescaped control character", position)
    }
    if (char === "\\" && !escaped) {
      escaped = true
    } else if (escaped) {
      if (!ESCAPABLE.has(char)) {
        return fail(`Error while parsing string, invalid escaped character ${describeChar(char)}`, position)
      }
      if (char === "u") {
        hexDigitsToRead = 4
      }
      escaped = false
    }
  }
}

const parseString = (cursor: Cursor): Result<Value> => Either.map(parseRawString(cursor), string)

const parseFloatLexeme = (lexeme: string): Either.Either<NumberRepr, string> => {
  if (lexeme.endsWith(".")) {
    return Either.left("Error while parsing number, decimal point cannot be the last character")
  }
  const dot = lexeme.indexOf(".")
  const exponent = lexeme.search(/[eE]/u)
  if (dot !== -1 && exponent === dot + 1) {
    return Either.left("Error while parsing number, 'e' or 'E' cannot be the first character after decimal point")
  }
  if (lexeme.startsWith(".") || lexeme.startsWith("-.")) {
    return Either.left("Error while parsing number, missing digit before decimal point")
  }
  if (FLOAT_LEADING_ZERO.test(lexeme)) {
    return Either.left("Error while parsing number, number cannot start with 0")
  }
  if (!FLOAT_PATTERN.test(lexeme)) {
    return Either.left(`Error while parsing number, invalid floating point number "${lexeme}"`)
  }
  return Either.mapLeft(
    makeFloat(Number(lexeme)),
    () => `Error while parsing number, "${lexeme}" is out of floating point range`
  )
}

const hasLeadingZero = (lexeme: string): boolean =>
  (lexeme.length > 1 && lexeme.startsWith("0")) || (lexeme.length > 2 && lexeme.startsWith("-0"))

const parseIntegerLexeme = (lexeme: string): Either.Either<NumberRepr, string> => {
  if (hasLeadingZero(lexeme)) {
    return Either.left("Error while parsing number, integer cannot start with 0")
  }
  if (!INTEGER_PATTERN.test(lexeme)) {
    return Either.left(`Error while parsing number, invalid integer "${lexeme}"`)
  }
  return Either.mapLeft(
    makeInteger(BigInt(lexeme)),
    () => `Error while parsing number, "${lexeme}" does not fit in a 64-bit integer`
  )
}

const isFloatLexeme = (lexeme: string): boolean =>
  lexeme.includes(".") || lexeme.includes("e") || lexeme.includes("E")

const parseNumber = (cursor: Cursor): Result<Value> => {
  const start = cursor.index
  let char = peek(cursor)
  while (char !== undefined && isNumberChar(char)) {
    cursor.index += 1
    char = peek(cursor)
  }
  const lexeme = cursor.text.slice(start, cursor.index)
  const repr = isFloatLexeme(lexeme) ? parseFloatLexeme(lexeme) : parseIntegerLexeme(lexeme)
  return Either.mapBoth(repr, {
    onLeft: (message) => parseError(message, start),
    onRight: fromNumberRepr
  })
}

const parseBool = (cursor: Cursor): Result<Value> => {
  const start = cursor.index
  const word = readCount(cursor, 4)
  if (word === "true") {
    return Either.right(bool(true))
  }
  if (word.startsWith("f")) {
    const full = word + readCount(cursor, 1)
    if (full === "false") {
      return Either.right(bool(false))
    }
    return fail(`Error while parsing bool, expected "true" or "false", got "${full}"`, start)
  }
  return fail(`Error while parsing bool, expected "true" or "false", got "${word}"`, start)
}

const parseNull = (cursor: Cursor): Result<Value> => {
  const start = cursor.index
  const word = readCount(cursor, 4)
  return word === "null"
    ? Either.right(jsonNull())
    : fail(`Error while parsing null, expected "null", got "${word}"`, start)
}

const depthExceeded = (state: ParserState): Result<never> =>
  fail(`Maximum nesting depth of ${state.maxDepth} exceeded`, state.cursor.index)

const parseArrayBody = (state: ParserState): Result<Value> => {
  const cursor = state.cursor
  const items: Array<Value> = []
  let expectingComma = false
  let lastReadWasComma = false
  for (;;) {
    const char = peekNonWhitespace(cursor)
    const position = cursor.index
    if (char === undefined) {
      return fail("Error while parsing array, unexpected end of input", position)
    }
    if (char === ",") {
      if (!expectingComma) {
        return fail("Unexpected comma when parsing array", position)
      }
      cursor.index += 1
      expectingComma = false
      lastReadWasComma = true
      continue
    }
    if (char === "]") {
      if (lastReadWasComma) {
        return fail("Trailing comma not allowed in array", position)
      }
      cursor.index += 1
      return Either.right({ _tag: "Array", items })
    }
    if (expectingComma) {
      return fail("Entries in array must be separated by a comma", position)
    }
    const item = parseValue(state, "array")
    if (Either.isLeft(item)) {
      return item
    }
    items.push(item.right)
    expectingComma = true
    lastReadWasComma = false
  }
}

const parseArray = (state: ParserState): Result<Value> => {
  const start = state.cursor.index
  const opening = read(state.cursor)
  if (opening !== "[") {
    return fail(`Error while parsing array, expected '[', got ${describeChar(opening)}`, start)
  }
  if (state.depth >= state.maxDepth) {
    return depthExceeded(state)
  }
  state.depth += 1
  const result = parseArrayBody(state)
  state.depth -= 1
  return result
}

const parseObjectBody = (state: ParserState): Result<Value> => {
  const cursor = state.cursor
  let fields = SortedMap.empty<Key, Value>(KeyOrder)
  let lastReadWasComma = false
  for (;;) {
    const next = peekNonWhitespace(cursor)
    if (next === "}") {
      if (lastReadWasComma) {
        return fail("Trailing comma not allowed in object", cursor.index)
      }
      cursor.index += 1
      return Either.right({ _tag: "Object", fields })
    }
    if (next !== "\"") {
      return fail(`Error while parsing object, expected '"', got ${describeChar(next)}`, cursor.index)
    }
    const key = parseRawString(cursor)
    if (Either.isLeft(key)) {
      return Either.left(key.left)
    }
    peekNonWhitespace(cursor)
    const separatorPosition = cursor.index
    const separator = read(cursor)
    if (separator !== ":") {
      return fail(`Error while parsing object, expected ':', got ${describeChar(separator)}`, separatorPosition)
    }
    const item = parseValue(state, "object")
    if (Either.isLeft(item)) {
      return item
    }
    fields = SortedMap.set(fields, key.right, item.right)
    peekNonWhitespace(cursor)
    const closingPosition = cursor.index
    const closing = read(cursor)
    if (closing === "}") {
      return Either.right({ _tag: "Object", fields })
    }
    if (closing !== ",") {
      return fail(`Error while parsing object, expected ',' or '}', got ${describeChar(closing)}`, closingPosition)
    }
    lastReadWasComma = true
  }
}

const parseObject = (state: ParserState): Result<Value> => {
  const start = state.cursor.index
  const opening = read(state.cursor)
  if (opening !== "{") {
    return fail(`Error while parsing object, expected '{', got ${describeChar(opening)}`, start)
  }
  if (state.depth >= state.maxDepth) {
    return depthExceeded(state)
  }
  state.depth += 1
  const result = parseObjectBody(state)
  state.depth -= 1
  return result
}

const parseValue = (state: ParserState, context: string): Result<Value> => {
  const char = peekNonWhitespace(state.cursor)
  const position = state.cursor.index
  switch (detectNextKind(char)) {
    case "string":
      return parseString(state.cursor)
    case "number":
      return parseNumber(state.cursor)
    case "bool":
      return parseBool(state.cursor)
    case "null":
      return parseNull(state.cursor)
    case "array":
      return parseArray(state)
    case "object":
      return parseObject(state)
    case "end":
      return fail(`Error while parsing ${context}, unexpected end of input`, position)
    case "error":
      return fail(`Error while parsing ${context}, unexpected next character ${describeChar(char)}`, position)
  }
}

/**
 * Parse exactly one JSON value from text.
 *
 * @param text - Complete JSON document.
 * @param options - maxDepth bounds array/object nesting (default 512, at most 1024).
 * @returns Value, EmptyInput for blank text, or ParseError with the failing offset.
 *
 * @pure true
 * @invariant only whitespace may follow the value
 * @complexity O(n)
 */
export const parseFromString = (
  text: string,
  options: ParseOptions = {}
): Either.Either<Value, JsonError> => {
  const state: ParserState = {
    cursor: makeCursor(text),
    maxDepth: Math.min(options.maxDepth ?? DEFAULT_MAX_DEPTH, MAX_DEPTH_LIMIT),
    depth: 0
  }
  if (peekNonWhitespace(state.cursor) === undefined) {
    return Either.left(emptyInput())
  }
  const value = parseValue(state, "value")
  if (Either.isLeft(value)) {
    return value
  }
  const trailing = peekNonWhitespace(state.cursor)
  if (trailing !== undefined) {
    return fail(
      `Error after reading a valid JSON value. Expected EOF but found ${describeChar(trailing)}`,
      state.cursor.index
    )
  }
  return value
}
