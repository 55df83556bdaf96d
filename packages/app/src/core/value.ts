import * as Either from "effect/Either"
import * as Order from "effect/Order"
import * as SortedMap from "effect/SortedMap"

import type { InvalidInput, InvalidNumber, Kind, KindMismatch, NumberKindMismatch } from "./errors.js"
import { invalidInput, kindMismatch, numberKindMismatch } from "./errors.js"
import type { Json } from "./json.js"
import { isJsonRecord } from "./json.js"
import type { NumberRepr } from "./number.js"
import { makeFloat, makeInteger } from "./number.js"

// CHANGE: define the closed value model for JSON data
// WHY: every structural operation, comparison and printer matches exhaustively on six kinds
// QUOTE(TZ): "a closed, tagged union (String | Number | Bool | Null | Array | Object)"
// REF: req-value-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v ∈ Value: v._tag ∈ Kind ∧ children(v) are owned by v alone
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Object iteration order = key order; containers never share children
// COMPLEXITY: O(1) per constructor, O(n) for copy/fromJson/toJson

export type Key = string

/**
 * Order text by Unicode code point, which matches the byte order of its UTF-8 encoding.
 *
 * @pure true
 * @invariant compareCodePoints(a, b) = -compareCodePoints(b, a)
 * @complexity O(min(|a|, |b|))
 */
export const compareCodePoints = (left: string, right: string): -1 | 0 | 1 => {
  let index = 0
  while (index < left.length && index < right.length) {
    const lhs = left.codePointAt(index) ?? 0
    const rhs = right.codePointAt(index) ?? 0
    if (lhs !== rhs) {
      return lhs < rhs ? -1 : 1
    }
    index += lhs > 0xffff ? 2 : 1
  }
  if (left.length === right.length) {
    return 0
  }
  return left.length < right.length ? -1 : 1
}

export const KeyOrder: Order.Order<Key> = Order.make(compareCodePoints)

export interface JsonString {
  readonly _tag: "String"
  readonly value: string
}

export interface JsonNumber {
  readonly _tag: "Number"
  readonly repr: NumberRepr
}

export interface JsonBool {
  readonly _tag: "Bool"
  readonly value: boolean
}

export interface JsonNull {
  readonly _tag: "Null"
}

export interface JsonArray {
  readonly _tag: "Array"
  readonly items: Array<Value>
}

export interface JsonObject {
  readonly _tag: "Object"
  fields: SortedMap.SortedMap<Key, Value>
}

export type Value = JsonString | JsonNumber | JsonBool | JsonNull | JsonArray | JsonObject

export const kindOf = (value: Value): Kind => value._tag

export const string = (value: string): Value => ({ _tag: "String", value })

export const bool = (value: boolean): Value => ({ _tag: "Bool", value })

export const jsonNull = (): Value => ({ _tag: "Null" })

export const fromNumberRepr = (repr: NumberRepr): Value => ({ _tag: "Number", repr })

export const integer = (value: bigint | number): Either.Either<Value, InvalidNumber> =>
  Either.map(makeInteger(value), fromNumberRepr)

export const float = (value: number): Either.Either<Value, InvalidNumber> => Either.map(makeFloat(value), fromNumberRepr)

/**
 * Deep copy of a value tree.
 *
 * @pure true
 * @invariant equals(copy(v), v) ∧ copy(v) shares no container with v
 * @complexity O(n)
 */
export const copy = (value: Value): Value => {
  switch (value._tag) {
    case "Array":
      return { _tag: "Array", items: value.items.map(copy) }
    case "Object":
      return { _tag: "Object", fields: SortedMap.map(value.fields, copy) }
    case "String":
    case "Number":
    case "Bool":
    case "Null":
      return value
  }
}

export const array = (items: Iterable<Value> = []): Value => ({
  _tag: "Array",
  items: Array.from(items, copy)
})

/**
 * Build an Object; a repeated key keeps the last value given for it.
 *
 * @pure true
 * @invariant size = number of distinct keys
 * @complexity O(n log n)
 */
export const object = (entries: Iterable<readonly [Key, Value]> = []): Value => {
  let fields = SortedMap.empty<Key, Value>(KeyOrder)
  for (const [key, value] of entries) {
    fields = SortedMap.set(fields, key, copy(value))
  }
  return { _tag: "Object", fields }
}

export const emptyObject = (): Value => object()

const numberFromJs = (value: number): Either.Either<Value, InvalidNumber> =>
  Number.isSafeInteger(value) ? integer(value) : float(value)

/**
 * Build a value tree from native JS literal data.
 *
 * @param literal - Nested arrays, records and primitives.
 * @returns Value or InvalidNumber for NaN/Infinity/out-of-range bigint leaves.
 *
 * @pure true
 * @invariant safe-integer numbers and bigints become Integer, other numbers become Float
 * @complexity O(n log n)
 */
export const fromJson = (literal: Json): Either.Either<Value, InvalidNumber> => {
  if (literal === null) {
    return Either.right(jsonNull())
  }
  if (typeof literal === "boolean") {
    return Either.right(bool(literal))
  }
  if (typeof literal === "string") {
    return Either.right(string(literal))
  }
  if (typeof literal === "bigint") {
    return integer(literal)
  }
  if (typeof literal === "number") {
    return numberFromJs(literal)
  }
  if (isJsonRecord(literal)) {
    const entries: Array<readonly [Key, Value]> = []
    for (const [key, child] of Object.entries(literal)) {
      const converted = fromJson(child)
      if (Either.isLeft(converted)) {
        return Either.left(converted.left)
      }
      entries.push([key, converted.right])
    }
    return Either.right(object(entries))
  }
  const items: Array<Value> = []
  for (const child of literal) {
    const converted = fromJson(child)
    if (Either.isLeft(converted)) {
      return Either.left(converted.left)
    }
    items.push(converted.right)
  }
  return Either.right({ _tag: "Array", items })
}

const isPlainRecord = (input: object): input is Readonly<Record<string, unknown>> => {
  const prototype: unknown = Object.getPrototypeOf(input)
  return prototype === Object.prototype || prototype === null
}

const childPath = (path: string, segment: string | number): string =>
  typeof segment === "number" ? `${path}[${segment}]` : `${path}.${segment}`

const convertUnknown = (
  input: unknown,
  path: string,
  seen: Set<object>
): Either.Either<Value, InvalidInput> => {
  if (input === null) {
    return Either.right(jsonNull())
  }
  if (typeof input === "boolean") {
    return Either.right(bool(input))
  }
  if (typeof input === "string") {
    return Either.right(string(input))
  }
  if (typeof input === "bigint") {
    return Either.mapLeft(integer(input), (error) => invalidInput(path, error.message))
  }
  if (typeof input === "number") {
    return Either.mapLeft(numberFromJs(input), (error) => invalidInput(path, error.message))
  }
  if (typeof input !== "object") {
    return Either.left(invalidInput(path, `cannot convert ${typeof input} to a JSON value`))
  }
  if (seen.has(input)) {
    return Either.left(invalidInput(path, "cyclic structure cannot be converted to a JSON value"))
  }
  seen.add(input)
  const result = Array.isArray(input)
    ? convertUnknownArray(input, path, seen)
    : convertUnknownRecord(input, path, seen)
  seen.delete(input)
  return result
}

const convertUnknownArray = (
  input: ReadonlyArray<unknown>,
  path: string,
  seen: Set<object>
): Either.Either<Value, InvalidInput> => {
  const items: Array<Value> = []
  for (const [index, child] of input.entries()) {
    const converted = convertUnknown(child, childPath(path, index), seen)
    if (Either.isLeft(converted)) {
      return Either.left(converted.left)
    }
    items.push(converted.right)
  }
  return Either.right({ _tag: "Array", items })
}

const convertUnknownRecord = (
  input: object,
  path: string,
  seen: Set<object>
): Either.Either<Value, InvalidInput> => {
  if (!isPlainRecord(input)) {
    return Either.left(invalidInput(path, "only plain objects can be converted to a JSON object"))
  }
  let fields = SortedMap.empty<Key, Value>(KeyOrder)
  for (const [key, child] of Object.entries(input)) {
    const converted = convertUnknown(child, childPath(path, key), seen)
    if (Either.isLeft(converted)) {
      return Either.left(converted.left)
    }
    fields = SortedMap.set(fields, key, converted.right)
  }
  return Either.right({ _tag: "Object", fields })
}

/**
 * Run-time checked conversion of arbitrary JS data.
 *
 * @param input - Any value, e.g. from JSON.parse or user code.
 * @returns Value or InvalidInput naming the offending path.
 *
 * @pure true
 * @invariant booleans never become Numbers
 * @complexity O(n log n)
 */
export const fromUnknown = (input: unknown): Either.Either<Value, InvalidInput> =>
  convertUnknown(input, "", new Set<object>())

const integerToJs = (value: bigint): number | bigint =>
  value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(value) : value

/**
 * Convert a value tree back to native JS data.
 *
 * @pure true
 * @invariant fromJson(toJson(v)) equals v up to Integer/Float of integral doubles
 * @complexity O(n)
 */
export const toJson = (value: Value): Json => {
  switch (value._tag) {
    case "String":
      return value.value
    case "Number":
      return value.repr._tag === "Integer" ? integerToJs(value.repr.value) : value.repr.value
    case "Bool":
      return value.value
    case "Null":
      return null
    case "Array":
      return value.items.map(toJson)
    case "Object":
      // fromEntries defines own properties, so "__proto__" stays an ordinary key
      return Object.fromEntries(Array.from(value.fields, ([key, child]): readonly [Key, Json] => [key, toJson(child)]))
  }
}

export const getString = (value: Value): Either.Either<string, KindMismatch> =>
  value._tag === "String"
    ? Either.right(value.value)
    : Either.left(kindMismatch("read string", ["String"], value._tag))

export const getBool = (value: Value): Either.Either<boolean, KindMismatch> =>
  value._tag === "Bool"
    ? Either.right(value.value)
    : Either.left(kindMismatch("read bool", ["Bool"], value._tag))

export const getInteger = (value: Value): Either.Either<bigint, KindMismatch | NumberKindMismatch> => {
  if (value._tag !== "Number") {
    return Either.left(kindMismatch("read integer", ["Number"], value._tag))
  }
  return value.repr._tag === "Integer"
    ? Either.right(value.repr.value)
    : Either.left(numberKindMismatch("Integer", value.repr._tag))
}

export const getFloat = (value: Value): Either.Either<number, KindMismatch | NumberKindMismatch> => {
  if (value._tag !== "Number") {
    return Either.left(kindMismatch("read float", ["Number"], value._tag))
  }
  return value.repr._tag === "Float"
    ? Either.right(value.repr.value)
    : Either.left(numberKindMismatch("Float", value.repr._tag))
}

export const isNull = (value: Value): boolean => value._tag === "Null"
