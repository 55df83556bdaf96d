import * as Either from "effect/Either"
import * as Order from "effect/Order"

import type { InvalidNumber } from "./errors.js"
import { invalidNumber } from "./errors.js"

// CHANGE: model JSON numbers as exactly one of a 64-bit integer or a double
// WHY: integers survive a round trip exactly while floats keep their own kind
// QUOTE(TZ): "exactly one of {signed 64-bit integer, extended-precision float}"
// REF: req-number-1
// SOURCE: n/a
// FORMAT THEOREM: ∀i ∈ Integer, f ∈ Float: compare(i, f) = compare(Number(i), f)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Integer ∈ [-2^63, 2^63 - 1]; Float is finite
// COMPLEXITY: O(1)/O(1)

export type NumberRepr =
  | { readonly _tag: "Integer"; readonly value: bigint }
  | { readonly _tag: "Float"; readonly value: number }

export const INTEGER_MIN = -(2n ** 63n)
export const INTEGER_MAX = 2n ** 63n - 1n

const isInInt64Range = (value: bigint): boolean => value >= INTEGER_MIN && value <= INTEGER_MAX

/**
 * Build an Integer representation.
 *
 * @param value - bigint, or a JS number that is a safe integer.
 * @returns Integer repr or InvalidNumber.
 *
 * @pure true
 * @invariant result lies in the signed 64-bit range
 * @complexity O(1)
 */
export const makeInteger = (value: bigint | number): Either.Either<NumberRepr, InvalidNumber> => {
  if (typeof value === "number" && !Number.isSafeInteger(value)) {
    return Either.left(invalidNumber(`${value} is not a safe integer`))
  }
  const asBigInt = BigInt(value)
  if (!isInInt64Range(asBigInt)) {
    return Either.left(invalidNumber(`${asBigInt} does not fit in a signed 64-bit integer`))
  }
  return Either.right({ _tag: "Integer", value: asBigInt })
}

export const makeFloat = (value: number): Either.Either<NumberRepr, InvalidNumber> =>
  Number.isFinite(value)
    ? Either.right({ _tag: "Float", value })
    : Either.left(invalidNumber(`${value} is not a finite number`))

const widen = (repr: NumberRepr): number => repr._tag === "Integer" ? Number(repr.value) : repr.value

const sign = (difference: boolean, greater: boolean): -1 | 0 | 1 => {
  if (difference) {
    return greater ? 1 : -1
  }
  return 0
}

/**
 * Three-way comparison; mixed kinds widen the integer side to a double.
 *
 * @pure true
 * @invariant compareNumbers(a, b) = -compareNumbers(b, a)
 * @complexity O(1)
 */
export const compareNumbers = (left: NumberRepr, right: NumberRepr): -1 | 0 | 1 => {
  if (left._tag === "Integer" && right._tag === "Integer") {
    return sign(left.value !== right.value, left.value > right.value)
  }
  const lhs = widen(left)
  const rhs = widen(right)
  return sign(lhs !== rhs, lhs > rhs)
}

export const NumberOrder: Order.Order<NumberRepr> = Order.make(compareNumbers)

const hasFloatMarker = (text: string): boolean =>
  text.includes(".") || text.includes("e") || text.includes("E")

/**
 * Canonical decimal text of the active representation.
 *
 * @returns Digits for Integer; shortest round-trip text for Float, always re-readable as Float.
 *
 * @pure true
 * @invariant renderNumber(Float) contains '.', 'e' or 'E'
 * @complexity O(1)
 */
export const renderNumber = (repr: NumberRepr): string => {
  if (repr._tag === "Integer") {
    return repr.value.toString()
  }
  if (Object.is(repr.value, -0)) {
    return "-0.0"
  }
  const text = String(repr.value)
  return hasFloatMarker(text) ? text : `${text}.0`
}
