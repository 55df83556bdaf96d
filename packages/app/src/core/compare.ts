import * as Either from "effect/Either"
import * as Option from "effect/Option"
import * as SortedMap from "effect/SortedMap"

import type { KindMismatch } from "./errors.js"
import { kindMismatch } from "./errors.js"
import { compareNumbers } from "./number.js"
import type { Value } from "./value.js"
import { compareCodePoints } from "./value.js"

// CHANGE: structural equality and kind-restricted ordering for values
// WHY: ordering is only meaningful between two strings or two numbers
// QUOTE(TZ): "valid only when both sides hold String, or both hold Number"
// REF: req-compare-1
// SOURCE: n/a
// FORMAT THEOREM: ∀i, f: lessThan(Integer(i), Float(f)) ⇔ Number(i) < f
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: equals is reflexive, symmetric and transitive over a fixed number kind
// COMPLEXITY: O(n) for equals, O(1) for ordering

const arraysEqual = (left: ReadonlyArray<Value>, right: ReadonlyArray<Value>): boolean =>
  left.length === right.length && left.every((item, index) => {
    const other = right[index]
    return other !== undefined && equals(item, other)
  })

const objectsEqual = (
  left: SortedMap.SortedMap<string, Value>,
  right: SortedMap.SortedMap<string, Value>
): boolean => {
  if (SortedMap.size(left) !== SortedMap.size(right)) {
    return false
  }
  for (const [key, item] of left) {
    const other = SortedMap.get(right, key)
    if (Option.isNone(other) || !equals(item, other.value)) {
      return false
    }
  }
  return true
}

/**
 * Structural equality; numbers of different kinds compare after widening.
 *
 * @pure true
 * @invariant equals(a, b) → a._tag = b._tag
 * @complexity O(n)
 */
export const equals = (left: Value, right: Value): boolean => {
  switch (left._tag) {
    case "String":
      return right._tag === "String" && left.value === right.value
    case "Number":
      return right._tag === "Number" && compareNumbers(left.repr, right.repr) === 0
    case "Bool":
      return right._tag === "Bool" && left.value === right.value
    case "Null":
      return right._tag === "Null"
    case "Array":
      return right._tag === "Array" && arraysEqual(left.items, right.items)
    case "Object":
      return right._tag === "Object" && objectsEqual(left.fields, right.fields)
  }
}

/**
 * Three-way ordering of two strings or two numbers.
 *
 * @param operation - Name recorded in the KindMismatch on failure.
 * @returns -1, 0 or 1; KindMismatch for any other pairing.
 *
 * @pure true
 * @invariant compare(a, b) = -compare(b, a)
 * @complexity O(1)
 */
export const compare = (
  left: Value,
  right: Value,
  operation = "compare"
): Either.Either<-1 | 0 | 1, KindMismatch> => {
  if (left._tag === "String" && right._tag === "String") {
    return Either.right(compareCodePoints(left.value, right.value))
  }
  if (left._tag === "Number" && right._tag === "Number") {
    return Either.right(compareNumbers(left.repr, right.repr))
  }
  if (left._tag === "String" || left._tag === "Number") {
    return Either.left(kindMismatch(operation, [left._tag], right._tag))
  }
  return Either.left(kindMismatch(operation, ["String", "Number"], left._tag))
}

export const lessThan = (left: Value, right: Value): Either.Either<boolean, KindMismatch> =>
  Either.map(compare(left, right, "compare with <"), (order) => order < 0)

export const lessThanOrEqual = (left: Value, right: Value): Either.Either<boolean, KindMismatch> =>
  Either.map(compare(left, right, "compare with <="), (order) => order <= 0)

export const greaterThan = (left: Value, right: Value): Either.Either<boolean, KindMismatch> =>
  Either.map(compare(left, right, "compare with >"), (order) => order > 0)

export const greaterThanOrEqual = (left: Value, right: Value): Either.Either<boolean, KindMismatch> =>
  Either.map(compare(left, right, "compare with >="), (order) => order >= 0)
