import * as Either from "effect/Either"
import * as Option from "effect/Option"
import * as SortedMap from "effect/SortedMap"

import type { EmptyArray, IndexOutOfRange, KindMismatch, MissingKey } from "./errors.js"
import { emptyArray, indexOutOfRange, kindMismatch, missingKey } from "./errors.js"
import type { JsonArray, JsonObject, Key, Value } from "./value.js"
import { copy, emptyObject, KeyOrder } from "./value.js"

// CHANGE: kind-guarded structural operations on the aggregate value
// WHY: array-only and object-only operations must fail on any other kind instead of coercing
// QUOTE(TZ): "fail with a \"wrong kind\" error if the operation does not apply"
// REF: req-access-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: v._tag ≠ "Array" → append(v, x) = Left(KindMismatch)
// PURITY: CORE
// EFFECT: mutates the target container in place
// INVARIANT: stored children are deep copies of the inserted values
// COMPLEXITY: O(1) array ops, O(log n) object ops, O(n) for copies

const done: Either.Either<void, never> = Either.right(undefined)

const asArray = (target: Value, operation: string): Either.Either<JsonArray, KindMismatch> =>
  target._tag === "Array" ? Either.right(target) : Either.left(kindMismatch(operation, ["Array"], target._tag))

const asObject = (target: Value, operation: string): Either.Either<JsonObject, KindMismatch> =>
  target._tag === "Object" ? Either.right(target) : Either.left(kindMismatch(operation, ["Object"], target._tag))

const checkIndex = (items: ReadonlyArray<Value>, index: number): Either.Either<number, IndexOutOfRange> =>
  Number.isInteger(index) && index >= 0 && index < items.length
    ? Either.right(index)
    : Either.left(indexOutOfRange(index, items.length))

export const append = (target: Value, item: Value): Either.Either<void, KindMismatch> =>
  Either.map(asArray(target, "append"), (arr) => {
    arr.items.push(copy(item))
  })

/**
 * Remove and return the last array element.
 *
 * @returns Removed value; EmptyArray when there is nothing to remove.
 *
 * @pure false
 * @invariant size decreases by exactly one on success
 * @complexity O(1)
 */
export const pop = (target: Value): Either.Either<Value, KindMismatch | EmptyArray> => {
  const arr = asArray(target, "pop")
  if (Either.isLeft(arr)) {
    return Either.left(arr.left)
  }
  const last = arr.right.items.pop()
  return last === undefined ? Either.left(emptyArray()) : Either.right(last)
}

export const at = (target: Value, index: number): Either.Either<Value, KindMismatch | IndexOutOfRange> => {
  const arr = asArray(target, "index")
  if (Either.isLeft(arr)) {
    return Either.left(arr.left)
  }
  const items = arr.right.items
  const checked = checkIndex(items, index)
  if (Either.isLeft(checked)) {
    return Either.left(checked.left)
  }
  const element = items[checked.right]
  return element === undefined ? Either.left(indexOutOfRange(index, items.length)) : Either.right(element)
}

export const setAt = (
  target: Value,
  index: number,
  item: Value
): Either.Either<void, KindMismatch | IndexOutOfRange> => {
  const arr = asArray(target, "index")
  if (Either.isLeft(arr)) {
    return Either.left(arr.left)
  }
  const checked = checkIndex(arr.right.items, index)
  if (Either.isLeft(checked)) {
    return Either.left(checked.left)
  }
  arr.right.items[checked.right] = copy(item)
  return done
}

/**
 * Read-only keyed access.
 *
 * @returns The live child stored under key; MissingKey when absent.
 *
 * @pure true
 * @invariant never creates entries
 * @complexity O(log n)
 */
export const get = (target: Value, key: Key): Either.Either<Value, KindMismatch | MissingKey> => {
  const obj = asObject(target, "access field")
  if (Either.isLeft(obj)) {
    return Either.left(obj.left)
  }
  return Option.match(SortedMap.get(obj.right.fields, key), {
    onNone: () => Either.left(missingKey(key)),
    onSome: (child) => Either.right(child)
  })
}

/**
 * Mutable keyed access: an absent key is filled with an empty Object first.
 *
 * @returns The live child, suitable for chained in-place edits.
 *
 * @pure false
 * @invariant after success has(target, key)
 * @complexity O(log n)
 */
export const getOrCreate = (target: Value, key: Key): Either.Either<Value, KindMismatch> => {
  const obj = asObject(target, "access field")
  if (Either.isLeft(obj)) {
    return Either.left(obj.left)
  }
  const existing = SortedMap.get(obj.right.fields, key)
  if (Option.isSome(existing)) {
    return Either.right(existing.value)
  }
  const created = emptyObject()
  obj.right.fields = SortedMap.set(obj.right.fields, key, created)
  return Either.right(created)
}

export const set = (target: Value, key: Key, item: Value): Either.Either<void, KindMismatch> =>
  Either.map(asObject(target, "set field"), (obj) => {
    obj.fields = SortedMap.set(obj.fields, key, copy(item))
  })

export const removeField = (target: Value, key: Key): Either.Either<void, KindMismatch> =>
  Either.map(asObject(target, "remove field"), (obj) => {
    obj.fields = SortedMap.remove(obj.fields, key)
  })

export const has = (target: Value, key: Key): Either.Either<boolean, KindMismatch> =>
  Either.map(asObject(target, "look up field"), (obj) => SortedMap.has(obj.fields, key))

export const size = (target: Value): Either.Either<number, KindMismatch> => {
  if (target._tag === "Array") {
    return Either.right(target.items.length)
  }
  if (target._tag === "Object") {
    return Either.right(SortedMap.size(target.fields))
  }
  return Either.left(kindMismatch("take size", ["Array", "Object"], target._tag))
}

export const clear = (target: Value): Either.Either<void, KindMismatch> => {
  if (target._tag === "Array") {
    target.items.length = 0
    return done
  }
  if (target._tag === "Object") {
    target.fields = SortedMap.empty<Key, Value>(KeyOrder)
    return done
  }
  return Either.left(kindMismatch("clear", ["Array", "Object"], target._tag))
}

export const elements = (target: Value): Either.Either<ReadonlyArray<Value>, KindMismatch> =>
  Either.map(asArray(target, "list elements"), (arr) => [...arr.items])

export const entries = (
  target: Value
): Either.Either<ReadonlyArray<readonly [Key, Value]>, KindMismatch> =>
  Either.map(asObject(target, "list entries"), (obj) => Array.from(obj.fields))
