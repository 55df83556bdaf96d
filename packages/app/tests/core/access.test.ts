import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import {
  append,
  at,
  clear,
  elements,
  entries,
  get,
  getOrCreate,
  has,
  pop,
  removeField,
  set,
  setAt,
  size
} from "../../src/core/access.js"
import { toCompactString } from "../../src/core/render.js"
import { array, emptyObject, integer, jsonNull, string } from "../../src/core/value.js"
import { left, parse, right } from "./either-helpers.js"

const one = right(integer(1))

describe("array operations", () => {
  it.effect("appends copies and pops from the end", () =>
    Effect.sync(() => {
      const target = array()
      const item = array()
      right(append(target, item))
      right(append(target, one))
      right(append(item, jsonNull()))
      expect(toCompactString(target)).toBe("[[],1]")
      expect(toCompactString(right(pop(target)))).toBe("1")
      expect(toCompactString(target)).toBe("[[]]")
    }))

  it.effect("pop on an empty array fails", () =>
    Effect.sync(() => {
      expect(left(pop(array()))).toEqual({ _tag: "EmptyArray", message: "Cannot pop from an empty array" })
    }))

  it.effect("array operations reject other kinds", () =>
    Effect.sync(() => {
      expect(left(append(jsonNull(), one))).toEqual({
        _tag: "KindMismatch",
        operation: "append",
        expected: ["Array"],
        actual: "Null",
        message: "Cannot append: value holds Null, expected Array"
      })
      expect(left(pop(emptyObject())).message).toBe("Cannot pop: value holds Object, expected Array")
      expect(left(at(string("abc"), 0)).message).toBe("Cannot index: value holds String, expected Array")
    }))

  it.effect("indexes within bounds only", () =>
    Effect.sync(() => {
      const target = parse("[10,20]")
      expect(toCompactString(right(at(target, 1)))).toBe("20")
      expect(left(at(target, 2))).toEqual({
        _tag: "IndexOutOfRange",
        index: 2,
        size: 2,
        message: "Array index 2 out of range for size 2"
      })
      expect(left(at(target, -1))._tag).toBe("IndexOutOfRange")
      expect(left(at(target, 0.5))._tag).toBe("IndexOutOfRange")
    }))

  it.effect("replaces an element in place", () =>
    Effect.sync(() => {
      const target = parse("[10,20]")
      right(setAt(target, 0, string("x")))
      expect(toCompactString(target)).toBe("[\"x\",20]")
      expect(left(setAt(target, 5, one)).message).toBe("Array index 5 out of range for size 2")
    }))

  it.effect("returns live elements for chained edits", () =>
    Effect.sync(() => {
      const target = parse("[[1]]")
      right(append(right(at(target, 0)), one))
      expect(toCompactString(target)).toBe("[[1,1]]")
    }))
})

describe("object operations", () => {
  it.effect("read-only access never creates keys", () =>
    Effect.sync(() => {
      const target = parse("{\"a\":1}")
      expect(toCompactString(right(get(target, "a")))).toBe("1")
      expect(left(get(target, "b"))).toEqual({
        _tag: "MissingKey",
        key: "b",
        message: "Object has no field \"b\""
      })
      expect(right(has(target, "b"))).toBe(false)
      expect(left(get(parse("[]"), "a")).message).toBe("Cannot access field: value holds Array, expected Object")
    }))

  it.effect("mutable access fills absent keys with empty objects", () =>
    Effect.sync(() => {
      const root = emptyObject()
      const child = right(getOrCreate(root, "a"))
      right(set(child, "b", one))
      expect(toCompactString(root)).toBe("{\"a\":{\"b\":1}}")
      right(set(right(getOrCreate(root, "a")), "c", jsonNull()))
      expect(toCompactString(root)).toBe("{\"a\":{\"b\":1,\"c\":null}}")
    }))

  it.effect("set stores a copy and replaces existing entries", () =>
    Effect.sync(() => {
      const root = emptyObject()
      const list = array()
      right(set(root, "k", list))
      right(append(list, one))
      expect(toCompactString(root)).toBe("{\"k\":[]}")
      right(set(root, "k", string("v")))
      expect(toCompactString(root)).toBe("{\"k\":\"v\"}")
      expect(left(set(one, "k", one)).message).toBe("Cannot set field: value holds Number, expected Object")
    }))

  it.effect("removes fields and ignores absent ones", () =>
    Effect.sync(() => {
      const root = parse("{\"a\":1,\"b\":2}")
      right(removeField(root, "a"))
      right(removeField(root, "zzz"))
      expect(toCompactString(root)).toBe("{\"b\":2}")
    }))

  it.effect("lists entries in key order", () =>
    Effect.sync(() => {
      const root = parse("{\"b\":true,\"a\":null}")
      const keys = right(entries(root)).map(([key]) => key)
      expect(keys).toEqual(["a", "b"])
    }))
})

describe("container operations", () => {
  it.effect("size counts elements or fields", () =>
    Effect.sync(() => {
      expect(right(size(parse("[1,2,3]")))).toBe(3)
      expect(right(size(parse("{\"a\":1}")))).toBe(1)
      expect(left(size(string("abc"))).message).toBe("Cannot take size: value holds String, expected Array or Object")
    }))

  it.effect("clear empties arrays and objects", () =>
    Effect.sync(() => {
      const list = parse("[1,2]")
      const record = parse("{\"a\":1}")
      right(clear(list))
      right(clear(record))
      expect(toCompactString(list)).toBe("[]")
      expect(toCompactString(record)).toBe("{}")
      expect(left(clear(jsonNull()))._tag).toBe("KindMismatch")
    }))

  it.effect("elements returns a snapshot of the items", () =>
    Effect.sync(() => {
      const list = parse("[1,\"a\"]")
      const snapshot = right(elements(list))
      right(pop(list))
      expect(snapshot.map(toCompactString)).toEqual(["1", "\"a\""])
      expect(left(elements(emptyObject())).message).toBe("Cannot list elements: value holds Object, expected Array")
    }))
})
