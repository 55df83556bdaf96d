import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { append, size } from "../../src/core/access.js"
import { renderError } from "../../src/core/errors.js"
import { isJsonRecord } from "../../src/core/json.js"
import { toCompactString } from "../../src/core/render.js"
import {
  array,
  bool,
  copy,
  float,
  fromJson,
  fromUnknown,
  getBool,
  getFloat,
  getInteger,
  getString,
  integer,
  isNull,
  jsonNull,
  kindOf,
  object,
  string,
  toJson
} from "../../src/core/value.js"
import { left, parse, right } from "./either-helpers.js"

describe("value constructors", () => {
  it.effect("tags each kind", () =>
    Effect.sync(() => {
      expect(kindOf(string("x"))).toBe("String")
      expect(kindOf(right(integer(1)))).toBe("Number")
      expect(kindOf(bool(false))).toBe("Bool")
      expect(kindOf(jsonNull())).toBe("Null")
      expect(kindOf(array())).toBe("Array")
      expect(kindOf(object())).toBe("Object")
      expect(isNull(jsonNull())).toBe(true)
      expect(isNull(string("null"))).toBe(false)
    }))

  it.effect("rejects numbers outside the representable range", () =>
    Effect.sync(() => {
      expect(left(integer(2n ** 63n)).message).toBe("9223372036854775808 does not fit in a signed 64-bit integer")
      expect(left(integer(1.5)).message).toBe("1.5 is not a safe integer")
      expect(left(float(Number.NaN)).message).toBe("NaN is not a finite number")
      expect(left(float(Number.POSITIVE_INFINITY))._tag).toBe("InvalidNumber")
    }))

  it.effect("copies children on construction", () =>
    Effect.sync(() => {
      const inner = array()
      const outer = array([inner])
      right(append(inner, jsonNull()))
      expect(toCompactString(outer)).toBe("[[]]")
    }))

  it.effect("keeps the last value for a repeated key", () =>
    Effect.sync(() => {
      const built = object([["a", right(integer(1))], ["a", right(integer(2))]])
      expect(toCompactString(built)).toBe("{\"a\":2}")
    }))

  it.effect("deep copies are independent", () =>
    Effect.sync(() => {
      const original = parse("[[1]]")
      const duplicate = copy(original)
      right(append(duplicate, bool(true)))
      expect(right(size(original))).toBe(1)
      expect(toCompactString(duplicate)).toBe("[[1],true]")
    }))
})

describe("value accessors", () => {
  it.effect("reads the active payload", () =>
    Effect.sync(() => {
      expect(right(getString(string("hi")))).toBe("hi")
      expect(right(getBool(bool(true)))).toBe(true)
      expect(right(getInteger(right(integer(-7))))).toBe(-7n)
      expect(right(getFloat(right(float(0.5))))).toBe(0.5)
    }))

  it.effect("fails with a kind mismatch on the wrong kind", () =>
    Effect.sync(() => {
      expect(left(getString(bool(true))).message).toBe("Cannot read string: value holds Bool, expected String")
      expect(left(getBool(jsonNull())).message).toBe("Cannot read bool: value holds Null, expected Bool")
      expect(left(getFloat(string("1"))).message).toBe("Cannot read float: value holds String, expected Number")
      expect(left(getInteger(right(float(1.5)))).message).toBe("Number holds Float, cannot read it as Integer")
      expect(left(getFloat(right(integer(1)))).message).toBe("Number holds Integer, cannot read it as Float")
    }))
})

describe("native conversions", () => {
  it.effect("builds trees from JS literals", () =>
    Effect.sync(() => {
      const built = right(fromJson({ b: [1, 2.5, true, null], a: "x", big: 9007199254740993n }))
      expect(toCompactString(built)).toBe("{\"a\":\"x\",\"b\":[1,2.5,true,null],\"big\":9007199254740993}")
      expect(left(fromJson([1, Number.NaN]))._tag).toBe("InvalidNumber")
    }))

  it.effect("converts back to JS literals", () =>
    Effect.sync(() => {
      expect(toJson(parse("{\"n\":9223372036854775807,\"f\":1.0,\"s\":\"x\",\"l\":[null,false]}"))).toEqual({
        f: 1,
        l: [null, false],
        n: 9223372036854775807n,
        s: "x"
      })
    }))

  it.effect("keeps a __proto__ key as an own field", () =>
    Effect.sync(() => {
      const converted = toJson(parse("{\"__proto__\":{\"x\":1}}"))
      if (!isJsonRecord(converted)) {
        throw new Error("expected an object")
      }
      expect(Object.keys(converted)).toEqual(["__proto__"])
      expect(Object.getPrototypeOf(converted)).toBe(Object.prototype)
      expect(Object.getOwnPropertyDescriptor(converted, "__proto__")?.value).toEqual({ x: 1n })
    }))

  it.effect("checks unknown input and names the failing path", () =>
    Effect.sync(() => {
      const error = left(fromUnknown({ a: [1, undefined] }))
      expect(error).toEqual({
        _tag: "InvalidInput",
        path: ".a[1]",
        message: "cannot convert undefined to a JSON value"
      })
      expect(renderError(error)).toBe(".a[1]: cannot convert undefined to a JSON value")
    }))

  it.effect("rejects cycles and class instances", () =>
    Effect.sync(() => {
      const cyclic: Record<string, unknown> = {}
      cyclic["self"] = cyclic
      expect(left(fromUnknown(cyclic))).toEqual({
        _tag: "InvalidInput",
        path: ".self",
        message: "cyclic structure cannot be converted to a JSON value"
      })
      const dateError = left(fromUnknown(new Date(0)))
      expect(renderError(dateError)).toBe("only plain objects can be converted to a JSON object")
    }))

  it.effect("accepts shared but acyclic references", () =>
    Effect.sync(() => {
      const shared = { k: 1 }
      expect(toCompactString(right(fromUnknown([shared, shared])))).toBe("[{\"k\":1},{\"k\":1}]")
    }))
})
