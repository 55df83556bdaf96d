import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import {
  compare,
  equals,
  greaterThan,
  greaterThanOrEqual,
  lessThan,
  lessThanOrEqual
} from "../../src/core/compare.js"
import { bool, compareCodePoints, float, integer, jsonNull, string } from "../../src/core/value.js"
import { left, parse, right } from "./either-helpers.js"

describe("equals", () => {
  it.effect("compares trees structurally", () =>
    Effect.sync(() => {
      expect(equals(parse("[1,{\"a\":null}]"), parse("[ 1, { \"a\" : null } ]"))).toBe(true)
      expect(equals(parse("{\"a\":1}"), parse("{\"a\":1,\"b\":2}"))).toBe(false)
      expect(equals(parse("{\"a\":1}"), parse("{\"b\":1}"))).toBe(false)
      expect(equals(parse("[1,2]"), parse("[2,1]"))).toBe(false)
      expect(equals(jsonNull(), bool(false))).toBe(false)
      expect(equals(string("1"), right(integer(1)))).toBe(false)
    }))

  it.effect("widens numbers of different kinds", () =>
    Effect.sync(() => {
      expect(equals(parse("1"), parse("1.0"))).toBe(true)
      expect(equals(parse("1"), parse("1.5"))).toBe(false)
    }))
})

describe("ordering", () => {
  it.effect("orders strings by code point and numbers by value", () =>
    Effect.sync(() => {
      expect(right(lessThan(string("a"), string("b")))).toBe(true)
      expect(right(lessThan(string("B"), string("a")))).toBe(true)
      expect(right(lessThan(right(integer(1)), right(float(1.5))))).toBe(true)
      expect(right(greaterThanOrEqual(right(integer(2)), right(float(2))))).toBe(true)
      expect(right(lessThanOrEqual(right(float(3.5)), right(integer(3))))).toBe(false)
      expect(right(compare(string("x"), string("x")))).toBe(0)
    }))

  it.effect("places astral characters after the rest of the BMP", () =>
    Effect.sync(() => {
      expect(right(lessThan(string("\u{FF01}"), string("\u{1F600}")))).toBe(true)
      expect(right(compare(string("\u{1F600}"), string("\u{FF01}")))).toBe(1)
      expect(compareCodePoints("\u{FF01}", "\u{1F600}")).toBe(-1)
      expect(compareCodePoints("a\u{1F600}", "a\u{1F600}b")).toBe(-1)
      expect(compareCodePoints("\u{1F600}", "\u{1F600}")).toBe(0)
    }))

  it.effect("keeps full precision between large integers", () =>
    Effect.sync(() => {
      expect(right(greaterThan(parse("9223372036854775807"), parse("9223372036854775806")))).toBe(true)
    }))

  it.effect("fails for unordered kind pairs", () =>
    Effect.sync(() => {
      expect(left(compare(string("a"), right(integer(1))))).toEqual({
        _tag: "KindMismatch",
        operation: "compare",
        expected: ["String"],
        actual: "Number",
        message: "Cannot compare: value holds Number, expected String"
      })
      expect(left(lessThan(bool(true), bool(false))).message).toBe(
        "Cannot compare with <: value holds Bool, expected String or Number"
      )
      expect(left(greaterThan(parse("[]"), parse("[]"))).operation).toBe("compare with >")
    }))
})
