import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { isWhitespace, makeCursor, peek, peekNonWhitespace, read, readCount } from "../../src/core/cursor.js"

describe("cursor", () => {
  it.effect("reads forward and reports end of input", () =>
    Effect.sync(() => {
      const cursor = makeCursor("ab")
      expect(peek(cursor)).toBe("a")
      expect(read(cursor)).toBe("a")
      expect(read(cursor)).toBe("b")
      expect(read(cursor)).toBeUndefined()
      expect(cursor.index).toBe(2)
    }))

  it.effect("readCount stops at the end", () =>
    Effect.sync(() => {
      const cursor = makeCursor("nul")
      expect(readCount(cursor, 4)).toBe("nul")
      expect(cursor.index).toBe(3)
    }))

  it.effect("skips only JSON whitespace", () =>
    Effect.sync(() => {
      const cursor = makeCursor(" \t\r\n\fx")
      expect(peekNonWhitespace(cursor)).toBe("\f")
      expect(cursor.index).toBe(4)
      expect(isWhitespace("\v")).toBe(false)
    }))
})
