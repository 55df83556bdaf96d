import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { parseCliArgs } from "../../src/core/cli.js"
import { resolveConfig } from "../../src/core/config.js"
import { right } from "./either-helpers.js"

const cli = (...args: ReadonlyArray<string>) => right(parseCliArgs(["node", "json-value", ...args]))

describe("resolveConfig", () => {
  it.effect("falls back to defaults", () =>
    Effect.sync(() => {
      expect(resolveConfig(cli(), undefined)).toEqual({ indent: "\t", format: "indented", maxDepth: 512 })
    }))

  it.effect("applies the config file when flags are absent", () =>
    Effect.sync(() => {
      expect(resolveConfig(cli(), { indent: "  ", compact: true, maxDepth: 10 })).toEqual({
        indent: "  ",
        format: "compact",
        maxDepth: 10
      })
    }))

  it.effect("lets flags and explicit commands win over the file", () =>
    Effect.sync(() => {
      const file = { indent: "  ", compact: true, maxDepth: 10 }
      expect(resolveConfig(cli("format", "--indent", "tab", "--max-depth", "3"), file)).toEqual({
        indent: "\t",
        format: "indented",
        maxDepth: 3
      })
      expect(resolveConfig(cli("compact"), { compact: false }).format).toBe("compact")
    }))
})
