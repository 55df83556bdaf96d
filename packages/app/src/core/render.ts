import { renderNumber } from "./number.js"
import type { JsonArray, JsonObject, Value } from "./value.js"

// CHANGE: serialize value trees to compact and indented JSON text
// WHY: both forms must re-parse to an equal tree with deterministic key order
// QUOTE(TZ): "two pure functions from a Value tree to text — compact and indented"
// REF: req-render-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: parse(toCompactString(v)) = v ∧ parse(toIndentedString(v, i)) = v
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: strings are emitted raw, exactly as stored
// COMPLEXITY: O(n)

export const DEFAULT_INDENT = "\t"

type Scalar = Exclude<Value, JsonArray | JsonObject>

const renderScalar = (value: Scalar): string => {
  switch (value._tag) {
    case "String":
      return `"${value.value}"`
    case "Number":
      return renderNumber(value.repr)
    case "Bool":
      return value.value ? "true" : "false"
    case "Null":
      return "null"
  }
}

/**
 * Render without any inserted whitespace.
 *
 * @pure true
 * @invariant object pairs appear in ascending key order
 * @complexity O(n)
 */
export const toCompactString = (value: Value): string => {
  switch (value._tag) {
    case "Array":
      return `[${value.items.map(toCompactString).join(",")}]`
    case "Object": {
      const pairs: Array<string> = []
      for (const [key, child] of value.fields) {
        pairs.push(`"${key}":${toCompactString(child)}`)
      }
      return `{${pairs.join(",")}}`
    }
    default:
      return renderScalar(value)
  }
}

const wrapLines = (
  open: string,
  close: string,
  lines: ReadonlyArray<string>,
  indentation: string
): string => lines.length === 0 ? open + close : `${open}\n${lines.join(",\n")}\n${indentation}${close}`

const renderIndented = (value: Value, indentation: string, indent: string): string => {
  const inner = indentation + indent
  switch (value._tag) {
    case "Array":
      return wrapLines(
        "[",
        "]",
        value.items.map((item) => inner + renderIndented(item, inner, indent)),
        indentation
      )
    case "Object": {
      const lines: Array<string> = []
      for (const [key, child] of value.fields) {
        lines.push(`${inner}"${key}" : ${renderIndented(child, inner, indent)}`)
      }
      return wrapLines("{", "}", lines, indentation)
    }
    default:
      return renderScalar(value)
  }
}

/**
 * Render with one newline per element and one indent unit per nesting level.
 *
 * @param indent - Unit repeated once per level (defaults to one tab).
 *
 * @pure true
 * @invariant empty containers render as "[]" / "{}"
 * @complexity O(n · depth)
 */
export const toIndentedString = (value: Value, indent: string = DEFAULT_INDENT): string =>
  renderIndented(value, "", indent)

export type OutputFormat = "compact" | "indented"

export const renderAs = (value: Value, format: OutputFormat, indent: string = DEFAULT_INDENT): string =>
  format === "compact" ? toCompactString(value) : toIndentedString(value, indent)
