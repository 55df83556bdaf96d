// CHANGE: explicit character cursor over an in-memory text buffer
// WHY: parsing routines share one read position by exclusive reference, never through globals
// QUOTE(TZ): "pass an explicit cursor/reader object by exclusive reference"
// REF: req-cursor-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c: 0 ≤ c.index ≤ c.text.length
// PURITY: CORE
// EFFECT: advances cursor.index
// INVARIANT: index only moves forward
// COMPLEXITY: O(1) per character

export interface Cursor {
  readonly text: string
  index: number
}

export const makeCursor = (text: string): Cursor => ({ text, index: 0 })

export const peek = (cursor: Cursor): string | undefined =>
  cursor.index < cursor.text.length ? cursor.text.charAt(cursor.index) : undefined

export const read = (cursor: Cursor): string | undefined => {
  const char = peek(cursor)
  if (char !== undefined) {
    cursor.index += 1
  }
  return char
}

/**
 * Read up to count characters; fewer are returned at end of input.
 *
 * @pure false
 * @complexity O(count)
 */
export const readCount = (cursor: Cursor, count: number): string => {
  const chunk = cursor.text.slice(cursor.index, cursor.index + count)
  cursor.index += chunk.length
  return chunk
}

// form feed and vertical tab are not JSON whitespace
export const isWhitespace = (char: string): boolean =>
  char === " " || char === "\t" || char === "\n" || char === "\r"

export const peekNonWhitespace = (cursor: Cursor): string | undefined => {
  let char = peek(cursor)
  while (char !== undefined && isWhitespace(char)) {
    cursor.index += 1
    char = peek(cursor)
  }
  return char
}
