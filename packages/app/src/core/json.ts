// CHANGE: describe native JS data accepted as literal syntax for building values
// WHY: nested arrays/objects can be written inline instead of through repeated append/set calls
// QUOTE(TZ): "initializer-list literal syntax for both Array and Object"
// REF: req-json-literal-1
// SOURCE: n/a
// FORMAT THEOREM: ∀x ∈ Json: fromJson(x) = Right(v) → toJson(v) ≅ x
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Json is closed under array/object nesting with primitive leaves
// COMPLEXITY: O(1)/O(1)

export type Json =
  | null
  | boolean
  | number
  | bigint
  | string
  | ReadonlyArray<Json>
  | { readonly [key: string]: Json }

export type JsonRecord = { readonly [key: string]: Json }

export const isJsonRecord = (value: Json): value is JsonRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value)
