// CHANGE: public library surface of json-value
// WHY: consumers import one module; CORE and SHELL stay separately testable
// QUOTE(TZ): "A public library entry point re-exports the CORE and SHELL APIs"
// REF: req-index-1
// SOURCE: n/a
// FORMAT THEOREM: n/a
// PURITY: CORE + SHELL (re-exports only)
// EFFECT: n/a
// INVARIANT: the CLI modules are not re-exported
// COMPLEXITY: O(1)

export {
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
} from "./core/access.js"
export { compare, equals, greaterThan, greaterThanOrEqual, lessThan, lessThanOrEqual } from "./core/compare.js"
export type {
  AccessError,
  EmptyArray,
  EmptyInput,
  IndexOutOfRange,
  InvalidInput,
  InvalidNumber,
  JsonError,
  Kind,
  KindMismatch,
  MissingKey,
  NumberKind,
  NumberKindMismatch,
  ParseError,
  ValueError
} from "./core/errors.js"
export { renderError } from "./core/errors.js"
export type { Json } from "./core/json.js"
export type { NumberRepr } from "./core/number.js"
export { compareNumbers, INTEGER_MAX, INTEGER_MIN, NumberOrder } from "./core/number.js"
export type { ParseOptions } from "./core/parse.js"
export { DEFAULT_MAX_DEPTH, MAX_DEPTH_LIMIT, parseFromString } from "./core/parse.js"
export type { OutputFormat } from "./core/render.js"
export { DEFAULT_INDENT, renderAs, toCompactString, toIndentedString } from "./core/render.js"
export type { JsonArray, JsonBool, JsonNull, JsonNumber, JsonObject, JsonString, Key, Value } from "./core/value.js"
export {
  array,
  bool,
  compareCodePoints,
  copy,
  emptyObject,
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
} from "./core/value.js"
export type { WriteOptions } from "./shell/json-file.js"
export { readJsonFile, writeJsonFile } from "./shell/json-file.js"
export { parseFromStream } from "./shell/json-stream.js"
