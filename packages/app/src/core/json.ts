// CHANGE: plain JSON type used when a parsed tree is handed to ordinary JS code
// WHY: consumers outside the parser work with native arrays and records
// QUOTE(TZ): n/a
// REF: req-json-plain-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v ∈ JsonValue: toJson(v) ∈ Json
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Json is closed under array/object nesting with primitive leaves
// COMPLEXITY: O(1)/O(1)

export type Json =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<Json>
  | { readonly [key: string]: Json }

export type JsonObject = { readonly [key: string]: Json }
