// CHANGE: keep a plain JavaScript JSON type for bridging to and from the tree
// WHY: callers build responses from ordinary objects and read documents back as them
// QUOTE(TZ): "Construction helpers for building response documents programmatically"
// REF: req-io-json-1
// SOURCE: n/a
// FORMAT THEOREM: ∀x ∈ Json: toNative(fromNative(x)) ≡ x
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

export type JsonRecord = { readonly [key: string]: Json }
