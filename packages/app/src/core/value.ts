// CHANGE: define the document tree as a closed tagged union
// WHY: every consumer matches on `_tag` and the compiler checks exhaustiveness
// QUOTE(TZ): "A tagged union over exactly six variants"
// REF: req-value-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v ∈ JsonValue: v._tag ∈ {Null, Boolean, Number, String, Array, Object}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: containers own their children; object keys are unique after construction
// COMPLEXITY: O(1)/O(1)

export type ValueTag = "Null" | "Boolean" | "Number" | "String" | "Array" | "Object"

export interface JsonNull {
  readonly _tag: "Null"
}

export interface JsonBoolean {
  readonly _tag: "Boolean"
  readonly value: boolean
}

export interface JsonNumber {
  readonly _tag: "Number"
  readonly value: number
  /**
   * True when the literal had no fraction or exponent part. Kept for
   * consumers only: serialization, `asInteger` and `equals` read `value`.
   */
  readonly integral: boolean
}

export interface JsonString {
  readonly _tag: "String"
  readonly value: string
}

/**
 * Array node. The backing list is only reachable by the heap-aware builders
 * in construct.ts.
 */
export interface JsonArray {
  readonly _tag: "Array"
  readonly items: ReadonlyArray<JsonValue>
}

export interface JsonMember {
  readonly key: string
  readonly value: JsonValue
}

export interface JsonObject {
  readonly _tag: "Object"
  readonly members: ReadonlyArray<JsonMember>
}

export type JsonContainer = JsonArray | JsonObject

export type JsonValue = JsonNull | JsonBoolean | JsonNumber | JsonString | JsonArray | JsonObject

export const isContainer = (value: JsonValue): value is JsonContainer =>
  value._tag === "Array" || value._tag === "Object"

/**
 * Children of a node in document order (member values for objects).
 *
 * @pure true
 * @complexity O(n)
 */
export const childrenOf = (value: JsonValue): ReadonlyArray<JsonValue> => {
  if (value._tag === "Array") {
    return value.items
  }
  if (value._tag === "Object") {
    return value.members.map((member) => member.value)
  }
  return []
}
