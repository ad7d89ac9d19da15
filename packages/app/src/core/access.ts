import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { TypeMismatchError } from "./errors.js"
import { typeMismatchError } from "./errors.js"
import type { Json } from "./json.js"
import type { JsonMember, JsonValue, ValueTag } from "./value.js"

// CHANGE: expose typed read access over the document tree
// WHY: consumers read fields without coercion; mismatches are recoverable values
// QUOTE(TZ): "typed getters that fail with a type-mismatch error rather than silently coercing"
// REF: req-access-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v,t: as_t(v) = Right(x) ↔ typeOf(v) = t
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: accessors never mutate the tree
// COMPLEXITY: O(1) for typed getters, O(n) for member lookup

export type PathSegment = string | number

export const typeOf = (value: JsonValue): ValueTag => value._tag

export const isNull = (value: JsonValue): boolean => value._tag === "Null"

export const asBoolean = (value: JsonValue): Either.Either<boolean, TypeMismatchError> =>
  value._tag === "Boolean" ? Either.right(value.value) : Either.left(typeMismatchError("Boolean", value._tag))

export const asNumber = (value: JsonValue): Either.Either<number, TypeMismatchError> =>
  value._tag === "Number" ? Either.right(value.value) : Either.left(typeMismatchError("Number", value._tag))

/**
 * Read a number that is a safe integer.
 *
 * `1e3` qualifies; `3.5` and `1e300` do not.
 *
 * @pure true
 */
export const asInteger = (value: JsonValue): Either.Either<number, TypeMismatchError> => {
  if (value._tag === "Number" && Number.isSafeInteger(value.value)) {
    return Either.right(value.value)
  }
  return Either.left(typeMismatchError("Integer", value._tag))
}

export const asString = (value: JsonValue): Either.Either<string, TypeMismatchError> =>
  value._tag === "String" ? Either.right(value.value) : Either.left(typeMismatchError("String", value._tag))

export const asArray = (value: JsonValue): Either.Either<ReadonlyArray<JsonValue>, TypeMismatchError> =>
  value._tag === "Array" ? Either.right(value.items) : Either.left(typeMismatchError("Array", value._tag))

export const asObject = (value: JsonValue): Either.Either<ReadonlyArray<JsonMember>, TypeMismatchError> =>
  value._tag === "Object" ? Either.right(value.members) : Either.left(typeMismatchError("Object", value._tag))

/**
 * Number of children of a container.
 *
 * @pure true
 */
export const size = (value: JsonValue): Either.Either<number, TypeMismatchError> => {
  if (value._tag === "Array") {
    return Either.right(value.items.length)
  }
  if (value._tag === "Object") {
    return Either.right(value.members.length)
  }
  return Either.left(typeMismatchError("Array or Object", value._tag))
}

/**
 * Look up a member by key.
 *
 * @returns None when the key is absent; TypeMismatchError when `value` is not an Object.
 *
 * @pure true
 * @invariant keys are unique, so at most one member matches
 */
export const getMember = (
  value: JsonValue,
  key: string
): Either.Either<Option.Option<JsonValue>, TypeMismatchError> =>
  Either.map(asObject(value), (members) =>
    Option.map(
      Option.fromNullable(members.find((member) => member.key === key)),
      (member) => member.value
    ))

/**
 * Fetch element `index` of an Array.
 *
 * @returns None when out of bounds.
 *
 * @pure true
 */
export const getIndex = (
  value: JsonValue,
  index: number
): Either.Either<Option.Option<JsonValue>, TypeMismatchError> =>
  Either.map(asArray(value), (items) => Number.isInteger(index) ? Option.fromNullable(items[index]) : Option.none())

/**
 * Follow a path of keys and indexes from `value`.
 *
 * @returns None when any segment is missing or lands on the wrong container.
 *
 * @pure true
 * @complexity O(depth · width)
 */
export const at = (value: JsonValue, path: ReadonlyArray<PathSegment>): Option.Option<JsonValue> => {
  let current: JsonValue = value
  for (const segment of path) {
    const next = typeof segment === "number" ? getIndex(current, segment) : getMember(current, segment)
    if (Either.isLeft(next) || Option.isNone(next.right)) {
      return Option.none()
    }
    current = next.right.value
  }
  return Option.some(current)
}

/**
 * Convert a tree to plain JavaScript data.
 *
 * @pure true
 * @complexity O(n)
 */
export const toNative = (value: JsonValue): Json => {
  switch (value._tag) {
    case "Null":
      return null
    case "Boolean":
    case "Number":
    case "String":
      return value.value
    case "Array":
      return value.items.map(toNative)
    case "Object": {
      const result: Record<string, Json> = {}
      for (const member of value.members) {
        Object.defineProperty(result, member.key, {
          value: toNative(member.value),
          enumerable: true,
          writable: true,
          configurable: true
        })
      }
      return result
    }
  }
}

const itemsEqual = (left: ReadonlyArray<JsonValue>, right: ReadonlyArray<JsonValue>): boolean =>
  left.length === right.length &&
  left.every((item, index) => {
    const other = right[index]
    return other !== undefined && equals(item, other)
  })

const membersEqual = (left: ReadonlyArray<JsonMember>, right: ReadonlyArray<JsonMember>): boolean => {
  if (left.length !== right.length) {
    return false
  }
  const byKey = new Map<string, JsonValue>(right.map((member) => [member.key, member.value]))
  return left.every((member) => {
    const other = byKey.get(member.key)
    return other !== undefined && equals(member.value, other)
  })
}

/**
 * Structural equality. Object member order is ignored; numbers compare with
 * `Object.is`, so `0` and `-0` differ.
 *
 * @pure true
 * @complexity O(n)
 */
export const equals = (left: JsonValue, right: JsonValue): boolean => {
  switch (left._tag) {
    case "Null":
      return right._tag === "Null"
    case "Boolean":
      return right._tag === "Boolean" && left.value === right.value
    case "Number":
      return right._tag === "Number" && Object.is(left.value, right.value)
    case "String":
      return right._tag === "String" && left.value === right.value
    case "Array":
      return right._tag === "Array" && itemsEqual(left.items, right.items)
    case "Object":
      return right._tag === "Object" && membersEqual(left.members, right.members)
  }
}
