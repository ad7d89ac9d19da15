import * as Either from "effect/Either"

import type { AllocationError, DepthLimitError, OwnershipError } from "./errors.js"
import { depthLimitError, ownershipError } from "./errors.js"
import type { Heap } from "./heap.js"
import { ledgerOf } from "./heap.js"
import type { Json, JsonRecord } from "./json.js"
import type {
  JsonArray,
  JsonBoolean,
  JsonNull,
  JsonNumber,
  JsonObject,
  JsonString,
  JsonValue
} from "./value.js"

// CHANGE: provide heap-aware constructors and container mutators
// WHY: response documents are built programmatically with the same accounting as parsed ones
// QUOTE(TZ): "object/array builders with append operations"
// REF: req-construct-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c,v: append(c, v) = Right → owner(v) = c ∧ last(c) = v
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a failed mutation leaves the container and allocator usage unchanged
// COMPLEXITY: O(1) per leaf, O(n) per member lookup

export type BuildError = AllocationError | OwnershipError | DepthLimitError

interface MutableMember {
  readonly key: string
  value: JsonValue
}

// Writable views of container contents; nodes only expose them read-only.
const arrayItems = new WeakMap<JsonArray, Array<JsonValue>>()
const objectMembers = new WeakMap<JsonObject, Array<MutableMember>>()

const notBuiltHere = (): OwnershipError => ownershipError("target container was not allocated by this heap")

export const makeNull = (heap: Heap): Either.Either<JsonNull, AllocationError> =>
  ledgerOf(heap).register({ _tag: "Null" })

export const makeBoolean = (heap: Heap, value: boolean): Either.Either<JsonBoolean, AllocationError> =>
  ledgerOf(heap).register({ _tag: "Boolean", value })

/**
 * Build a number node. `integral` defaults to whether the value is an integer.
 *
 * @pure false
 * @invariant non-finite values are accepted and serialize as null
 */
export const makeNumber = (
  heap: Heap,
  value: number,
  integral: boolean = Number.isInteger(value)
): Either.Either<JsonNumber, AllocationError> => ledgerOf(heap).register({ _tag: "Number", value, integral })

export const makeString = (heap: Heap, value: string): Either.Either<JsonString, AllocationError> =>
  ledgerOf(heap).register({ _tag: "String", value })

export const makeArray = (heap: Heap): Either.Either<JsonArray, AllocationError> => {
  const items: Array<JsonValue> = []
  return Either.map(ledgerOf(heap).register<JsonArray>({ _tag: "Array", items }), (array) => {
    arrayItems.set(array, items)
    return array
  })
}

export const makeObject = (heap: Heap): Either.Either<JsonObject, AllocationError> => {
  const members: Array<MutableMember> = []
  return Either.map(ledgerOf(heap).register<JsonObject>({ _tag: "Object", members }), (object) => {
    objectMembers.set(object, members)
    return object
  })
}

/**
 * Move `value` to the end of `array`.
 *
 * @returns OwnershipError when `value` already has an owner or was destroyed,
 * or when `array` is not a live container of `heap`.
 *
 * @pure false
 * @invariant array.items grows by exactly one on success
 */
export const append = (heap: Heap, array: JsonArray, value: JsonValue): Either.Either<void, BuildError> => {
  const items = arrayItems.get(array)
  if (items === undefined) {
    return Either.left(notBuiltHere())
  }
  const ledger = ledgerOf(heap)
  const reserved = ledger.reserveSlot(0)
  if (Either.isLeft(reserved)) {
    return Either.left(reserved.left)
  }
  const adopted = ledger.adopt(value, array)
  if (Either.isLeft(adopted)) {
    ledger.releaseSlot(0)
    return Either.left(adopted.left)
  }
  items.push(value)
  return Either.right(undefined)
}

/**
 * Put `value` under `key`, replacing the member at `index` when it is ≥ 0.
 * The replaced value is torn down; a new key is appended at the end.
 *
 * @pure false
 * @invariant member positions never move
 */
export const putMemberAt = (
  heap: Heap,
  object: JsonObject,
  key: string,
  value: JsonValue,
  index: number
): Either.Either<void, BuildError> => {
  const members = objectMembers.get(object)
  if (members === undefined) {
    return Either.left(notBuiltHere())
  }
  const ledger = ledgerOf(heap)
  const existing = index >= 0 ? members[index] : undefined
  if (existing === undefined) {
    const reserved = ledger.reserveSlot(key.length)
    if (Either.isLeft(reserved)) {
      return Either.left(reserved.left)
    }
    const adopted = ledger.adopt(value, object)
    if (Either.isLeft(adopted)) {
      ledger.releaseSlot(key.length)
      return Either.left(adopted.left)
    }
    members.push({ key, value })
    return Either.right(undefined)
  }
  const adopted = ledger.adopt(value, object)
  if (Either.isLeft(adopted)) {
    return Either.left(adopted.left)
  }
  ledger.teardown(existing.value)
  existing.value = value
  ledger.shrink(object)
  return Either.right(undefined)
}

export const indexOfKey = (object: JsonObject, key: string): number =>
  object.members.findIndex((member) => member.key === key)

/**
 * Insert or overwrite `key` in `object` (last write wins, position kept).
 *
 * @pure false
 * @invariant keys in object.members stay unique
 */
export const setMember = (
  heap: Heap,
  object: JsonObject,
  key: string,
  value: JsonValue
): Either.Either<void, BuildError> => putMemberAt(heap, object, key, value, indexOfKey(object, key))

/**
 * Remove `key` from `object` and destroy its value.
 *
 * @returns true when a member was removed; false for a missing key or a
 * container that is not live in `heap`.
 */
export const removeMember = (heap: Heap, object: JsonObject, key: string): boolean => {
  const members = objectMembers.get(object)
  const index = indexOfKey(object, key)
  const member = members?.[index]
  if (members === undefined || member === undefined || !heap.isLive(object)) {
    return false
  }
  const ledger = ledgerOf(heap)
  members.splice(index, 1)
  ledger.teardown(member.value)
  ledger.releaseSlot(member.key.length)
  ledger.shrink(object)
  return true
}

/**
 * Destroy a root value and everything it owns.
 *
 * @returns OwnershipError when the value still belongs to a container.
 *
 * @pure false
 * @invariant destroying twice is a no-op
 */
export const destroy = (heap: Heap, value: JsonValue): Either.Either<void, OwnershipError> => {
  if (heap.isOwned(value)) {
    return Either.left(ownershipError("only the owning container may destroy this value"))
  }
  ledgerOf(heap).teardown(value)
  return Either.right(undefined)
}

const isJsonArray = (value: Json): value is ReadonlyArray<Json> => Array.isArray(value)

const buildArray = (
  heap: Heap,
  values: ReadonlyArray<Json>,
  level: number
): Either.Either<JsonValue, BuildError> => {
  const arrayEither = makeArray(heap)
  if (Either.isLeft(arrayEither)) {
    return Either.left(arrayEither.left)
  }
  const array = arrayEither.right
  const ledger = ledgerOf(heap)
  for (const entry of values) {
    const child = buildNode(heap, entry, level)
    const appended = Either.flatMap(child, (node) => append(heap, array, node))
    if (Either.isLeft(appended)) {
      if (Either.isRight(child)) {
        ledger.teardown(child.right)
      }
      ledger.teardown(array)
      return Either.left(appended.left)
    }
  }
  return Either.right(array)
}

const buildObject = (
  heap: Heap,
  record: JsonRecord,
  level: number
): Either.Either<JsonValue, BuildError> => {
  const objectEither = makeObject(heap)
  if (Either.isLeft(objectEither)) {
    return Either.left(objectEither.left)
  }
  const object = objectEither.right
  const ledger = ledgerOf(heap)
  for (const [key, entry] of Object.entries(record)) {
    const child = buildNode(heap, entry, level)
    const put = Either.flatMap(child, (node) => putMemberAt(heap, object, key, node, -1))
    if (Either.isLeft(put)) {
      if (Either.isRight(child)) {
        ledger.teardown(child.right)
      }
      ledger.teardown(object)
      return Either.left(put.left)
    }
  }
  return Either.right(object)
}

const buildNode = (heap: Heap, value: Json, level: number): Either.Either<JsonValue, BuildError> => {
  if (value === null) {
    return makeNull(heap)
  }
  if (typeof value === "boolean") {
    return makeBoolean(heap, value)
  }
  if (typeof value === "number") {
    return makeNumber(heap, value)
  }
  if (typeof value === "string") {
    return makeString(heap, value)
  }
  if (level >= heap.maxDepth) {
    return Either.left(depthLimitError(heap.maxDepth))
  }
  return isJsonArray(value) ? buildArray(heap, value, level + 1) : buildObject(heap, value, level + 1)
}

/**
 * Build a tree from plain JavaScript JSON data.
 *
 * @param heap - Heap that accounts every created node.
 * @param value - Plain JSON data (object key order is preserved).
 * @returns Root node, or the first build failure with nothing left allocated.
 *
 * @pure false
 * @invariant containers nested deeper than heap.maxDepth fail with DepthLimitError
 * @complexity O(n)
 */
export const fromNative = (heap: Heap, value: Json): Either.Either<JsonValue, BuildError> => buildNode(heap, value, 0)
