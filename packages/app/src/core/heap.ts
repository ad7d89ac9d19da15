import * as Either from "effect/Either"

import type { Allocator, AllocatorUsage } from "./allocator.js"
import { systemAllocator } from "./allocator.js"
import type { AllocationError, DepthLimitError, OwnershipError } from "./errors.js"
import { depthLimitError, ownershipError } from "./errors.js"
import type { JsonContainer, JsonValue } from "./value.js"
import { childrenOf, isContainer } from "./value.js"

// CHANGE: track ownership and accounting of every node behind an explicit handle
// WHY: nodes are attached to exactly one container and released exactly once
// QUOTE(TZ): "A Value node has exactly one owner"
// REF: req-heap-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: released(v) ≤ 1 ∧ |owners(v)| ≤ 1
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: liveBytes(allocator) = Σ size(v) for live v in this heap ∧ depth(tree) ≤ maxDepth
// COMPLEXITY: O(1) per operation, O(n) per teardown

export const NODE_BYTES = 16
export const SLOT_BYTES = 8
export const CHAR_BYTES = 2

/** Deepest container nesting any heap accepts; keeps every recursive walk within the call stack. */
export const MAX_TREE_DEPTH = 1024

type Owner = JsonContainer | "root"

export interface HeapUsage extends AllocatorUsage {
  readonly liveNodes: number
}

export interface HeapOptions {
  /** Container nesting bound for trees in this heap (capped at MAX_TREE_DEPTH). */
  readonly maxDepth?: number
}

export const LedgerId: unique symbol = Symbol("jsontree/HeapLedger")

/**
 * Mutating side of a heap. Only the builders and the parser reach it; the
 * package entry point does not export `LedgerId`.
 */
export interface HeapLedger {
  /** Account for a freshly built node; the node starts as an unowned root. */
  readonly register: <V extends JsonValue>(value: V) => Either.Either<V, AllocationError>
  readonly reserveSlot: (keyLength: number) => Either.Either<void, AllocationError>
  readonly releaseSlot: (keyLength: number) => void
  /** Record `child` as owned by `parent`, a live container of this heap. */
  readonly adopt: (
    child: JsonValue,
    parent: JsonContainer
  ) => Either.Either<void, OwnershipError | DepthLimitError>
  /** Recompute the nesting height of `container` after a child was removed. */
  readonly shrink: (container: JsonContainer) => void
  /** Recursive bottom-up release. Already released nodes are skipped. */
  readonly teardown: (value: JsonValue) => void
}

export interface Heap {
  readonly [LedgerId]: HeapLedger
  readonly allocator: Allocator
  readonly maxDepth: number
  readonly isOwned: (value: JsonValue) => boolean
  readonly isLive: (value: JsonValue) => boolean
  readonly usage: () => HeapUsage
}

export const ledgerOf = (heap: Heap): HeapLedger => heap[LedgerId]

/**
 * Payload size of a node excluding its container slots.
 *
 * @pure true
 */
export const payloadBytes = (value: JsonValue): number =>
  value._tag === "String" ? NODE_BYTES + value.value.length * CHAR_BYTES : NODE_BYTES

export const slotBytes = (keyLength: number): number => SLOT_BYTES + keyLength * CHAR_BYTES

const ownedSlotBytes = (value: JsonValue): number => {
  if (value._tag === "Array") {
    return value.items.length * SLOT_BYTES
  }
  if (value._tag === "Object") {
    let total = 0
    for (const member of value.members) {
      total += slotBytes(member.key.length)
    }
    return total
  }
  return 0
}

/**
 * Create a heap bound to an allocator strategy.
 *
 * @param allocator - Strategy used for every reservation (defaults to a fresh system allocator).
 * @param options - Nesting bound for the trees built in this heap.
 *
 * @pure false
 * @invariant swapping the allocator never changes the shape of built trees
 */
export const makeHeap = (allocator: Allocator = systemAllocator(), options: HeapOptions = {}): Heap => {
  const maxDepth = Math.max(1, Math.min(MAX_TREE_DEPTH, Math.floor(options.maxDepth ?? MAX_TREE_DEPTH)))
  const owners = new WeakMap<JsonValue, Owner>()
  const released = new WeakSet<JsonValue>()
  // Container nesting height: 1 for an empty container, leaves count 0.
  const heights = new WeakMap<JsonContainer, number>()
  let liveNodes = 0

  const heightOf = (value: JsonValue): number => isContainer(value) ? heights.get(value) ?? 1 : 0

  const register = <V extends JsonValue>(value: V): Either.Either<V, AllocationError> =>
    Either.map(allocator.reserve(payloadBytes(value)), () => {
      owners.set(value, "root")
      liveNodes++
      return value
    })

  const reserveSlot = (keyLength: number): Either.Either<void, AllocationError> =>
    allocator.reserve(slotBytes(keyLength))

  const releaseSlot = (keyLength: number): void => {
    allocator.release(slotBytes(keyLength))
  }

  const grow = (parent: JsonContainer, childHeight: number): void => {
    let height = childHeight + 1
    let current: Owner | undefined = parent
    while (current !== undefined && current !== "root" && heightOf(current) < height) {
      heights.set(current, height)
      height++
      current = owners.get(current)
    }
  }

  const shrink = (container: JsonContainer): void => {
    let current: Owner | undefined = container
    while (current !== undefined && current !== "root") {
      const height = 1 + childrenOf(current).reduce((max, child) => Math.max(max, heightOf(child)), 0)
      if (height === heightOf(current)) {
        return
      }
      heights.set(current, height)
      current = owners.get(current)
    }
  }

  const adopt = (
    child: JsonValue,
    parent: JsonContainer
  ): Either.Either<void, OwnershipError | DepthLimitError> => {
    if (released.has(parent)) {
      return Either.left(ownershipError("target container was already destroyed"))
    }
    if (!owners.has(parent)) {
      return Either.left(ownershipError("target container was not allocated by this heap"))
    }
    if (released.has(child)) {
      return Either.left(ownershipError("value was already destroyed"))
    }
    const owner = owners.get(child)
    if (owner === undefined) {
      return Either.left(ownershipError("value was not allocated by this heap"))
    }
    if (owner !== "root") {
      return Either.left(ownershipError("value already belongs to a container"))
    }
    let levels = 0
    let current: Owner | undefined = parent
    while (current !== undefined && current !== "root") {
      if (current === child) {
        return Either.left(ownershipError("a container cannot contain itself"))
      }
      levels++
      current = owners.get(current)
    }
    const childHeight = heightOf(child)
    if (levels + childHeight > maxDepth) {
      return Either.left(depthLimitError(maxDepth))
    }
    owners.set(child, parent)
    grow(parent, childHeight)
    return Either.right(undefined)
  }

  const teardown = (value: JsonValue): void => {
    if (released.has(value) || !owners.has(value)) {
      return
    }
    for (const child of childrenOf(value)) {
      teardown(child)
    }
    allocator.release(payloadBytes(value) + ownedSlotBytes(value))
    owners.delete(value)
    released.add(value)
    liveNodes--
  }

  return {
    [LedgerId]: { register, reserveSlot, releaseSlot, adopt, shrink, teardown },
    allocator,
    maxDepth,
    isOwned: (value) => {
      const owner = owners.get(value)
      return owner !== undefined && owner !== "root"
    },
    isLive: (value) => owners.has(value),
    usage: () => ({ ...allocator.usage(), liveNodes })
  }
}
