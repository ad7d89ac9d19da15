import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"
import { expectTypeOf } from "vitest"

import { equals, toNative } from "../../src/core/access.js"
import { boundedAllocator, systemAllocator } from "../../src/core/allocator.js"
import {
  append,
  destroy,
  fromNative,
  makeArray,
  makeNumber,
  makeObject,
  makeString,
  removeMember,
  setMember
} from "../../src/core/construct.js"
import { makeHeap } from "../../src/core/heap.js"
import { parse } from "../../src/core/parser.js"
import { serialize } from "../../src/core/serializer.js"
import type { JsonArray, JsonMember, JsonObject, JsonValue } from "../../src/core/value.js"
import { leftOf, rightOf } from "./test-helpers.js"

const sample = "{\"service\":\"billing\",\"replicas\":3,\"ports\":[80,443],\"env\":{\"TOKEN\":\"test-secret\"}}"

describe("allocators", () => {
  it.effect("bounded allocator refuses reservations above its limit and keeps usage", () =>
    Effect.sync(() => {
      const allocator = boundedAllocator({ limitBytes: 10 })
      expect(Either.isRight(allocator.reserve(6))).toBe(true)
      expect(leftOf(allocator.reserve(5))).toEqual({ _tag: "AllocationError", requested: 5, inUse: 6, limit: 10 })
      expect(allocator.usage()).toEqual({ liveBytes: 6, peakBytes: 6, allocations: 1, releases: 0 })
      allocator.release(6)
      expect(allocator.usage()).toEqual({ liveBytes: 0, peakBytes: 6, allocations: 1, releases: 1 })
    }))

  it.effect("system allocator never refuses", () =>
    Effect.sync(() => {
      const allocator = systemAllocator()
      expect(Either.isRight(allocator.reserve(Number.MAX_SAFE_INTEGER))).toBe(true)
      expect(allocator.limit).toBe(Number.POSITIVE_INFINITY)
    }))
})

describe("heap accounting", () => {
  it.effect("is balanced after a successful parse and destroy", () =>
    Effect.sync(() => {
      const heap = makeHeap()
      const root = rightOf(parse(sample, { heap }))
      expect(heap.usage().liveNodes).toBe(8)
      expect(heap.usage().liveBytes).toBeGreaterThan(0)
      expect(Either.isRight(destroy(heap, root))).toBe(true)
      expect(heap.usage().liveBytes).toBe(0)
      expect(heap.usage().liveNodes).toBe(0)
      expect(heap.isLive(root)).toBe(false)
    }))

  it.effect("is balanced after a failed parse", () =>
    Effect.sync(() => {
      const heap = makeHeap()
      leftOf(parse("{\"a\":[1,2,\"x\"", { heap }))
      expect(heap.usage().liveBytes).toBe(0)
      expect(heap.usage().liveNodes).toBe(0)
      expect(heap.usage().peakBytes).toBeGreaterThan(0)
    }))

  it.effect("aborts a parse that exceeds a bounded allocator", () =>
    Effect.sync(() => {
      const heap = makeHeap(boundedAllocator({ limitBytes: 50 }))
      expect(leftOf(parse("[1,2,3]", { heap }))).toEqual({
        _tag: "AllocationError",
        requested: 16,
        inUse: 40,
        limit: 50
      })
      expect(heap.usage().liveBytes).toBe(0)
      expect(heap.usage().liveNodes).toBe(0)
    }))

  it.effect("releases partial trees when fromNative runs out of memory", () =>
    Effect.sync(() => {
      const heap = makeHeap(boundedAllocator({ limitBytes: 40 }))
      expect(leftOf(fromNative(heap, ["a", "b"]))).toEqual({
        _tag: "AllocationError",
        requested: 8,
        inUse: 34,
        limit: 40
      })
      expect(heap.usage().liveBytes).toBe(0)
    }))

  it.effect("produces identical trees with either allocator", () =>
    Effect.sync(() => {
      const system = rightOf(parse(sample, { heap: makeHeap(systemAllocator()) }))
      const bounded = rightOf(parse(sample, { heap: makeHeap(boundedAllocator({ limitBytes: 1_000_000 })) }))
      expect(equals(system, bounded)).toBe(true)
      expect(serialize(bounded)).toBe(serialize(system))
      expect(serialize(system)).toBe(sample)
    }))
})

describe("ownership", () => {
  it.effect("a value has at most one owner", () =>
    Effect.sync(() => {
      const heap = makeHeap()
      const first = rightOf(makeArray(heap))
      const second = rightOf(makeArray(heap))
      const value = rightOf(makeNumber(heap, 1))
      expect(Either.isRight(append(heap, first, value))).toBe(true)
      const before = heap.usage().liveBytes
      expect(leftOf(append(heap, second, value))).toEqual({
        _tag: "OwnershipError",
        message: "value already belongs to a container"
      })
      expect(heap.usage().liveBytes).toBe(before)
      expect(second.items).toEqual([])
      expect(leftOf(destroy(heap, value))).toEqual({
        _tag: "OwnershipError",
        message: "only the owning container may destroy this value"
      })
    }))

  it.effect("rejects cycles", () =>
    Effect.sync(() => {
      const heap = makeHeap()
      const outer = rightOf(makeArray(heap))
      const inner = rightOf(makeArray(heap))
      expect(leftOf(append(heap, outer, outer))).toEqual({
        _tag: "OwnershipError",
        message: "a container cannot contain itself"
      })
      expect(Either.isRight(append(heap, outer, inner))).toBe(true)
      expect(leftOf(append(heap, inner, outer))).toEqual({
        _tag: "OwnershipError",
        message: "a container cannot contain itself"
      })
    }))

  it.effect("rejects destroyed and foreign values", () =>
    Effect.sync(() => {
      const heap = makeHeap()
      const array = rightOf(makeArray(heap))
      const gone = rightOf(makeNumber(heap, 2))
      expect(Either.isRight(destroy(heap, gone))).toBe(true)
      expect(leftOf(append(heap, array, gone))).toEqual({
        _tag: "OwnershipError",
        message: "value was already destroyed"
      })
      const foreign = rightOf(makeNumber(makeHeap(), 3))
      expect(leftOf(append(heap, array, foreign))).toEqual({
        _tag: "OwnershipError",
        message: "value was not allocated by this heap"
      })
    }))

  it.effect("destroying twice is a no-op", () =>
    Effect.sync(() => {
      const heap = makeHeap()
      const root = rightOf(parse("[1,[2]]", { heap }))
      expect(Either.isRight(destroy(heap, root))).toBe(true)
      const after = heap.usage()
      expect(Either.isRight(destroy(heap, root))).toBe(true)
      expect(heap.usage()).toEqual(after)
    }))

  it.effect("refuses destroyed target containers without leaking", () =>
    Effect.sync(() => {
      const heap = makeHeap()
      const array = rightOf(makeArray(heap))
      const object = rightOf(makeObject(heap))
      expect(Either.isRight(destroy(heap, array))).toBe(true)
      expect(Either.isRight(destroy(heap, object))).toBe(true)
      const n = rightOf(makeNumber(heap, 1))
      const m = rightOf(makeString(heap, "v"))

      const refused = { _tag: "OwnershipError", message: "target container was already destroyed" }
      expect(leftOf(append(heap, array, n))).toEqual(refused)
      expect(leftOf(setMember(heap, object, "k", m))).toEqual(refused)
      expect(heap.usage().liveBytes).toBe(34)

      expect(Either.isRight(destroy(heap, n))).toBe(true)
      expect(Either.isRight(destroy(heap, m))).toBe(true)
      expect(heap.usage().liveBytes).toBe(0)
      expect(heap.usage().liveNodes).toBe(0)
    }))

  it.effect("refuses containers that belong to another heap", () =>
    Effect.sync(() => {
      const heap = makeHeap()
      const other = makeHeap()
      const foreignArray = rightOf(makeArray(other))
      const n = rightOf(makeNumber(heap, 1))
      expect(leftOf(append(heap, foreignArray, n))).toEqual({
        _tag: "OwnershipError",
        message: "target container was not allocated by this heap"
      })
      expect(leftOf(append(other, foreignArray, n))).toEqual({
        _tag: "OwnershipError",
        message: "value was not allocated by this heap"
      })
      expect(foreignArray.items).toEqual([])
      expect(heap.usage().liveBytes).toBe(16)
      expect(other.usage().liveBytes).toBe(16)
    }))

  it.effect("removing from a destroyed object changes nothing", () =>
    Effect.sync(() => {
      const heap = makeHeap()
      const object = rightOf(makeObject(heap))
      expect(Either.isRight(setMember(heap, object, "k", rightOf(makeNumber(heap, 1))))).toBe(true)
      expect(Either.isRight(destroy(heap, object))).toBe(true)
      expect(removeMember(heap, object, "k")).toBe(false)
      expect(heap.usage().liveBytes).toBe(0)
    }))

  it.effect("exposes containers read-only and keeps the mutators off the heap", () =>
    Effect.sync(() => {
      expectTypeOf<JsonArray["items"]>().toEqualTypeOf<ReadonlyArray<JsonValue>>()
      expectTypeOf<JsonObject["members"]>().toEqualTypeOf<ReadonlyArray<JsonMember>>()
      expectTypeOf<JsonMember>().toEqualTypeOf<{ readonly key: string; readonly value: JsonValue }>()
      expect(Object.keys(makeHeap()).sort()).toEqual(["allocator", "isLive", "isOwned", "maxDepth", "usage"])
    }))
})

describe("nesting bound", () => {
  it.effect("tracks container height in both directions", () =>
    Effect.sync(() => {
      const heap = makeHeap(systemAllocator(), { maxDepth: 2 })
      expect(heap.maxDepth).toBe(2)
      const root = rightOf(makeArray(heap))
      const object = rightOf(makeObject(heap))
      expect(Either.isRight(setMember(heap, object, "k", rightOf(makeArray(heap))))).toBe(true)
      expect(leftOf(append(heap, root, object))).toEqual({ _tag: "DepthLimitError", maxDepth: 2 })

      expect(removeMember(heap, object, "k")).toBe(true)
      expect(Either.isRight(append(heap, root, object))).toBe(true)
      expect(leftOf(setMember(heap, object, "deeper", rightOf(makeArray(heap))))).toEqual({
        _tag: "DepthLimitError",
        maxDepth: 2
      })
      expect(Either.isRight(setMember(heap, object, "n", rightOf(makeNumber(heap, 5))))).toBe(true)
      expect(serialize(root)).toBe("[{\"n\":5}]")
    }))

  it.effect("stops hand-built chains at the default bound so walks stay on the stack", () =>
    Effect.sync(() => {
      const heap = makeHeap()
      let current = rightOf(makeArray(heap))
      for (let level = 1; level < 1024; level++) {
        const outer = rightOf(makeArray(heap))
        rightOf(append(heap, outer, current))
        current = outer
      }
      const top = rightOf(makeArray(heap))
      expect(leftOf(append(heap, top, current))).toEqual({ _tag: "DepthLimitError", maxDepth: 1024 })
      expect(serialize(current)).toBe(`${"[".repeat(1024)}${"]".repeat(1024)}`)
      expect(Either.isRight(destroy(heap, current))).toBe(true)
      expect(heap.usage().liveNodes).toBe(1)
      expect(heap.usage().liveBytes).toBe(16)
    }))

  it.effect("fromNative refuses data nested past the heap bound", () =>
    Effect.sync(() => {
      const heap = makeHeap(systemAllocator(), { maxDepth: 2 })
      expect(toNative(rightOf(fromNative(heap, [[1]])))).toEqual([[1]])
      const before = heap.usage().liveBytes
      expect(leftOf(fromNative(heap, [[[1]]]))).toEqual({ _tag: "DepthLimitError", maxDepth: 2 })
      expect(heap.usage().liveBytes).toBe(before)
    }))
})
