import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { boundedAllocator } from "../../src/core/allocator.js"
import { makeNumber } from "../../src/core/construct.js"
import { makeHeap } from "../../src/core/heap.js"
import { parse } from "../../src/core/parser.js"
import { formatNumber, quoteString, serialize, serializeLine, serializeWith } from "../../src/core/serializer.js"
import { leftOf, rightOf } from "./test-helpers.js"

describe("quoteString", () => {
  it.effect("uses short escapes for quote, backslash and common controls", () =>
    Effect.sync(() => {
      expect(quoteString("a\"b\\c")).toBe("\"a\\\"b\\\\c\"")
      expect(quoteString("\b\f\n\r\t")).toBe("\"\\b\\f\\n\\r\\t\"")
    }))

  it.effect("writes other control characters as lowercase \\u escapes", () =>
    Effect.sync(() => {
      expect(quoteString("\u0001")).toBe("\"\\u0001\"")
      expect(quoteString("\u001f")).toBe("\"\\u001f\"")
      expect(quoteString("\u007f")).toBe("\"\u007f\"")
    }))

  it.effect("leaves slash and non-ASCII text as is", () =>
    Effect.sync(() => {
      expect(quoteString("é😀/")).toBe("\"é😀/\"")
    }))

  it.effect("escapes lone surrogates only", () =>
    Effect.sync(() => {
      expect(quoteString("x\ud800y")).toBe("\"x\\ud800y\"")
      expect(quoteString("\udc00")).toBe("\"\\udc00\"")
      expect(quoteString("\ud83d\ude00\n")).toBe("\"\ud83d\ude00\\n\"")
    }))
})

describe("formatNumber", () => {
  it.effect("prints the shortest round-trip form", () =>
    Effect.sync(() => {
      expect([0, -0, 42, 3.5, 1e3, -0.25, 0.1, 1e21, 1e-7].map(formatNumber)).toEqual([
        "0",
        "-0",
        "42",
        "3.5",
        "1000",
        "-0.25",
        "0.1",
        "1e+21",
        "1e-7"
      ])
    }))

  it.effect("writes non-finite values as null", () =>
    Effect.sync(() => {
      expect([Number.NaN, Number.POSITIVE_INFINITY, Number.NEGATIVE_INFINITY].map(formatNumber)).toEqual([
        "null",
        "null",
        "null"
      ])
      expect(serialize(rightOf(makeNumber(makeHeap(), Number.NaN)))).toBe("null")
    }))
})

describe("serialize", () => {
  it.effect("compact output has no insignificant whitespace", () =>
    Effect.sync(() => {
      const root = rightOf(parse("{ \"a\" : [ 1 , 2 , { \"b\" : null } ] , \"c\" : \"d\" }"))
      expect(serialize(root)).toBe("{\"a\":[1,2,{\"b\":null}],\"c\":\"d\"}")
      expect(serializeLine(root)).toBe("{\"a\":[1,2,{\"b\":null}],\"c\":\"d\"}\n")
    }))

  it.effect("pretty output indents each level and keeps empty containers inline", () =>
    Effect.sync(() => {
      const root = rightOf(parse("{\"a\":[1,{}],\"b\":[]}"))
      expect(serialize(root, { pretty: true })).toBe("{\n  \"a\": [\n    1,\n    {}\n  ],\n  \"b\": []\n}")
      expect(serialize(root, { pretty: true, indent: 4 })).toBe(
        "{\n    \"a\": [\n        1,\n        {}\n    ],\n    \"b\": []\n}"
      )
      expect(serialize(rightOf(parse("[1,2]")), { pretty: true, indent: 0 })).toBe("[\n1,\n2\n]")
    }))

  it.effect("pretty scalars render like compact ones", () =>
    Effect.sync(() => {
      expect(serialize(rightOf(parse("\"x\"")), { pretty: true })).toBe("\"x\"")
      expect(serialize(rightOf(parse("true")), { pretty: true })).toBe("true")
    }))
})

describe("serializeWith", () => {
  it.effect("charges the output to the allocator and returns it", () =>
    Effect.sync(() => {
      const heap = makeHeap(boundedAllocator({ limitBytes: 46 }))
      const root = rightOf(parse("[1]", { heap }))
      expect(heap.usage().liveBytes).toBe(40)
      expect(rightOf(serializeWith(heap, root))).toBe("[1]")
      expect(heap.usage().liveBytes).toBe(40)
      expect(heap.usage().peakBytes).toBe(46)
    }))

  it.effect("fails with AllocationError above the ceiling", () =>
    Effect.sync(() => {
      const heap = makeHeap(boundedAllocator({ limitBytes: 45 }))
      const root = rightOf(parse("[1]", { heap }))
      expect(leftOf(serializeWith(heap, root))).toEqual({
        _tag: "AllocationError",
        requested: 6,
        inUse: 40,
        limit: 45
      })
      expect(heap.usage().liveBytes).toBe(40)
    }))
})
