import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Option from "effect/Option"

import { asNumber, asString, equals, getMember } from "../../src/core/access.js"
import { fromNative, makeString } from "../../src/core/construct.js"
import { makeHeap } from "../../src/core/heap.js"
import type { Json } from "../../src/core/json.js"
import { parse } from "../../src/core/parser.js"
import { serialize } from "../../src/core/serializer.js"
import { rightOf } from "./test-helpers.js"

const documents: ReadonlyArray<Json> = [
  null,
  false,
  -0,
  "plain",
  [],
  {},
  [1, [2, [3, []]], { deep: { deeper: {} } }],
  { id: "order-17", items: [{ sku: "A-1", qty: 2, price: 9.99 }], note: "line\nbreak \"quoted\"", paid: true },
  { unicode: "é😀\u0000\u001f", slash: "a/b", tiny: 5e-324, huge: 1.7976931348623157e308 }
]

describe("round trip", () => {
  it.effect("parse(serialize(v)) equals v in compact and pretty form", () =>
    Effect.sync(() => {
      const heap = makeHeap()
      for (const document of documents) {
        const tree = rightOf(fromNative(heap, document))
        expect(equals(rightOf(parse(serialize(tree))), tree)).toBe(true)
        expect(equals(rightOf(parse(serialize(tree, { pretty: true, indent: 3 }))), tree)).toBe(true)
      }
    }))

  it.effect("serialization is idempotent", () =>
    Effect.sync(() => {
      const heap = makeHeap()
      for (const document of documents) {
        const once = serialize(rightOf(fromNative(heap, document)))
        expect(serialize(rightOf(parse(once)))).toBe(once)
        const pretty = serialize(rightOf(parse(once)), { pretty: true })
        expect(serialize(rightOf(parse(pretty)), { pretty: true })).toBe(pretty)
      }
    }))

  it.effect("escaping is the inverse of unescaping", () =>
    Effect.sync(() => {
      const heap = makeHeap()
      const samples = ["", "\"", "\\", "\\\"", "\u0000\u0007\b\u001b", "tab\there", "naïve café", "😀", "\ud800", "x\udfffy"]
      for (const sample of samples) {
        const text = serialize(rightOf(makeString(heap, sample)))
        expect(rightOf(asString(rightOf(parse(text))))).toBe(sample)
      }
    }))

  it.effect("number text reads back to the same double", () =>
    Effect.sync(() => {
      const texts = ["0", "-0", "42", "3.5", "1e3", "-2.5E-1", "0.1", "123456789012345680000"]
      const reparsed = texts.map((text) => serialize(rightOf(parse(text))))
      expect(reparsed).toEqual(["0", "-0", "42", "3.5", "1000", "-0.25", "0.1", "123456789012345680000"])
      for (const text of texts) {
        const value = rightOf(asNumber(rightOf(parse(text))))
        expect(Object.is(value, Number(text))).toBe(true)
        expect(Object.is(rightOf(asNumber(rightOf(parse(serialize(rightOf(parse(text))))))), value)).toBe(true)
      }
    }))

  it.effect("a 64 KiB string survives exactly", () =>
    Effect.sync(() => {
      const body = "abcdefgh".repeat(8 * 1024)
      const text = `{"name":"blob","body":"${body}","n":1}`
      const root = rightOf(parse(text))
      const read = Option.getOrThrow(rightOf(getMember(root, "body")))
      expect(rightOf(asString(read)).length).toBe(65_536)
      expect(serialize(root)).toBe(text)
    }))
})
