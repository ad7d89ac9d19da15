import * as Either from "effect/Either"

import type { AllocationError } from "./errors.js"
import type { Heap } from "./heap.js"
import { CHAR_BYTES } from "./heap.js"
import type { JsonValue } from "./value.js"

// CHANGE: render document trees as canonical or indented JSON text
// WHY: the single egress of the engine; string escaping and number formatting are total
// QUOTE(TZ): "Produces a compact (no extraneous whitespace) textual form"
// REF: req-serializer-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: parse(serialize(v)) ≡ v for finite numbers
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: pretty and compact output differ only in insignificant whitespace
// COMPLEXITY: O(n) where n = tree size

export interface SerializeOptions {
  readonly pretty?: boolean
  /** Spaces per nesting level in pretty mode. */
  readonly indent?: number
}

export const DEFAULT_INDENT = 2

const shortEscapes: Readonly<Record<string, string>> = {
  "\"": "\\\"",
  "\\": "\\\\",
  "\b": "\\b",
  "\f": "\\f",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t"
}

// Control characters, quote, backslash and surrogate code units.
const NEEDS_ESCAPE = /["\\\u0000-\u001f\ud800-\udfff]/u

const hex4 = (code: number): string => `\\u${code.toString(16).padStart(4, "0")}`

const isHighSurrogate = (code: number): boolean => code >= 0xd800 && code <= 0xdbff

const isLowSurrogate = (code: number): boolean => code >= 0xdc00 && code <= 0xdfff

const escapeSlow = (value: string): string => {
  let out = ""
  for (let index = 0; index < value.length; index++) {
    const char = value.charAt(index)
    const code = value.charCodeAt(index)
    const short = shortEscapes[char]
    if (short !== undefined) {
      out += short
    } else if (code < 0x20) {
      out += hex4(code)
    } else if (isHighSurrogate(code) && isLowSurrogate(value.charCodeAt(index + 1))) {
      out += value.slice(index, index + 2)
      index++
    } else if (isHighSurrogate(code) || isLowSurrogate(code)) {
      out += hex4(code)
    } else {
      out += char
    }
  }
  return out
}

/**
 * Quote and escape a string payload.
 *
 * Lone surrogate code units are written as `\uXXXX` so the output is valid UTF-8.
 *
 * @pure true
 * @complexity O(k)
 */
export const quoteString = (value: string): string => {
  // The unicode-flag regex sees whole code points, so paired surrogates never match.
  if (!NEEDS_ESCAPE.test(value)) {
    return `"${value}"`
  }
  return `"${escapeSlow(value)}"`
}

/**
 * Shortest text that reads back as the same double; `null` for NaN and ±Infinity.
 *
 * @pure true
 */
export const formatNumber = (value: number): string => {
  if (!Number.isFinite(value)) {
    return "null"
  }
  if (Object.is(value, -0)) {
    return "-0"
  }
  return String(value)
}

const renderCompact = (value: JsonValue): string => {
  switch (value._tag) {
    case "Null":
      return "null"
    case "Boolean":
      return value.value ? "true" : "false"
    case "Number":
      return formatNumber(value.value)
    case "String":
      return quoteString(value.value)
    case "Array":
      return `[${value.items.map(renderCompact).join(",")}]`
    case "Object":
      return `{${value.members.map((member) => `${quoteString(member.key)}:${renderCompact(member.value)}`).join(",")}}`
  }
}

const renderPretty = (value: JsonValue, unit: string, level: number): string => {
  if (value._tag === "Array" && value.items.length > 0) {
    const inner = unit.repeat(level + 1)
    const items = value.items.map((item) => inner + renderPretty(item, unit, level + 1))
    return `[\n${items.join(",\n")}\n${unit.repeat(level)}]`
  }
  if (value._tag === "Object" && value.members.length > 0) {
    const inner = unit.repeat(level + 1)
    const members = value.members.map((member) =>
      `${inner}${quoteString(member.key)}: ${renderPretty(member.value, unit, level + 1)}`
    )
    return `{\n${members.join(",\n")}\n${unit.repeat(level)}}`
  }
  return renderCompact(value)
}

/**
 * Serialize a value.
 *
 * @param value - Tree to render.
 * @param options - `pretty` inserts newlines and `indent` spaces per level.
 * @returns JSON text without a trailing line break.
 *
 * @pure true
 * @invariant never fails for a tree built by this engine
 * @complexity O(n)
 */
export const serialize = (value: JsonValue, options: SerializeOptions = {}): string => {
  if (options.pretty !== true) {
    return renderCompact(value)
  }
  const width = Math.max(0, Math.floor(options.indent ?? DEFAULT_INDENT))
  return renderPretty(value, " ".repeat(width), 0)
}

/**
 * Serialize a value followed by exactly one line break.
 *
 * @pure true
 */
export const serializeLine = (value: JsonValue, options: SerializeOptions = {}): string =>
  `${serialize(value, options)}\n`

/**
 * Serialize while charging the output buffer to the heap's allocator.
 *
 * The reservation is returned to the allocator once the text is handed over.
 *
 * @returns AllocationError when the output would exceed the allocator ceiling.
 *
 * @pure false
 * @effect one reserve/release pair on heap.allocator
 */
export const serializeWith = (
  heap: Heap,
  value: JsonValue,
  options: SerializeOptions = {}
): Either.Either<string, AllocationError> => {
  const text = serialize(value, options)
  const bytes = text.length * CHAR_BYTES
  return Either.map(heap.allocator.reserve(bytes), () => {
    heap.allocator.release(bytes)
    return text
  })
}
