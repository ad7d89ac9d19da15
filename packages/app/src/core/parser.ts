import * as Either from "effect/Either"

import { append, makeArray, makeBoolean, makeNull, makeNumber, makeObject, makeString, putMemberAt } from "./construct.js"
import type { BuildError } from "./construct.js"
import type { AllocationError, ParseError } from "./errors.js"
import { depthLimitError, positionAt, syntaxError, trailingDataError } from "./errors.js"
import type { Heap } from "./heap.js"
import { ledgerOf, makeHeap } from "./heap.js"
import type { Conformance, ScanFailure } from "./scanner.js"
import { classify, scanLiteral, scanNumber, skipWhitespace } from "./scanner.js"
import { decodeString } from "./string-literal.js"
import type { JsonArray, JsonObject, JsonValue } from "./value.js"

// CHANGE: implement strict recursive-descent parsing into an owned tree
// WHY: one call frame per nesting level, no partial tree on failure
// QUOTE(TZ): "The parser is strict and non-recovering"
// REF: req-parser-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s: parse(s) = Left(e) → usage(heap) after = usage(heap) before
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: depth(tree) ≤ maxDepth
// COMPLEXITY: O(n) where n = input length

export const DEFAULT_MAX_DEPTH = 512

export interface ParseOptions {
  readonly heap?: Heap
  readonly maxDepth?: number
  readonly conformance?: Conformance
}

interface Context {
  readonly input: string
  readonly heap: Heap
  readonly maxDepth: number
  readonly conformance: Conformance
}

interface Parsed<A extends JsonValue> {
  readonly node: A
  readonly end: number
}

type Failure =
  | { readonly _tag: "Scan"; readonly reason: string; readonly offset: number }
  | { readonly _tag: "Depth"; readonly offset: number }
  | AllocationError

type Step<A extends JsonValue> = Either.Either<Parsed<A>, Failure>

const fail = (reason: string, offset: number): Either.Either<never, Failure> =>
  Either.left({ _tag: "Scan", reason, offset })

const fromScan = (failure: ScanFailure): Failure => ({ _tag: "Scan", ...failure })

const fromBuild = (error: BuildError, offset: number): Failure => {
  switch (error._tag) {
    case "AllocationError":
      return error
    case "DepthLimitError":
      return { _tag: "Depth", offset }
    case "OwnershipError":
      return { _tag: "Scan", reason: error.message, offset }
  }
}

const at = <A extends JsonValue>(
  built: Either.Either<A, AllocationError>,
  end: number
): Step<A> => Either.map(built, (node) => ({ node, end }))

const describe = (input: string, offset: number): string => {
  const char = input.charAt(offset)
  return char.length === 0 ? "end of input" : `'${char}'`
}

const parseString = (ctx: Context, offset: number): Step<JsonValue> => {
  const decoded = decodeString(ctx.input, offset, ctx.conformance)
  if (Either.isLeft(decoded)) {
    return Either.left(fromScan(decoded.left))
  }
  return at(makeString(ctx.heap, decoded.right.value), decoded.right.end)
}

const parseNumber = (ctx: Context, offset: number): Step<JsonValue> => {
  const scanned = scanNumber(ctx.input, offset, ctx.conformance)
  if (Either.isLeft(scanned)) {
    return Either.left(fromScan(scanned.left))
  }
  const token = scanned.right
  return at(makeNumber(ctx.heap, token.value, token.integral), token.end)
}

const parseLiteral = (ctx: Context, offset: number): Step<JsonValue> => {
  const scanned = scanLiteral(ctx.input, offset)
  if (Either.isLeft(scanned)) {
    return Either.left(fromScan(scanned.left))
  }
  const token = scanned.right
  if (token.kind === "null") {
    return at(makeNull(ctx.heap), token.end)
  }
  return at(makeBoolean(ctx.heap, token.kind === "true"), token.end)
}

/**
 * Fail the container being built, releasing everything it already owns.
 */
const abandon = (ctx: Context, container: JsonValue, failure: Failure): Step<never> => {
  ledgerOf(ctx.heap).teardown(container)
  return Either.left(failure)
}

const parseArray = (ctx: Context, offset: number, depth: number): Step<JsonArray> => {
  if (depth > ctx.maxDepth) {
    return Either.left({ _tag: "Depth", offset })
  }
  const arrayEither = makeArray(ctx.heap)
  if (Either.isLeft(arrayEither)) {
    return Either.left(arrayEither.left)
  }
  const array = arrayEither.right
  let cursor = skipWhitespace(ctx.input, offset + 1)
  if (classify(ctx.input, cursor) === "ArrayEnd") {
    return Either.right({ node: array, end: cursor + 1 })
  }
  for (;;) {
    const child = parseValue(ctx, cursor, depth)
    if (Either.isLeft(child)) {
      return abandon(ctx, array, child.left)
    }
    const appended = append(ctx.heap, array, child.right.node)
    if (Either.isLeft(appended)) {
      ledgerOf(ctx.heap).teardown(child.right.node)
      return abandon(ctx, array, fromBuild(appended.left, cursor))
    }
    cursor = skipWhitespace(ctx.input, child.right.end)
    const next = classify(ctx.input, cursor)
    if (next === "ArrayEnd") {
      return Either.right({ node: array, end: cursor + 1 })
    }
    if (next !== "Comma") {
      const reason = next === "End" ? "Unterminated array" : `Expected ',' or ']' but found ${describe(ctx.input, cursor)}`
      return abandon(ctx, array, { _tag: "Scan", reason, offset: cursor })
    }
    cursor = skipWhitespace(ctx.input, cursor + 1)
  }
}

const parseMember = (
  ctx: Context,
  object: JsonObject,
  keys: Map<string, number>,
  offset: number,
  depth: number
): Either.Either<number, Failure> => {
  const kind = classify(ctx.input, offset)
  if (kind !== "String") {
    return kind === "End"
      ? fail("Unterminated object", offset)
      : fail(`Expected string key but found ${describe(ctx.input, offset)}`, offset)
  }
  const key = decodeString(ctx.input, offset, ctx.conformance)
  if (Either.isLeft(key)) {
    return Either.left(fromScan(key.left))
  }
  const colon = skipWhitespace(ctx.input, key.right.end)
  if (classify(ctx.input, colon) !== "Colon") {
    return fail(`Expected ':' but found ${describe(ctx.input, colon)}`, colon)
  }
  const child = parseValue(ctx, colon + 1, depth)
  if (Either.isLeft(child)) {
    return Either.left(child.left)
  }
  const name = key.right.value
  const put = putMemberAt(ctx.heap, object, name, child.right.node, keys.get(name) ?? -1)
  if (Either.isLeft(put)) {
    ledgerOf(ctx.heap).teardown(child.right.node)
    return Either.left(fromBuild(put.left, offset))
  }
  if (!keys.has(name)) {
    keys.set(name, object.members.length - 1)
  }
  return Either.right(child.right.end)
}

const parseObject = (ctx: Context, offset: number, depth: number): Step<JsonObject> => {
  if (depth > ctx.maxDepth) {
    return Either.left({ _tag: "Depth", offset })
  }
  const objectEither = makeObject(ctx.heap)
  if (Either.isLeft(objectEither)) {
    return Either.left(objectEither.left)
  }
  const object = objectEither.right
  const keys = new Map<string, number>()
  let cursor = skipWhitespace(ctx.input, offset + 1)
  if (classify(ctx.input, cursor) === "ObjectEnd") {
    return Either.right({ node: object, end: cursor + 1 })
  }
  for (;;) {
    const member = parseMember(ctx, object, keys, cursor, depth)
    if (Either.isLeft(member)) {
      return abandon(ctx, object, member.left)
    }
    cursor = skipWhitespace(ctx.input, member.right)
    const next = classify(ctx.input, cursor)
    if (next === "ObjectEnd") {
      return Either.right({ node: object, end: cursor + 1 })
    }
    if (next !== "Comma") {
      const reason = next === "End" ? "Unterminated object" : `Expected ',' or '}' but found ${describe(ctx.input, cursor)}`
      return abandon(ctx, object, { _tag: "Scan", reason, offset: cursor })
    }
    cursor = skipWhitespace(ctx.input, cursor + 1)
  }
}

/**
 * Parse one value starting at `offset` (leading whitespace is skipped).
 *
 * @param depth - Nesting depth of the enclosing container (0 at top level).
 *
 * @pure false
 * @invariant on Left, nothing allocated by this call remains live
 */
const parseValue = (ctx: Context, offset: number, depth: number): Step<JsonValue> => {
  const start = skipWhitespace(ctx.input, offset)
  switch (classify(ctx.input, start)) {
    case "ObjectStart":
      return parseObject(ctx, start, depth + 1)
    case "ArrayStart":
      return parseArray(ctx, start, depth + 1)
    case "String":
      return parseString(ctx, start)
    case "Number":
      return parseNumber(ctx, start)
    case "Literal":
      return parseLiteral(ctx, start)
    case "End":
      return fail("Unexpected end of input", start)
    default:
      return fail(`Unexpected character ${describe(ctx.input, start)}`, start)
  }
}

const toParseError = (ctx: Context, failure: Failure): ParseError => {
  switch (failure._tag) {
    case "Scan":
      return syntaxError(failure.reason, positionAt(ctx.input, failure.offset))
    case "Depth":
      return depthLimitError(ctx.maxDepth, positionAt(ctx.input, failure.offset))
    case "AllocationError":
      return failure
  }
}

const decodeBytes = (bytes: Uint8Array): Either.Either<string, ParseError> =>
  Either.try({
    try: () => new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(bytes),
    catch: () => syntaxError("Invalid UTF-8 input", { offset: 0, line: 1, column: 1 })
  })

/**
 * Parse JSON text into a document tree.
 *
 * @param input - JSON text, or its UTF-8 bytes.
 * @param options - Heap, nesting bound (capped by the heap's own) and conformance mode.
 * @returns Root value owned by the caller, or a single terminal ParseError.
 *
 * @pure false
 * @effect allocator reservations on options.heap
 * @invariant only whitespace may follow the top-level value
 * @complexity O(n)
 */
export const parse = (
  input: string | Uint8Array,
  options: ParseOptions = {}
): Either.Either<JsonValue, ParseError> => {
  const textEither: Either.Either<string, ParseError> = typeof input === "string"
    ? Either.right(input)
    : decodeBytes(input)
  if (Either.isLeft(textEither)) {
    return Either.left(textEither.left)
  }
  const text = textEither.right
  const heap = options.heap ?? makeHeap()
  const ctx: Context = {
    input: text,
    heap,
    maxDepth: Math.min(options.maxDepth ?? DEFAULT_MAX_DEPTH, heap.maxDepth),
    conformance: options.conformance ?? "lenient"
  }
  const parsed = parseValue(ctx, 0, 0)
  if (Either.isLeft(parsed)) {
    return Either.left(toParseError(ctx, parsed.left))
  }
  const end = skipWhitespace(text, parsed.right.end)
  if (end < text.length) {
    ledgerOf(ctx.heap).teardown(parsed.right.node)
    return Either.left(trailingDataError(positionAt(text, end)))
  }
  return Either.right(parsed.right.node)
}
