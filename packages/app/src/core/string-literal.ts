import * as Either from "effect/Either"

import type { Conformance, ScanFailure } from "./scanner.js"

// CHANGE: decode quoted string literals into complete string payloads
// WHY: nodes never hold escaped or partially decoded text
// QUOTE(TZ): "A String payload is always a complete, already-unescaped sequence"
// REF: req-string-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s: decode(encode(s)) = s
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: any invalid escape fails the whole literal
// COMPLEXITY: O(k) where k = literal length

export interface StringToken {
  readonly value: string
  /** Offset just past the closing quote. */
  readonly end: number
}

const CHAR_QUOTE = 0x22
const CHAR_BACKSLASH = 0x5c

const simpleEscapes: Readonly<Record<string, string>> = {
  "\"": "\"",
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t"
}

const HEX_PATTERN = /^[0-9a-fA-F]{4}$/u

const decodeUnicodeEscape = (input: string, offset: number): Either.Either<string, ScanFailure> => {
  const digits = input.slice(offset, offset + 4)
  if (!HEX_PATTERN.test(digits)) {
    return Either.left({ reason: "Invalid unicode escape", offset: offset - 2 })
  }
  return Either.right(String.fromCharCode(Number.parseInt(digits, 16)))
}

/**
 * Decode the string literal whose opening quote is at `offset`.
 *
 * @param conformance - Strict mode rejects raw control characters.
 * @returns Decoded value and the offset after the closing quote.
 *
 * @pure true
 * @invariant result.end > offset
 * @complexity O(k)
 */
export const decodeString = (
  input: string,
  offset: number,
  conformance: Conformance
): Either.Either<StringToken, ScanFailure> => {
  const parts: Array<string> = []
  let runStart = offset + 1
  let index = runStart
  while (index < input.length) {
    const code = input.charCodeAt(index)
    if (code === CHAR_QUOTE) {
      parts.push(input.slice(runStart, index))
      return Either.right({ value: parts.join(""), end: index + 1 })
    }
    if (code < 0x20 && conformance === "strict") {
      return Either.left({ reason: "Unescaped control character in string", offset: index })
    }
    if (code !== CHAR_BACKSLASH) {
      index++
      continue
    }
    parts.push(input.slice(runStart, index))
    const escape = input.charAt(index + 1)
    if (escape === "u") {
      const decoded = decodeUnicodeEscape(input, index + 2)
      if (Either.isLeft(decoded)) {
        return Either.left(decoded.left)
      }
      parts.push(decoded.right)
      index += 6
    } else {
      const replacement = simpleEscapes[escape]
      if (replacement === undefined) {
        return Either.left({ reason: "Invalid escape sequence", offset: index })
      }
      parts.push(replacement)
      index += 2
    }
    runStart = index
  }
  return Either.left({ reason: "Unterminated string", offset })
}
