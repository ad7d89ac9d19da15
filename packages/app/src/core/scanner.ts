import * as Either from "effect/Either"

// CHANGE: classify the next token from a cursor without building nodes
// WHY: the builder dispatches on a token class and only scans what it needs
// QUOTE(TZ): "classifies the next token class from raw text ... without allocating"
// REF: req-scanner-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s,i: classify(s, skipWhitespace(s, i)) ≠ Whitespace
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: scan functions never move the cursor backwards
// COMPLEXITY: O(k) where k = token length

export type Conformance = "lenient" | "strict"

export type TokenClass =
  | "ObjectStart"
  | "ObjectEnd"
  | "ArrayStart"
  | "ArrayEnd"
  | "Colon"
  | "Comma"
  | "String"
  | "Number"
  | "Literal"
  | "End"
  | "Invalid"

export interface ScanFailure {
  readonly reason: string
  readonly offset: number
}

export interface NumberToken {
  readonly end: number
  readonly value: number
  readonly integral: boolean
}

export type LiteralKind = "true" | "false" | "null"

export interface LiteralToken {
  readonly end: number
  readonly kind: LiteralKind
}

const CHAR_SPACE = 0x20
const CHAR_TAB = 0x09
const CHAR_LF = 0x0a
const CHAR_CR = 0x0d
const CHAR_ZERO = 0x30
const CHAR_NINE = 0x39

export const isWhitespace = (code: number): boolean =>
  code === CHAR_SPACE || code === CHAR_TAB || code === CHAR_LF || code === CHAR_CR

export const isDigit = (code: number): boolean => code >= CHAR_ZERO && code <= CHAR_NINE

export const skipWhitespace = (input: string, offset: number): number => {
  let index = offset
  while (index < input.length && isWhitespace(input.charCodeAt(index))) {
    index++
  }
  return index
}

const structural: Readonly<Record<string, TokenClass>> = {
  "{": "ObjectStart",
  "}": "ObjectEnd",
  "[": "ArrayStart",
  "]": "ArrayEnd",
  ":": "Colon",
  ",": "Comma",
  "\"": "String",
  "-": "Number",
  t: "Literal",
  f: "Literal",
  n: "Literal"
}

/**
 * Classify the token starting at `offset`.
 *
 * @pure true
 * @invariant End iff offset ≥ input.length
 */
export const classify = (input: string, offset: number): TokenClass => {
  if (offset >= input.length) {
    return "End"
  }
  if (isDigit(input.charCodeAt(offset))) {
    return "Number"
  }
  return structural[input.charAt(offset)] ?? "Invalid"
}

const literals: ReadonlyArray<LiteralKind> = ["true", "false", "null"]

/**
 * Match `true`, `false` or `null` exactly at `offset`.
 *
 * @pure true
 */
export const scanLiteral = (input: string, offset: number): Either.Either<LiteralToken, ScanFailure> => {
  for (const kind of literals) {
    if (input.startsWith(kind, offset)) {
      return Either.right({ end: offset + kind.length, kind })
    }
  }
  return Either.left({ reason: "Invalid literal", offset })
}

const skipDigits = (input: string, offset: number): number => {
  let index = offset
  while (index < input.length && isDigit(input.charCodeAt(index))) {
    index++
  }
  return index
}

const requireDigits = (
  input: string,
  offset: number,
  reason: string
): Either.Either<number, ScanFailure> => {
  const end = skipDigits(input, offset)
  return end === offset ? Either.left({ reason, offset }) : Either.right(end)
}

const scanIntegerPart = (
  input: string,
  offset: number,
  conformance: Conformance
): Either.Either<number, ScanFailure> => {
  if (input.charCodeAt(offset) === CHAR_ZERO) {
    const next = offset + 1
    if (next < input.length && isDigit(input.charCodeAt(next))) {
      return conformance === "strict"
        ? Either.left({ reason: "Leading zeros are not allowed", offset })
        : Either.right(skipDigits(input, next))
    }
    return Either.right(next)
  }
  return requireDigits(input, offset, "Expected digit")
}

/**
 * Scan a number literal: `-? int (. digits)? ([eE] [+-]? digits)?`.
 *
 * @param conformance - In strict mode a leading zero followed by digits is rejected.
 * @returns Token with parsed value and whether it had no fraction or exponent.
 *
 * @pure true
 * @complexity O(k)
 */
export const scanNumber = (
  input: string,
  offset: number,
  conformance: Conformance
): Either.Either<NumberToken, ScanFailure> => {
  const start = input.charAt(offset) === "-" ? offset + 1 : offset
  const intEnd = scanIntegerPart(input, start, conformance)
  if (Either.isLeft(intEnd)) {
    return Either.left(intEnd.left)
  }
  let end = intEnd.right
  let integral = true
  if (input.charAt(end) === ".") {
    const fraction = requireDigits(input, end + 1, "Expected digit after decimal point")
    if (Either.isLeft(fraction)) {
      return Either.left(fraction.left)
    }
    end = fraction.right
    integral = false
  }
  const marker = input.charAt(end)
  if (marker === "e" || marker === "E") {
    const sign = input.charAt(end + 1)
    const digitsStart = sign === "+" || sign === "-" ? end + 2 : end + 1
    const exponent = requireDigits(input, digitsStart, "Expected digit in exponent")
    if (Either.isLeft(exponent)) {
      return Either.left(exponent.left)
    }
    end = exponent.right
    integral = false
  }
  return Either.right({ end, value: Number(input.slice(offset, end)), integral })
}
