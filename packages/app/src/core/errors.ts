import type { CliError } from "./cli.js"
import type { ValueTag } from "./value.js"

// CHANGE: unify error algebra for the document engine and the CLI
// WHY: parse, access and allocation failures are values, matched by `_tag`
// QUOTE(TZ): "a result type carrying the error taxonomy"
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export interface Position {
  readonly offset: number
  readonly line: number
  readonly column: number
}

export type JsonSyntaxError = {
  readonly _tag: "SyntaxError"
  readonly message: string
  readonly position: Position
}
export type TrailingDataError = {
  readonly _tag: "TrailingDataError"
  readonly message: string
  readonly position: Position
}
export type DepthLimitError = {
  readonly _tag: "DepthLimitError"
  readonly maxDepth: number
  /** Absent when the bound was hit while building a tree rather than parsing text. */
  readonly position?: Position
}
export type AllocationError = {
  readonly _tag: "AllocationError"
  readonly requested: number
  readonly inUse: number
  readonly limit: number
}
export type TypeMismatchError = {
  readonly _tag: "TypeMismatchError"
  readonly expected: string
  readonly actual: ValueTag
}
export type OwnershipError = { readonly _tag: "OwnershipError"; readonly message: string }

export type ParseError = JsonSyntaxError | TrailingDataError | DepthLimitError | AllocationError

export type EngineError = ParseError | TypeMismatchError | OwnershipError

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type InputTooLarge = {
  readonly _tag: "InputTooLarge"
  readonly path: string
  readonly size: number
  readonly limit: number
}
export type DocumentError = {
  readonly _tag: "DocumentError"
  readonly path: string
  readonly error: EngineError
}

export type AppError =
  | CliError
  | ConfigError
  | FileError
  | InputTooLarge
  | DocumentError

/**
 * Resolve a character offset into a 1-based line/column pair.
 *
 * @pure true
 * @complexity O(offset)
 */
export const positionAt = (input: string, offset: number): Position => {
  let line = 1
  let column = 1
  const end = Math.min(offset, input.length)
  for (let index = 0; index < end; index++) {
    if (input.charCodeAt(index) === 0x0a) {
      line++
      column = 1
    } else {
      column++
    }
  }
  return { offset, line, column }
}

export const syntaxError = (message: string, position: Position): JsonSyntaxError => ({
  _tag: "SyntaxError",
  message,
  position
})

export const trailingDataError = (position: Position): TrailingDataError => ({
  _tag: "TrailingDataError",
  message: "Unexpected data after the top-level value",
  position
})

export const depthLimitError = (maxDepth: number, position?: Position): DepthLimitError =>
  position === undefined ? { _tag: "DepthLimitError", maxDepth } : { _tag: "DepthLimitError", maxDepth, position }

export const allocationError = (requested: number, inUse: number, limit: number): AllocationError => ({
  _tag: "AllocationError",
  requested,
  inUse,
  limit
})

export const typeMismatchError = (expected: string, actual: ValueTag): TypeMismatchError => ({
  _tag: "TypeMismatchError",
  expected,
  actual
})

export const ownershipError = (message: string): OwnershipError => ({
  _tag: "OwnershipError",
  message
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const inputTooLarge = (path: string, size: number, limit: number): InputTooLarge => ({
  _tag: "InputTooLarge",
  path,
  size,
  limit
})

export const documentError = (path: string, error: EngineError): DocumentError => ({
  _tag: "DocumentError",
  path,
  error
})
