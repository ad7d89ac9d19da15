import { Match } from "effect"
import * as Either from "effect/Either"

import type { CliCommand } from "./cli.js"
import type { BuildError } from "./construct.js"
import { destroy, fromNative } from "./construct.js"
import type { AppError, EngineError, Position } from "./errors.js"
import { makeHeap } from "./heap.js"
import type { Json } from "./json.js"
import { serialize } from "./serializer.js"
import type { FileFailure, FileOutcome, Report } from "./types.js"

// CHANGE: build run reports and render errors, human text and JSON
// WHY: keep reporting pure and deterministic across CLI commands
// QUOTE(TZ): "check ... prints per-file result"
// REF: req-report-1
// SOURCE: n/a
// FORMAT THEOREM: ∀o: buildReport(c, o).stats.checked = |o|
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: report.files keeps the order of the command line
// COMPLEXITY: O(n)

const at = (position: Position): string => `at line ${position.line}, column ${position.column}`

/**
 * One-line description of an engine error.
 *
 * @pure true
 */
export const describeEngineError = (error: EngineError): string =>
  Match.value(error).pipe(
    Match.tag("SyntaxError", (value) => `${value.message} ${at(value.position)}`),
    Match.tag("TrailingDataError", (value) => `${value.message} ${at(value.position)}`),
    Match.tag("DepthLimitError", (value) =>
      value.position === undefined
        ? `Nesting deeper than ${value.maxDepth} levels`
        : `Nesting deeper than ${value.maxDepth} levels ${at(value.position)}`),
    Match.tag(
      "AllocationError",
      (value) =>
        `Memory limit of ${value.limit} bytes exceeded (requested ${value.requested}, in use ${value.inUse})`
    ),
    Match.tag("TypeMismatchError", (value) => `Expected ${value.expected} but found ${value.actual}`),
    Match.tag("OwnershipError", (value) => value.message),
    Match.exhaustive
  )

export const describeFailure = (failure: FileFailure): string =>
  Match.value(failure).pipe(
    Match.tag("DocumentError", (value) => describeEngineError(value.error)),
    Match.tag("InputTooLarge", (value) => `File is ${value.size} bytes, above the limit of ${value.limit}`),
    Match.tag("FileError", (value) => value.message),
    Match.exhaustive
  )

/**
 * Message printed on stderr when a run aborts.
 *
 * @pure true
 */
export const describeAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", (value) => value.message),
    Match.tag("ConfigError", (value) => `Invalid config: ${value.message}`),
    Match.tag("FileError", (value) => value.message),
    Match.tag("InputTooLarge", (value) => `${value.path}: ${describeFailure(value)}`),
    Match.tag("DocumentError", (value) => `${value.path}: ${describeFailure(value)}`),
    Match.exhaustive
  )

const positionOf = (failure: FileFailure): Position | undefined => {
  if (failure._tag !== "DocumentError") {
    return undefined
  }
  const error = failure.error
  return "position" in error ? error.position : undefined
}

/**
 * Build a Report from per-file outcomes.
 *
 * @pure true
 * @invariant stats.passed + stats.failed = stats.checked
 * @complexity O(n)
 */
export const buildReport = (command: CliCommand, files: ReadonlyArray<FileOutcome>): Report => {
  const failed = files.filter((file) => file._tag === "FileFailed").length
  return {
    command,
    files,
    stats: { checked: files.length, passed: files.length - failed, failed }
  }
}

const formatOutcome = (outcome: FileOutcome): string =>
  outcome._tag === "FileOk"
    ? `ok   ${outcome.path} (${outcome.stats.nodes} values)`
    : `FAIL ${outcome.path}: ${describeFailure(outcome.failure)}`

/**
 * Render a human-readable report.
 *
 * @param report - Report data.
 * @returns Multi-line string for stdout.
 *
 * @pure true
 * @complexity O(n)
 */
export const renderHumanReport = (report: Report): string =>
  [
    ...report.files.map(formatOutcome),
    `${report.stats.passed} of ${report.stats.checked} files valid`
  ].join("\n")

const failureToJson = (failure: FileFailure): Json => {
  const tag = failure._tag === "DocumentError" ? failure.error._tag : failure._tag
  const position = positionOf(failure)
  return {
    tag,
    message: describeFailure(failure),
    ...(position === undefined ? {} : { offset: position.offset, line: position.line, column: position.column })
  }
}

const outcomeToJson = (outcome: FileOutcome): Json =>
  outcome._tag === "FileOk"
    ? {
      path: outcome.path,
      ok: true,
      inputBytes: outcome.stats.inputBytes,
      values: outcome.stats.nodes,
      peakBytes: outcome.stats.peakBytes
    }
    : { path: outcome.path, ok: false, error: failureToJson(outcome.failure) }

/**
 * Render report as JSON text through the document engine.
 *
 * @param report - Report data.
 * @returns Pretty JSON with two-space indent.
 *
 * @pure true
 * @invariant parse(output) reproduces the report fields
 * @complexity O(n)
 */
export const renderJsonReport = (report: Report): Either.Either<string, BuildError> => {
  const heap = makeHeap()
  const native: Json = {
    command: report.command,
    files: report.files.map(outcomeToJson),
    stats: { checked: report.stats.checked, passed: report.stats.passed, failed: report.stats.failed }
  }
  return Either.flatMap(fromNative(heap, native), (root) => {
    const text = serialize(root, { pretty: true, indent: 2 })
    return Either.map(destroy(heap, root), () => text)
  })
}
