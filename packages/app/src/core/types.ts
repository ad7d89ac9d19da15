import type { CliCommand } from "./cli.js"
import type { DocumentError, FileError, InputTooLarge } from "./errors.js"

// CHANGE: define per-file outcomes and the run report
// WHY: keep IO-free data structures reusable across CLI commands and tests
// QUOTE(TZ): "check exits 0 when every file parses, 1 otherwise; prints per-file result"
// REF: req-report-types-1
// SOURCE: n/a
// FORMAT THEOREM: ∀r ∈ Report: r.stats.passed + r.stats.failed = r.stats.checked
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: FileOutcome._tag ∈ {"FileOk","FileFailed"}
// COMPLEXITY: O(1)/O(1)

export type FileFailure = DocumentError | InputTooLarge | FileError

export interface DocumentStats {
  readonly inputBytes: number
  readonly nodes: number
  readonly peakBytes: number
}

export interface FileOk {
  readonly _tag: "FileOk"
  readonly path: string
  readonly stats: DocumentStats
  /** Serialized document for format/minify; undefined for check. */
  readonly output: string | undefined
}

export interface FileFailed {
  readonly _tag: "FileFailed"
  readonly path: string
  readonly failure: FileFailure
}

export type FileOutcome = FileOk | FileFailed

export interface RunStats {
  readonly checked: number
  readonly passed: number
  readonly failed: number
}

export interface Report {
  readonly command: CliCommand
  readonly files: ReadonlyArray<FileOutcome>
  readonly stats: RunStats
}
