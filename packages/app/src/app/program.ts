import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Logger, LogLevel, Match } from "effect"
import type * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { DEFAULT_CONFIG_PATH, resolveConfig } from "../core/config.js"
import type { ProcessedDocument } from "../core/document.js"
import { processDocument } from "../core/document.js"
import { type AppError, documentError } from "../core/errors.js"
import { buildReport, describeFailure, renderHumanReport, renderJsonReport } from "../core/report.js"
import type { FileFailure, FileOutcome, Report } from "../core/types.js"
import { loadConfigFile } from "../shell/config-file.js"
import { readDocument, writeDocument } from "../shell/documents.js"

// CHANGE: orchestrate CLI commands with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// QUOTE(TZ): "jsontree check|format|minify <file...>"
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: run(argv) returns exitCode ∈ {0,1}
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: report emitted at most once; files are processed in argument order
// COMPLEXITY: O(n) where n = total input size

export interface ProgramResult {
  readonly report: Report
  readonly exitCode: number
}

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const writeStderr = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stderr.write(`${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const fileOk = (path: string, processed: ProcessedDocument): FileOutcome => ({
  _tag: "FileOk",
  path,
  stats: processed.stats,
  output: processed.output
})

const fileFailed = (path: string, failure: FileFailure): FileOutcome => ({
  _tag: "FileFailed",
  path,
  failure
})

const processFile = (
  cli: CliArgs,
  config: ResolvedConfig,
  path: string
): Effect.Effect<FileOutcome, never, FileSystemService> =>
  Effect.gen(function*(_) {
    const bytes = yield* _(readDocument(path, config.maxInputBytes))
    const processed = yield* _(
      fromEither(processDocument(cli.command, bytes, config)).pipe(
        Effect.mapError((error) => documentError(path, error))
      )
    )
    if (cli.write && processed.output !== undefined) {
      yield* _(writeDocument(path, processed.output))
      yield* _(Effect.logDebug("rewrote file"))
    }
    yield* _(Effect.logDebug(`parsed ${processed.stats.nodes} values, peak ${processed.stats.peakBytes} bytes`))
    return fileOk(path, processed)
  }).pipe(
    Effect.catchAll((failure) =>
      Effect.as(Effect.logDebug(describeFailure(failure)), fileFailed(path, failure))
    ),
    Effect.annotateLogs("file", path)
  )

const emitCheckReport = (cli: CliArgs, report: Report): Effect.Effect<void, AppError> => {
  if (cli.silent) {
    return Effect.void
  }
  if (!cli.json) {
    return writeStdout(renderHumanReport(report))
  }
  return fromEither(renderJsonReport(report)).pipe(
    Effect.mapError((error) => documentError("<report>", error)),
    Effect.flatMap(writeStdout)
  )
}

const emitDocuments = (cli: CliArgs, report: Report): Effect.Effect<void> =>
  Effect.forEach(report.files, (outcome) => {
    if (outcome._tag === "FileFailed") {
      return writeStderr(`${outcome.path}: ${describeFailure(outcome.failure)}`)
    }
    if (cli.write || cli.silent || outcome.output === undefined) {
      return Effect.void
    }
    return writeStdout(outcome.output)
  }, { discard: true })

const emit = (cli: CliArgs, report: Report): Effect.Effect<void, AppError> =>
  Match.value(cli.command).pipe(
    Match.when("check", () => emitCheckReport(cli, report)),
    Match.when("format", () => emitDocuments(cli, report)),
    Match.when("minify", () => emitDocuments(cli, report)),
    Match.exhaustive
  )

const executeCommand = (
  cli: CliArgs
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const configFile = yield* _(
      loadConfigFile(cli.configPath ?? DEFAULT_CONFIG_PATH, cli.configPathExplicit)
    )
    const config = resolveConfig(cli, configFile)
    yield* _(
      Effect.logDebug(
        `config conformance=${config.conformance} maxDepth=${config.maxDepth} ` +
          `maxInputBytes=${config.maxInputBytes} memoryLimitBytes=${config.memoryLimitBytes}`
      )
    )
    const outcomes = yield* _(
      Effect.forEach(cli.files, (path) => processFile(cli, config, path), { concurrency: 1 })
    )
    const report = buildReport(cli.command, outcomes)
    yield* _(emit(cli, report))
    if (report.stats.failed > 0) {
      yield* _(Effect.logWarning(`${report.stats.failed} of ${report.stats.checked} files failed`))
    }
    return { report, exitCode: report.stats.failed > 0 ? 1 : 0 }
  })

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with report and exit code.
 *
 * @pure false
 * @effect FileSystem, stdout, stderr
 * @invariant exitCode is deterministic for fixed inputs
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    return yield* _(
      executeCommand(cli).pipe(
        Logger.withMinimumLogLevel(cli.verbose ? LogLevel.Debug : LogLevel.Warning)
      )
    )
  })
