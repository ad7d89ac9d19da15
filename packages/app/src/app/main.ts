#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, Logger } from "effect"

import { describeAppError } from "../core/report.js"
import { runCli } from "./program.js"

// CHANGE: wire CLI program into Node runtime with proper teardown
// WHY: execute effects with platform services and typed error handling
// QUOTE(TZ): "Argument errors exit 1 with a message on stderr."
// REF: req-main-1
// SOURCE: n/a
// FORMAT THEOREM: runMain(program) terminates with exitCode from ProgramResult
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext>
// INVARIANT: stdout carries documents and reports only; logs go to stderr
// COMPLEXITY: O(1)

const StderrLogger = Logger.replace(Logger.defaultLogger, Logger.withConsoleError(Logger.logfmtLogger))

const main = Effect.gen(function*(_) {
  const exitCode = yield* _(
    runCli(process.argv).pipe(
      Effect.map((result) => result.exitCode),
      Effect.catchAll((error) =>
        Effect.as(
          Effect.sync(() => {
            process.stderr.write(`jsontree: ${describeAppError(error)}\n`)
          }),
          1
        )
      )
    )
  )
  if (exitCode !== 0) {
    yield* _(
      Effect.sync(() => {
        process.exitCode = exitCode
      })
    )
  }
})

NodeRuntime.runMain(main.pipe(Effect.provide(NodeContext.layer), Effect.provide(StderrLogger)))
