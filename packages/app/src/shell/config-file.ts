import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import { pipe } from "effect/Function"

import { toNative } from "../core/access.js"
import { MAX_DEPTH_LIMIT, MAX_INDENT } from "../core/cli.js"
import type { FileConfig } from "../core/config.js"
import { destroy } from "../core/construct.js"
import type { AppError } from "../core/errors.js"
import { configError, fileError } from "../core/errors.js"
import { makeHeap } from "../core/heap.js"
import type { Json } from "../core/json.js"
import { parse } from "../core/parser.js"
import { describeEngineError } from "../core/report.js"

// CHANGE: decode .jsontree.json with the engine and schema validation
// WHY: keep boundary data typed and reject invalid config early
// QUOTE(TZ): "Config file ./.jsontree.json (optional unless --config is given explicitly)"
// REF: req-config-file-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c: decode(c) = Right(cfg) → cfg fields have correct types and ranges
// PURITY: SHELL
// EFFECT: Effect<FileConfig | undefined, AppError, FileSystem>
// INVARIANT: missing config yields undefined
// COMPLEXITY: O(n)

const RawConfigSchema = S.partial(
  S.Struct({
    conformance: S.Literal("lenient", "strict"),
    maxDepth: S.Int.pipe(S.between(1, MAX_DEPTH_LIMIT)),
    maxInputBytes: S.Int.pipe(S.positive()),
    memoryLimitBytes: S.Int.pipe(S.nonNegative()),
    indent: S.Int.pipe(S.between(0, MAX_INDENT))
  })
)

const readJson = (raw: string): Either.Either<Json, AppError> => {
  const heap = makeHeap()
  return pipe(
    parse(raw, { heap, conformance: "strict" }),
    Either.flatMap((root) => {
      const native = toNative(root)
      return Either.map(destroy(heap, root), () => native)
    }),
    Either.mapLeft((error) => configError(describeEngineError(error)))
  )
}

const decodeConfig = (raw: string): Effect.Effect<FileConfig, AppError> =>
  pipe(
    Effect.flatMap(readJson(raw), (json) =>
      pipe(
        S.decodeUnknown(RawConfigSchema, { onExcessProperty: "error" })(json),
        Effect.mapError((error) => configError(TreeFormatter.formatErrorSync(error)))
      )),
    Effect.map((config) => ({
      ...(config.conformance === undefined ? {} : { conformance: config.conformance }),
      ...(config.maxDepth === undefined ? {} : { maxDepth: config.maxDepth }),
      ...(config.maxInputBytes === undefined ? {} : { maxInputBytes: config.maxInputBytes }),
      ...(config.memoryLimitBytes === undefined ? {} : { memoryLimitBytes: config.memoryLimitBytes }),
      ...(config.indent === undefined ? {} : { indent: config.indent })
    }))
  )

/**
 * Load the optional config file.
 *
 * @param path - Config path (defaults applied by the caller).
 * @param explicit - Whether the path came from --config; a missing explicit file fails.
 *
 * @pure false
 * @effect FileSystem
 */
export const loadConfigFile = (
  path: string,
  explicit: boolean
): Effect.Effect<FileConfig | undefined, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    if (!exists) {
      if (explicit) {
        return yield* _(Effect.fail(fileError(`Config file not found: ${path}`)))
      }
      return
    }
    const contents = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    yield* _(Effect.logDebug(`loaded config from ${path}`))
    return yield* _(decodeConfig(contents))
  })
