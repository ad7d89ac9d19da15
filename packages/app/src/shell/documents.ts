import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"

import type { FileError, InputTooLarge } from "../core/errors.js"
import { fileError, inputTooLarge } from "../core/errors.js"

// CHANGE: read and write document files with a byte ceiling
// WHY: the engine is bounded by the caller; oversized input never reaches the parser
// QUOTE(TZ): "the caller bounds input size"
// REF: req-documents-io-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p: read(p, n) = Right(b) → |b| ≤ n
// PURITY: SHELL
// EFFECT: Effect<Uint8Array, FileError | InputTooLarge, FileSystem>
// INVARIANT: a file larger than the limit is rejected before it is loaded
// COMPLEXITY: O(n)

/**
 * Read a document as raw bytes.
 *
 * @param path - File to read.
 * @param maxBytes - Largest accepted file size.
 *
 * @pure false
 * @effect FileSystem
 */
export const readDocument = (
  path: string,
  maxBytes: number
): Effect.Effect<Uint8Array, FileError | InputTooLarge, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const info = yield* _(
      fs.stat(path).pipe(Effect.mapError((error) => fileError(`Cannot read ${path}: ${error.message}`)))
    )
    const size = Number(info.size)
    if (size > maxBytes) {
      return yield* _(Effect.fail(inputTooLarge(path, size, maxBytes)))
    }
    const bytes = yield* _(
      fs.readFile(path).pipe(Effect.mapError((error) => fileError(`Cannot read ${path}: ${error.message}`)))
    )
    // The file may have grown between stat and read.
    if (bytes.length > maxBytes) {
      return yield* _(Effect.fail(inputTooLarge(path, bytes.length, maxBytes)))
    }
    return bytes
  })

export const writeDocument = (
  path: string,
  text: string
): Effect.Effect<void, FileError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    yield* _(
      fs.writeFileString(path, text).pipe(
        Effect.mapError((error) => fileError(`Cannot write ${path}: ${error.message}`))
      )
    )
  })
