import * as Either from "effect/Either"

import type { Allocator } from "./allocator.js"
import { boundedAllocator, systemAllocator } from "./allocator.js"
import type { CliCommand } from "./cli.js"
import type { ResolvedConfig } from "./config.js"
import { destroy } from "./construct.js"
import type { EngineError } from "./errors.js"
import { makeHeap } from "./heap.js"
import { parse } from "./parser.js"
import { serializeWith } from "./serializer.js"
import type { DocumentStats } from "./types.js"

// CHANGE: run one document through parse, optional re-serialization and teardown
// WHY: the CLI commands share one pure pipeline; the shell only moves bytes
// QUOTE(TZ): "format/minify print the serialized document (plus one line break)"
// REF: req-document-pipeline-1
// SOURCE: n/a
// FORMAT THEOREM: ∀d: process(d) leaves heap.liveBytes = 0
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every node built for the document is released before returning
// COMPLEXITY: O(n)

export interface ProcessedDocument {
  readonly stats: DocumentStats
  readonly output: string | undefined
}

export const allocatorFor = (config: ResolvedConfig): Allocator =>
  config.memoryLimitBytes > 0
    ? boundedAllocator({ limitBytes: config.memoryLimitBytes })
    : systemAllocator()

/**
 * Parse `input` and, for format/minify, render it again.
 *
 * @param command - check validates only; format pretty-prints; minify emits compact text.
 * @param input - Raw document bytes or text.
 * @param config - Conformance, depth, memory and indent settings.
 * @returns Stats and output text ending in one line break.
 *
 * @pure true
 * @invariant the allocator is balanced on every path
 * @complexity O(n)
 */
export const processDocument = (
  command: CliCommand,
  input: Uint8Array | string,
  config: ResolvedConfig
): Either.Either<ProcessedDocument, EngineError> => {
  const heap = makeHeap(allocatorFor(config))
  const parsed = parse(input, { heap, maxDepth: config.maxDepth, conformance: config.conformance })
  if (Either.isLeft(parsed)) {
    return Either.left(parsed.left)
  }
  const root = parsed.right
  const nodes = heap.usage().liveNodes
  const rendered: Either.Either<string | undefined, EngineError> = command === "check"
    ? Either.right(undefined)
    : serializeWith(heap, root, command === "format" ? { pretty: true, indent: config.indent } : {})
  const released = destroy(heap, root)
  if (Either.isLeft(released)) {
    return Either.left(released.left)
  }
  return Either.map(rendered, (text) => ({
    stats: {
      inputBytes: typeof input === "string" ? input.length : input.byteLength,
      nodes,
      peakBytes: heap.usage().peakBytes
    },
    output: text === undefined ? undefined : `${text}\n`
  }))
}
