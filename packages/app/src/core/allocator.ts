import * as Either from "effect/Either"

import type { AllocationError } from "./errors.js"
import { allocationError } from "./errors.js"

// CHANGE: route every node reservation through an exchangeable allocator
// WHY: a host can impose a memory ceiling per document without global hooks
// QUOTE(TZ): "exposed as a pluggable hook so a host can bound memory use"
// REF: req-allocator-1
// SOURCE: n/a
// FORMAT THEOREM: ∀a: usage(a).liveBytes = Σ reserved − Σ released ≤ limit(a)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a refused reservation leaves usage unchanged
// COMPLEXITY: O(1)/O(1)

export interface AllocatorUsage {
  readonly liveBytes: number
  readonly peakBytes: number
  readonly allocations: number
  readonly releases: number
}

export interface Allocator {
  readonly name: string
  readonly limit: number
  readonly reserve: (bytes: number) => Either.Either<void, AllocationError>
  readonly release: (bytes: number) => void
  readonly usage: () => AllocatorUsage
}

export interface BoundedAllocatorOptions {
  readonly limitBytes: number
}

const makeCountingAllocator = (name: string, limit: number): Allocator => {
  let liveBytes = 0
  let peakBytes = 0
  let allocations = 0
  let releases = 0

  const reserve = (bytes: number): Either.Either<void, AllocationError> => {
    if (liveBytes + bytes > limit) {
      return Either.left(allocationError(bytes, liveBytes, limit))
    }
    liveBytes += bytes
    allocations++
    peakBytes = Math.max(peakBytes, liveBytes)
    return Either.right(undefined)
  }

  const release = (bytes: number): void => {
    liveBytes = Math.max(0, liveBytes - bytes)
    releases++
  }

  return {
    name,
    limit,
    reserve,
    release,
    usage: () => ({ liveBytes, peakBytes, allocations, releases })
  }
}

/**
 * Allocator without a ceiling; only keeps usage counters.
 *
 * @pure false
 * @invariant reserve never fails
 */
export const systemAllocator = (): Allocator => makeCountingAllocator("system", Number.POSITIVE_INFINITY)

/**
 * Allocator that refuses reservations above `limitBytes` live bytes.
 *
 * @param options - Ceiling in accounted bytes; must be a non-negative integer.
 *
 * @pure false
 * @invariant usage().liveBytes ≤ limitBytes
 */
export const boundedAllocator = (options: BoundedAllocatorOptions): Allocator =>
  makeCountingAllocator("bounded", Math.max(0, Math.floor(options.limitBytes)))
