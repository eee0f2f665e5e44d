/**
 * Allocation Engine
 *
 * First-fit over the free collection. A candidate more than twice the
 * request is split: it shrinks in place and the request is carved from the
 * tail of its extent as a brand new block. Anything smaller moves whole.
 *
 * Callers must hold the memory lock.
 */

import type { AllocationOutcome } from '@blockmem/types'
import type { BlockRecord } from './block-arena'
import { type BlockCollection, relocate } from './block-collection'
import { toSnapshot } from './block-arena'
import type { MemoryState } from './memory-state'

/**
 * First free block, in collection order, strictly larger than `size`
 */
export function findFirstFit(
  free: BlockCollection,
  size: number,
): BlockRecord | undefined {
  return free.find((block) => block.size > size)
}

export function isOversized(block: BlockRecord, size: number): boolean {
  return block.size > 2 * size
}

export function allocate(state: MemoryState, size: number): AllocationOutcome {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Request size must be a positive integer, got ${size}`)
  }

  const candidate = findFirstFit(state.free, size)
  if (!candidate) {
    return { kind: 'skipped', requested: size, reason: 'no-fit' }
  }

  if (isOversized(candidate, size)) {
    if (state.arena.isFull) {
      return { kind: 'skipped', requested: size, reason: 'arena-full' }
    }

    candidate.size -= size
    const derived = state.arena.create(candidate.base + candidate.size, size)
    state.allocated.append(derived.id)

    return {
      kind: 'split',
      requested: size,
      source: toSnapshot(candidate),
      block: toSnapshot(derived),
    }
  }

  const moved = relocate(state.allocated, state.free, candidate.id)
  moved.age = 0
  return { kind: 'whole', requested: size, block: toSnapshot(moved) }
}
