/**
 * Coalescer
 *
 * Folds free fragments (blocks smaller than the uniform initial block size)
 * back into a capacity-bearing free block. The head of the free collection
 * is never treated as a fragment.
 *
 * 'reservoir': every fragment is absorbed by the head, wherever it lies in
 *   the address space. Total capacity is conserved; base offsets stop
 *   describing real extents once a non-adjacent fragment is absorbed.
 * 'adjacent': a fragment is absorbed only by a free block whose extent
 *   touches its own, so extents keep partitioning the address space.
 *
 * Callers must hold the memory lock.
 */

import type {
  CoalesceMerge,
  CoalescePolicy,
  CoalesceSummary,
} from '@blockmem/types'
import type { BlockRecord } from './block-arena'
import type { MemoryState } from './memory-state'

export function isFragment(block: BlockRecord, blockSize: number): boolean {
  return block.size < blockSize
}

export function areAdjacent(a: BlockRecord, b: BlockRecord): boolean {
  return a.base + a.size === b.base || b.base + b.size === a.base
}

export function coalesce(
  state: MemoryState,
  policy: CoalescePolicy = 'reservoir',
): CoalesceSummary {
  const merges =
    policy === 'adjacent' ? coalesceAdjacent(state) : coalesceIntoReservoir(state)

  return {
    policy,
    merges,
    unitsMoved: merges.reduce((total, merge) => total + merge.units, 0),
  }
}

function absorb(
  state: MemoryState,
  fragment: BlockRecord,
  into: BlockRecord,
): CoalesceMerge {
  state.free.detach(fragment.id)
  into.base = Math.min(into.base, fragment.base)
  into.size += fragment.size
  state.arena.release(fragment.id)
  return { absorbed: fragment.id, into: into.id, units: fragment.size }
}

function coalesceIntoReservoir(state: MemoryState): CoalesceMerge[] {
  const reservoir = state.free.head
  if (!reservoir || state.free.length < 2) return []

  const merges: CoalesceMerge[] = []
  for (const block of state.free.blocks()) {
    if (block.id === reservoir.id || !isFragment(block, state.blockSize)) {
      continue
    }
    // the reservoir keeps its own base; only capacity moves
    state.free.detach(block.id)
    reservoir.size += block.size
    state.arena.release(block.id)
    merges.push({ absorbed: block.id, into: reservoir.id, units: block.size })
  }
  return merges
}

function coalesceAdjacent(state: MemoryState): CoalesceMerge[] {
  const merges: CoalesceMerge[] = []
  const headId = state.free.headHandle

  // a merge can give an earlier fragment a new neighbor, so repeat until a
  // pass changes nothing; every pass removes a record, bounding the loop
  let merged = true
  while (merged) {
    merged = false
    for (const fragment of state.free.blocks()) {
      if (fragment.id === headId || !isFragment(fragment, state.blockSize)) {
        continue
      }
      const neighbor = state.free.find(
        (block) => block.id !== fragment.id && areAdjacent(block, fragment),
      )
      if (!neighbor) continue

      merges.push(absorb(state, fragment, neighbor))
      merged = true
    }
  }
  return merges
}
