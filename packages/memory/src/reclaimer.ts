/**
 * Reclamation Engine
 *
 * Returns the longest-resident allocated block to the free collection and
 * then coalesces. Selection is by actual maximum age: split-derived blocks
 * are appended out of arrival order, so the head is not always the oldest.
 *
 * Callers must hold the memory lock.
 */

import type { CoalescePolicy, ReclamationOutcome } from '@blockmem/types'
import { type BlockRecord, toSnapshot } from './block-arena'
import { type BlockCollection, relocate } from './block-collection'
import { coalesce } from './coalescer'
import type { MemoryState } from './memory-state'

/**
 * Allocated block with the greatest age; ties go to the earliest member
 */
export function selectOldest(
  allocated: BlockCollection,
): BlockRecord | undefined {
  let oldest: BlockRecord | undefined
  for (const block of allocated.blocks()) {
    if (!oldest || block.age > oldest.age) {
      oldest = block
    }
  }
  return oldest
}

export function reclaim(
  state: MemoryState,
  policy: CoalescePolicy = 'reservoir',
): ReclamationOutcome {
  const oldest = selectOldest(state.allocated)
  if (!oldest) {
    return { kind: 'skipped', reason: 'empty' }
  }

  const previousAge = oldest.age
  oldest.age = 0
  const moved = relocate(state.free, state.allocated, oldest.id)
  // snapshot before coalescing: the block may be absorbed right after
  const block = toSnapshot(moved)

  return {
    kind: 'reclaimed',
    block,
    previousAge,
    coalesce: coalesce(state, policy),
  }
}
