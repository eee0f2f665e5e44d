import type { MemoryState } from './memory-state'

/**
 * Advance the residency age of every allocated block by one tick.
 * Returns the number of blocks aged. Callers must hold the memory lock.
 */
export function advanceAges(state: MemoryState): number {
  let aged = 0
  for (const block of state.allocated.blocks()) {
    block.age++
    aged++
  }
  return aged
}
