/**
 * Block Memory Types
 *
 * Shapes shared by the block engine, the actor services and anything that
 * observes them (event bus listeners, the inspector, tests)
 */

/** Unique, never reused block identity. Doubles as the arena handle. */
export type BlockId = number

export type CollectionName = 'free' | 'allocated'

/**
 * Contiguous unit of simulated address space
 */
export interface Block {
  readonly id: BlockId
  /** Offset into the simulated address space */
  base: number
  /** Number of address units owned by this block, always > 0 */
  size: number
  /** Aging-clock ticks since the block last became allocated */
  age: number
}

export type BlockSnapshot = Readonly<Block>

/**
 * Read-only listing of both collections in collection order
 */
export interface MemoryReport {
  free: BlockSnapshot[]
  allocated: BlockSnapshot[]
  totalUnits: number
}

export type CoalescePolicy = 'reservoir' | 'adjacent'

export interface CoalesceMerge {
  /** Fragment whose identity disappeared */
  absorbed: BlockId
  /** Block that received the fragment's capacity */
  into: BlockId
  units: number
}

export interface CoalesceSummary {
  policy: CoalescePolicy
  merges: CoalesceMerge[]
  /** Total units moved between blocks during this pass */
  unitsMoved: number
}

export type AllocationOutcome =
  | {
      kind: 'split'
      requested: number
      /** Shrunk remainder that stays in the free collection */
      source: BlockSnapshot
      /** Newly derived block appended to the allocated collection */
      block: BlockSnapshot
    }
  | {
      kind: 'whole'
      requested: number
      block: BlockSnapshot
    }
  | {
      kind: 'skipped'
      requested: number
      reason: 'no-fit' | 'arena-full'
    }

export type ReclamationOutcome =
  | {
      kind: 'reclaimed'
      /** Snapshot taken after the age reset and the move into free */
      block: BlockSnapshot
      /** Age the block had when it was selected */
      previousAge: number
      coalesce: CoalesceSummary
    }
  | {
      kind: 'skipped'
      reason: 'empty'
    }
