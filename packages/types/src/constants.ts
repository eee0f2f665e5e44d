/**
 * Simulation Constants
 *
 * Defaults for every startup parameter. The environment and the CLI may
 * override each of them.
 */

export const MEMORY_CONSTANTS = {
  /** Initial number of blocks the address space is partitioned into */
  BLOCK_COUNT: 3,

  /** Uniform initial block size, in address units */
  BLOCK_SIZE: 1024,

  /** Maximum number of live block records the arena can hold */
  ARENA_CAPACITY: 4096,
} as const

export const REQUEST_CONSTANTS = {
  /** Smallest request the default size generator produces (inclusive) */
  MIN_REQUEST_SIZE: 10,

  /** Largest request the default size generator produces (inclusive) */
  MAX_REQUEST_SIZE: 50,
} as const

/**
 * Actor pacing, expressed in ticks of TICK_MS
 */
export const TIMING_CONSTANTS = {
  TICK_MS: 1000,
  ALLOCATION_TICKS: 1,
  RECLAMATION_TICKS: 2,
  AGING_TICKS: 1,
  INSPECTION_TICKS: 5,
  /** Largest delay setTimeout honours; longer ones fire after 1ms */
  MAX_TIMER_DELAY_MS: 2_147_483_647,
} as const
