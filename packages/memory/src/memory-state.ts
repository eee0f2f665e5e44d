/**
 * Memory State
 *
 * The single shared resource domain of the simulator: one arena, the free
 * and allocated collections, and the lock that guards all of them. Built
 * once at startup and handed to every actor.
 */

import { Mutex } from '@blockmem/core'
import {
  type CollectionName,
  ConfigError,
  MEMORY_CONSTANTS,
  type Safe,
  safeError,
  safeResult,
  toError,
} from '@blockmem/types'
import { BlockArena } from './block-arena'
import { BlockCollection } from './block-collection'

export interface MemoryStateOptions {
  /** Initial number of equal-size blocks */
  blockCount: number
  /** Uniform initial block size B */
  blockSize: number
  /** Maximum number of live block records */
  arenaCapacity?: number
}

/**
 * One block of an explicit starting layout. Bases are assigned contiguously
 * in listing order; ids follow the same order.
 */
export interface LayoutEntry {
  collection: CollectionName
  size: number
  age?: number
}

export interface LayoutOptions {
  blockSize: number
  blocks: readonly LayoutEntry[]
  arenaCapacity?: number
}

export class MemoryState {
  readonly arena: BlockArena
  readonly free: BlockCollection
  readonly allocated: BlockCollection
  readonly lock = new Mutex()
  readonly blockCount: number
  readonly blockSize: number
  readonly totalUnits: number

  /**
   * Partition the address space into `blockCount` blocks of `blockSize`
   * units, ids 0..N-1, all free. With an explicit layout, the layout's
   * blocks replace the uniform partition.
   * @throws ConfigError for non-positive parameters
   * @throws ResourceExhaustionError when the arena cannot hold the partition
   */
  constructor(options: MemoryStateOptions, layout?: readonly LayoutEntry[]) {
    const { blockSize } = options
    const blockCount = layout ? layout.length : options.blockCount
    const arenaCapacity =
      options.arenaCapacity ?? MEMORY_CONSTANTS.ARENA_CAPACITY

    if (!Number.isInteger(blockCount) || blockCount < 1) {
      throw new ConfigError(`blockCount must be a positive integer`, [
        `blockCount=${blockCount}`,
      ])
    }
    if (!Number.isInteger(blockSize) || blockSize < 1) {
      throw new ConfigError(`blockSize must be a positive integer`, [
        `blockSize=${blockSize}`,
      ])
    }

    const entries: readonly LayoutEntry[] =
      layout ??
      Array.from({ length: blockCount }, () => ({
        collection: 'free' as const,
        size: blockSize,
      }))
    const totalUnits = entries.reduce((total, entry) => total + entry.size, 0)
    if (!Number.isSafeInteger(totalUnits)) {
      throw new ConfigError('Address space exceeds the safe integer range', [
        `blockCount=${blockCount}`,
        `blockSize=${blockSize}`,
      ])
    }
    const invalid = entries.filter(
      (entry) =>
        !Number.isInteger(entry.size) ||
        entry.size < 1 ||
        (entry.age !== undefined &&
          (!Number.isInteger(entry.age) || entry.age < 0)),
    )
    if (invalid.length > 0) {
      throw new ConfigError(
        'Layout blocks need a positive size and a non-negative age',
        invalid.map((entry) => `size=${entry.size} age=${entry.age ?? 0}`),
      )
    }

    this.blockCount = blockCount
    this.blockSize = blockSize
    this.totalUnits = totalUnits
    this.arena = new BlockArena(arenaCapacity)
    this.free = new BlockCollection('free', this.arena)
    this.allocated = new BlockCollection('allocated', this.arena)

    let base = 0
    for (const entry of entries) {
      const block = this.arena.create(base, entry.size)
      block.age = entry.age ?? 0
      this.collection(entry.collection).append(block.id)
      base += entry.size
    }
  }

  /**
   * Start from an explicit arrangement of free and allocated blocks instead
   * of the uniform partition
   */
  static fromLayout(options: LayoutOptions): MemoryState {
    return new MemoryState(
      {
        blockCount: options.blocks.length,
        blockSize: options.blockSize,
        arenaCapacity: options.arenaCapacity,
      },
      options.blocks,
    )
  }

  /**
   * Build the initial state, reporting construction failures as a Safe error
   */
  static create(options: MemoryStateOptions): Safe<MemoryState> {
    try {
      return safeResult(new MemoryState(options))
    } catch (error) {
      return safeError(toError(error))
    }
  }

  collection(name: CollectionName): BlockCollection {
    return name === 'free' ? this.free : this.allocated
  }

  /**
   * Run `fn` as one critical section. Every scan-then-mutate sequence of the
   * engine goes through here.
   */
  withLock<T>(fn: (state: MemoryState) => T): Promise<T> {
    return this.lock.runExclusive(() => fn(this))
  }
}
