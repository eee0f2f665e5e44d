/**
 * Block Arena
 *
 * Owns every live block record. A record is addressed by a stable handle,
 * which is simply its block id; ids come from a monotonic counter and are
 * never handed out twice, even after the record is released.
 */

import {
  type Block,
  type BlockId,
  type BlockSnapshot,
  type CollectionName,
  IntegrityError,
  ResourceExhaustionError,
} from '@blockmem/types'

/**
 * Arena-resident block: the public block fields plus the intrusive links of
 * the collection it currently belongs to
 */
export interface BlockRecord extends Block {
  owner: CollectionName | null
  prev: BlockId | null
  next: BlockId | null
}

export function toSnapshot(block: Block): BlockSnapshot {
  return Object.freeze({
    id: block.id,
    base: block.base,
    size: block.size,
    age: block.age,
  })
}

export class BlockArena {
  private readonly records = new Map<BlockId, BlockRecord>()
  private nextId = 0

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new ResourceExhaustionError(
        `Arena capacity must be a positive integer, got ${capacity}`,
        capacity,
      )
    }
  }

  /** Number of live records */
  get size(): number {
    return this.records.size
  }

  get isFull(): boolean {
    return this.records.size >= this.capacity
  }

  /**
   * Create an unowned block with age 0
   */
  create(base: number, size: number): BlockRecord {
    if (this.isFull) {
      throw new ResourceExhaustionError(
        `Block arena exhausted: ${this.records.size} of ${this.capacity} records in use`,
        this.capacity,
      )
    }
    if (!Number.isInteger(size) || size <= 0) {
      throw new IntegrityError(`Refusing to create block with size ${size}`, {
        base,
        size,
      })
    }

    const record: BlockRecord = {
      id: this.nextId++,
      base,
      size,
      age: 0,
      owner: null,
      prev: null,
      next: null,
    }
    this.records.set(record.id, record)
    return record
  }

  has(id: BlockId): boolean {
    return this.records.has(id)
  }

  tryGet(id: BlockId): BlockRecord | undefined {
    return this.records.get(id)
  }

  get(id: BlockId): BlockRecord {
    const record = this.records.get(id)
    if (!record) {
      throw new IntegrityError(`Block ${id} is not live in the arena`, { id })
    }
    return record
  }

  /**
   * Drop a record whose capacity has been folded into another block.
   * The record must already be detached from its collection.
   */
  release(id: BlockId): void {
    const record = this.get(id)
    if (record.owner !== null) {
      throw new IntegrityError(
        `Cannot release block ${id} while it is a member of '${record.owner}'`,
        { id, owner: record.owner },
      )
    }
    this.records.delete(id)
  }

  all(): IterableIterator<BlockRecord> {
    return this.records.values()
  }
}
