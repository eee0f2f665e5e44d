/**
 * Block Collection
 *
 * Ordered, intrusive doubly-linked list over arena records. Links are block
 * ids rather than object references, so a collection never holds ownership
 * of a block; the arena does.
 */

import {
  type BlockId,
  type BlockSnapshot,
  type CollectionName,
  IntegrityError,
} from '@blockmem/types'
import { type BlockArena, type BlockRecord, toSnapshot } from './block-arena'

export class BlockCollection {
  private headId: BlockId | null = null
  private tailId: BlockId | null = null
  private count = 0

  constructor(
    readonly name: CollectionName,
    private readonly arena: BlockArena,
  ) {}

  get length(): number {
    return this.count
  }

  get headHandle(): BlockId | null {
    return this.headId
  }

  get tailHandle(): BlockId | null {
    return this.tailId
  }

  get head(): BlockRecord | null {
    return this.headId === null ? null : this.arena.get(this.headId)
  }

  get tail(): BlockRecord | null {
    return this.tailId === null ? null : this.arena.get(this.tailId)
  }

  isEmpty(): boolean {
    return this.headId === null
  }

  contains(id: BlockId): boolean {
    return this.arena.tryGet(id)?.owner === this.name
  }

  /**
   * Place an unowned block at the end of the collection
   */
  append(id: BlockId): BlockRecord {
    const record = this.arena.get(id)
    if (record.owner !== null) {
      throw new IntegrityError(
        `Block ${id} is already a member of '${record.owner}', cannot append to '${this.name}'`,
        { id, owner: record.owner, target: this.name },
      )
    }

    record.prev = this.tailId
    record.next = null
    if (this.tailId === null) {
      this.headId = id
    } else {
      this.arena.get(this.tailId).next = id
    }
    this.tailId = id
    record.owner = this.name
    this.count++
    return record
  }

  /**
   * Unlink a member from wherever it sits (head, tail or interior)
   */
  detach(id: BlockId): BlockRecord {
    const record = this.arena.tryGet(id)
    if (!record || record.owner !== this.name) {
      throw new IntegrityError(
        `Block ${id} is not a member of '${this.name}'`,
        { id, expected: this.name, actual: record?.owner ?? 'none' },
      )
    }

    if (record.prev === null) {
      if (this.headId !== id) {
        throw new IntegrityError(
          `Block ${id} has no predecessor but is not the head of '${this.name}'`,
          { id, head: this.headId },
        )
      }
      this.headId = record.next
    } else {
      this.arena.get(record.prev).next = record.next
    }

    if (record.next === null) {
      if (this.tailId !== id) {
        throw new IntegrityError(
          `Block ${id} has no successor but is not the tail of '${this.name}'`,
          { id, tail: this.tailId },
        )
      }
      this.tailId = record.prev
    } else {
      this.arena.get(record.next).prev = record.prev
    }

    record.prev = null
    record.next = null
    record.owner = null
    this.count--
    return record
  }

  /**
   * Walk member handles in collection order. The cursor lives only in this
   * generator; the successor is read before yielding, so the caller may
   * detach the yielded block without breaking the walk.
   */
  *handles(): Generator<BlockId, void, undefined> {
    let cursor = this.headId
    while (cursor !== null) {
      const current = cursor
      cursor = this.arena.get(current).next
      yield current
    }
  }

  *blocks(): Generator<BlockRecord, void, undefined> {
    for (const id of this.handles()) {
      yield this.arena.get(id)
    }
  }

  find(predicate: (block: BlockRecord) => boolean): BlockRecord | undefined {
    for (const block of this.blocks()) {
      if (predicate(block)) return block
    }
    return undefined
  }

  totalSize(): number {
    let total = 0
    for (const block of this.blocks()) {
      total += block.size
    }
    return total
  }

  snapshot(): BlockSnapshot[] {
    return Array.from(this.blocks(), toSnapshot)
  }
}

/**
 * Move a block from `source` to the end of `target`. Callers hold the
 * memory lock, so the unowned interval between the two steps is never
 * observable.
 */
export function relocate(
  target: BlockCollection,
  source: BlockCollection,
  id: BlockId,
): BlockRecord {
  if (target === source) {
    throw new IntegrityError(
      `Cannot relocate block ${id} from '${source.name}' onto itself`,
      { id },
    )
  }
  source.detach(id)
  return target.append(id)
}
