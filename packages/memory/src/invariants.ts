/**
 * Invariant Verification
 *
 * Checks the structural and conservation laws of a quiescent memory state.
 * Only meaningful while the caller holds the memory lock (or nothing else
 * runs), since a relocation in progress briefly leaves a block unowned.
 */

import {
  type BlockId,
  IntegrityError,
  type Safe,
  safeError,
  safeResult,
} from '@blockmem/types'
import { sum } from 'radash'
import type { BlockRecord } from './block-arena'
import type { BlockCollection } from './block-collection'
import type { MemoryState } from './memory-state'

export interface InvariantOptions {
  /**
   * Also require block extents to tile [0, totalUnits) exactly. Holds under
   * the 'adjacent' coalesce policy only.
   */
  checkAddressPartition?: boolean
}

function walkCollection(
  state: MemoryState,
  collection: BlockCollection,
  seen: Map<BlockId, string>,
  violations: string[],
): BlockRecord[] {
  const members: BlockRecord[] = []
  const name = collection.name
  const limit = state.arena.size + 1

  if ((collection.headHandle === null) !== (collection.tailHandle === null)) {
    violations.push(`'${name}' has a dangling head or tail reference`)
  }

  let previous: BlockId | null = null
  let cursor = collection.headHandle
  while (cursor !== null) {
    if (members.length >= limit) {
      violations.push(`'${name}' contains a cycle`)
      break
    }
    const record = state.arena.tryGet(cursor)
    if (!record) {
      violations.push(`'${name}' links to block ${cursor}, which is not live`)
      break
    }
    if (record.id !== cursor) {
      violations.push(`arena handle ${cursor} holds block ${record.id}`)
    }
    if (record.owner !== name) {
      violations.push(
        `block ${cursor} is linked into '${name}' but owned by '${record.owner ?? 'none'}'`,
      )
    }
    if (record.prev !== previous) {
      violations.push(
        `block ${cursor} in '${name}' has prev=${record.prev}, expected ${previous}`,
      )
    }
    const seenIn = seen.get(cursor)
    if (seenIn !== undefined) {
      violations.push(`block ${cursor} appears in both '${seenIn}' and '${name}'`)
    }
    seen.set(cursor, name)
    members.push(record)
    previous = cursor
    cursor = record.next
  }

  if (previous !== collection.tailHandle) {
    violations.push(
      `'${name}' ends at block ${previous} but its tail is ${collection.tailHandle}`,
    )
  }
  if (members.length !== collection.length) {
    violations.push(
      `'${name}' reports length ${collection.length} but links ${members.length} blocks`,
    )
  }
  return members
}

function checkPartition(
  blocks: BlockRecord[],
  totalUnits: number,
  violations: string[],
): void {
  const ordered = [...blocks].sort((a, b) => a.base - b.base)
  let expectedBase = 0
  for (const block of ordered) {
    if (block.base !== expectedBase) {
      violations.push(
        `block ${block.id} starts at ${block.base}, expected ${expectedBase}`,
      )
    }
    expectedBase = block.base + block.size
  }
  if (expectedBase !== totalUnits) {
    violations.push(`extents end at ${expectedBase}, expected ${totalUnits}`)
  }
}

export function collectViolations(
  state: MemoryState,
  options: InvariantOptions = {},
): string[] {
  const violations: string[] = []
  const seen = new Map<BlockId, string>()

  const free = walkCollection(state, state.free, seen, violations)
  const allocated = walkCollection(state, state.allocated, seen, violations)
  const members = [...free, ...allocated]

  for (const record of state.arena.all()) {
    if (!seen.has(record.id)) {
      violations.push(`block ${record.id} is live but in no collection`)
    }
  }

  for (const block of members) {
    if (!Number.isInteger(block.size) || block.size <= 0) {
      violations.push(`block ${block.id} has non-positive size ${block.size}`)
    }
    if (!Number.isInteger(block.age) || block.age < 0) {
      violations.push(`block ${block.id} has invalid age ${block.age}`)
    }
  }

  const total = sum(members, (block) => block.size)
  if (total !== state.totalUnits) {
    violations.push(
      `conservation violated: blocks hold ${total} units, address space is ${state.totalUnits}`,
    )
  }

  if (options.checkAddressPartition) {
    checkPartition(members, state.totalUnits, violations)
  }

  return violations
}

export function verifyInvariants(
  state: MemoryState,
  options: InvariantOptions = {},
): Safe<true, IntegrityError> {
  const violations = collectViolations(state, options)
  if (violations.length > 0) {
    return safeError(
      new IntegrityError(
        `Memory invariants violated: ${violations.join('; ')}`,
        { violations },
      ),
    )
  }
  return safeResult(true)
}
