/**
 * Aging Clock and Inspector Tests
 */

import { describe, expect, it } from 'vitest'
import { advanceAges } from '../aging'
import { allocate } from '../allocator'
import { formatBlock, formatReport, inspect } from '../inspector'
import { MemoryState } from '../memory-state'

describe('advanceAges', () => {
  it('should age every allocated block by one and leave free blocks alone', () => {
    const state = MemoryState.fromLayout({
      blockSize: 64,
      blocks: [
        { collection: 'free', size: 64 },
        { collection: 'allocated', size: 32, age: 2 },
        { collection: 'allocated', size: 32 },
      ],
    })

    expect(advanceAges(state)).toBe(2)
    expect(state.allocated.snapshot().map((block) => block.age)).toEqual([3, 1])
    expect(state.arena.get(0).age).toBe(0)
  })

  it('should report zero when nothing is allocated', () => {
    const state = new MemoryState({ blockCount: 2, blockSize: 64 })

    expect(advanceAges(state)).toBe(0)
  })
})

describe('inspect', () => {
  it('should render the initial partition', () => {
    const state = new MemoryState({ blockCount: 2, blockSize: 16 })

    expect(formatReport(inspect(state))).toBe(
      [
        '==== Free Memory ====',
        'block id=0 base=0 size=16 age=0',
        'block id=1 base=16 size=16 age=0',
        '==== Allocated Memory ====',
        'empty',
      ].join('\n'),
    )
  })

  it('should list split blocks with their ages', () => {
    const state = new MemoryState({ blockCount: 2, blockSize: 16 })
    allocate(state, 5)
    advanceAges(state)

    expect(formatReport(inspect(state))).toBe(
      [
        '==== Free Memory ====',
        'block id=0 base=0 size=11 age=0',
        'block id=1 base=16 size=16 age=0',
        '==== Allocated Memory ====',
        'block id=2 base=11 size=5 age=1',
      ].join('\n'),
    )
  })

  it('should mark an empty free collection', () => {
    const state = MemoryState.fromLayout({
      blockSize: 16,
      blocks: [{ collection: 'allocated', size: 16, age: 2 }],
    })

    expect(formatReport(inspect(state))).toBe(
      [
        '==== Free Memory ====',
        'empty',
        '==== Allocated Memory ====',
        'block id=0 base=0 size=16 age=2',
      ].join('\n'),
    )
  })

  it('should not mutate state', () => {
    const state = new MemoryState({ blockCount: 3, blockSize: 16 })
    allocate(state, 4)
    const free = state.free.snapshot()
    const allocated = state.allocated.snapshot()

    const report = inspect(state)

    expect(report.totalUnits).toBe(48)
    expect(state.free.snapshot()).toEqual(free)
    expect(state.allocated.snapshot()).toEqual(allocated)
  })

  it('should format a single block', () => {
    expect(formatBlock({ id: 7, base: 12, size: 3, age: 9 })).toBe(
      'block id=7 base=12 size=3 age=9',
    )
  })
})
