/**
 * Coalescer Tests
 */

import { describe, expect, it } from 'vitest'
import { areAdjacent, coalesce, isFragment } from '../coalescer'
import { verifyInvariants } from '../invariants'
import { MemoryState } from '../memory-state'

describe('coalesce', () => {
  describe('reservoir policy', () => {
    it('should do nothing when the reservoir is the only free block', () => {
      const state = MemoryState.fromLayout({
        blockSize: 100,
        blocks: [
          { collection: 'free', size: 40 },
          { collection: 'allocated', size: 60 },
        ],
      })

      expect(coalesce(state)).toEqual({
        policy: 'reservoir',
        merges: [],
        unitsMoved: 0,
      })
      expect(state.free.snapshot()).toEqual([
        { id: 0, base: 0, size: 40, age: 0 },
      ])
    })

    it('should absorb every fragment after the head, including the tail', () => {
      const state = MemoryState.fromLayout({
        blockSize: 100,
        blocks: [
          { collection: 'free', size: 50 },
          { collection: 'free', size: 100 },
          { collection: 'free', size: 20 },
          { collection: 'free', size: 100 },
          { collection: 'free', size: 10 },
        ],
      })

      const summary = coalesce(state, 'reservoir')

      expect(summary.merges).toEqual([
        { absorbed: 2, into: 0, units: 20 },
        { absorbed: 4, into: 0, units: 10 },
      ])
      expect(summary.unitsMoved).toBe(30)
      expect(state.free.snapshot()).toEqual([
        { id: 0, base: 0, size: 80, age: 0 },
        { id: 1, base: 50, size: 100, age: 0 },
        { id: 3, base: 170, size: 100, age: 0 },
      ])
      expect(state.arena.has(2)).toBe(false)
      expect(state.arena.has(4)).toBe(false)

      const [error] = verifyInvariants(state)
      expect(error).toBeUndefined()
    })

    it('should absorb a fragment with no free neighbor', () => {
      const state = MemoryState.fromLayout({
        blockSize: 100,
        blocks: [
          { collection: 'free', size: 100 },
          { collection: 'allocated', size: 50 },
          { collection: 'free', size: 30 },
        ],
      })

      expect(coalesce(state).merges).toEqual([
        { absorbed: 2, into: 0, units: 30 },
      ])
      expect(state.free.snapshot()).toEqual([
        { id: 0, base: 0, size: 130, age: 0 },
      ])
    })
  })

  describe('adjacent policy', () => {
    it('should leave a fragment with no free neighbor in place', () => {
      const state = MemoryState.fromLayout({
        blockSize: 100,
        blocks: [
          { collection: 'free', size: 100 },
          { collection: 'allocated', size: 50 },
          { collection: 'free', size: 30 },
        ],
      })

      expect(coalesce(state, 'adjacent').merges).toEqual([])
      expect(state.free.length).toBe(2)
    })

    it('should merge into the neighbor and take the lower base', () => {
      const state = MemoryState.fromLayout({
        blockSize: 100,
        blocks: [
          { collection: 'free', size: 100 },
          { collection: 'allocated', size: 20 },
          { collection: 'free', size: 30 },
          { collection: 'free', size: 40 },
        ],
      })

      const summary = coalesce(state, 'adjacent')

      expect(summary).toEqual({
        policy: 'adjacent',
        merges: [{ absorbed: 2, into: 3, units: 30 }],
        unitsMoved: 30,
      })
      expect(state.free.snapshot()).toEqual([
        { id: 0, base: 0, size: 100, age: 0 },
        { id: 3, base: 120, size: 70, age: 0 },
      ])

      const [error] = verifyInvariants(state, { checkAddressPartition: true })
      expect(error).toBeUndefined()
    })

    it('should never treat the head as a fragment', () => {
      const state = MemoryState.fromLayout({
        blockSize: 100,
        blocks: [
          { collection: 'free', size: 30 },
          { collection: 'free', size: 100 },
        ],
      })

      expect(coalesce(state, 'adjacent').merges).toEqual([])
      expect(state.free.snapshot().map((block) => block.size)).toEqual([
        30, 100,
      ])
    })
  })
})

describe('isFragment', () => {
  it('should compare against the uniform block size', () => {
    const state = MemoryState.fromLayout({
      blockSize: 100,
      blocks: [
        { collection: 'free', size: 99 },
        { collection: 'free', size: 100 },
      ],
    })

    expect(isFragment(state.arena.get(0), 100)).toBe(true)
    expect(isFragment(state.arena.get(1), 100)).toBe(false)
  })
})

describe('areAdjacent', () => {
  it('should detect touching extents in either order', () => {
    const state = MemoryState.fromLayout({
      blockSize: 100,
      blocks: [
        { collection: 'free', size: 10 },
        { collection: 'free', size: 10 },
        { collection: 'free', size: 10 },
      ],
    })
    const [a, b, c] = [0, 1, 2].map((id) => state.arena.get(id))

    expect(areAdjacent(a, b)).toBe(true)
    expect(areAdjacent(b, a)).toBe(true)
    expect(areAdjacent(a, c)).toBe(false)
  })
})
