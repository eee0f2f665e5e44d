/**
 * Environment Schema Tests
 */

import { describe, expect, it } from 'vitest'
import { loadSimulationEnv, parseSimulationEnv } from '../env'

describe('parseSimulationEnv', () => {
  it('should fill every variable with its default', () => {
    const result = parseSimulationEnv({})

    expect(result.success).toBe(true)
    expect(result.data).toEqual({
      LOG_LEVEL: 'info',
      BLOCK_COUNT: 3,
      BLOCK_SIZE: 1024,
      ARENA_CAPACITY: 4096,
      MIN_REQUEST_SIZE: 10,
      MAX_REQUEST_SIZE: 50,
      TICK_MS: 1000,
      ALLOCATION_TICKS: 1,
      RECLAMATION_TICKS: 2,
      AGING_TICKS: 1,
      INSPECTION_TICKS: 5,
      COALESCE_POLICY: 'reservoir',
      VERIFY_INVARIANTS: false,
    })
  })

  it('should convert numeric and boolean strings', () => {
    const result = parseSimulationEnv({
      BLOCK_COUNT: '8',
      TICK_MS: '25',
      COALESCE_POLICY: 'adjacent',
      VERIFY_INVARIANTS: 'true',
    })

    expect(result.data?.BLOCK_COUNT).toBe(8)
    expect(result.data?.TICK_MS).toBe(25)
    expect(result.data?.COALESCE_POLICY).toBe('adjacent')
    expect(result.data?.VERIFY_INVARIANTS).toBe(true)
  })

  it.each([
    ['BLOCK_COUNT', 'abc'],
    ['BLOCK_SIZE', '0'],
    ['TICK_MS', '-5'],
    ['TICK_MS', '3000000000'],
    ['MIN_REQUEST_SIZE', '2.5'],
    ['COALESCE_POLICY', 'best-fit'],
    ['VERIFY_INVARIANTS', 'yes'],
  ])('should reject %s=%s', (key, value) => {
    const result = parseSimulationEnv({ [key]: value })

    expect(result.success).toBe(false)
    expect(result.error?.issues.map((issue) => issue.path.join('.'))).toEqual([
      key,
    ])
  })

  it('should reject a minimum request above the maximum', () => {
    const result = parseSimulationEnv({
      MIN_REQUEST_SIZE: '60',
      MAX_REQUEST_SIZE: '50',
    })

    expect(result.success).toBe(false)
    expect(result.error?.issues[0]?.message).toBe(
      'MIN_REQUEST_SIZE must not exceed MAX_REQUEST_SIZE',
    )
  })

  it('should reject more blocks than the arena can hold', () => {
    const result = parseSimulationEnv({
      BLOCK_COUNT: '10',
      ARENA_CAPACITY: '4',
    })

    expect(result.success).toBe(false)
    expect(result.error?.issues[0]?.path).toEqual(['BLOCK_COUNT'])
  })

  it('should reject actor intervals longer than a timer can wait', () => {
    // INSPECTION_TICKS defaults to 5: 5 * 1e9ms overflows the timer limit
    const result = parseSimulationEnv({ TICK_MS: '1000000000' })

    expect(result.success).toBe(false)
    expect(result.error?.issues.map((issue) => issue.path)).toEqual([
      ['TICK_MS'],
    ])
    expect(result.error?.issues[0]?.message).toBe(
      'Actor intervals (*_TICKS x TICK_MS) exceed the timer limit',
    )
  })

  it('should accept the longest interval a timer can wait', () => {
    const result = parseSimulationEnv({
      TICK_MS: '2147483647',
      RECLAMATION_TICKS: '1',
      INSPECTION_TICKS: '1',
    })

    expect(result.success).toBe(true)
    expect(result.data?.TICK_MS).toBe(2_147_483_647)
  })

  it('should ignore an unrelated NODE_ENV', () => {
    const result = parseSimulationEnv({ NODE_ENV: 'staging' })

    expect(result.success).toBe(true)
    expect(result.data?.BLOCK_COUNT).toBe(3)
  })
})

describe('loadSimulationEnv', () => {
  it('should let defined overrides win and skip undefined ones', () => {
    const result = loadSimulationEnv(
      { BLOCK_COUNT: '7', BLOCK_SIZE: undefined },
      'does-not-exist.env',
    )

    expect(result.success).toBe(true)
    expect(result.data?.BLOCK_COUNT).toBe(7)
  })
})
