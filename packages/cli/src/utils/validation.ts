/**
 * Validation utilities for CLI arguments
 */

import type { CoalescePolicy, SimulationLogLevel } from '@blockmem/types'

const COALESCE_POLICIES: readonly CoalescePolicy[] = ['reservoir', 'adjacent']
const LOG_LEVELS: readonly SimulationLogLevel[] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
]

/**
 * Validates that a string is a base-10 positive integer with no sign,
 * fraction or exponent
 */
export function isPositiveIntegerString(value: string): boolean {
  if (!value || typeof value !== 'string') {
    return false
  }
  return (
    /^[0-9]+$/.test(value) &&
    Number(value) > 0 &&
    Number.isSafeInteger(Number(value))
  )
}

export function isCoalescePolicy(value: string): value is CoalescePolicy {
  return COALESCE_POLICIES.some((policy) => policy === value)
}

export function isLogLevel(value: string): value is SimulationLogLevel {
  return LOG_LEVELS.some((level) => level === value)
}
