/**
 * Centralized Type Definitions for the block memory simulator
 *
 * Single source of truth for the interfaces, result tuples, errors and
 * constants shared across the workspace packages.
 */

export * from './config'
export * from './constants'
export * from './errors'
export * from './memory'
export * from './safe'
export * from './service'
