/**
 * Block Memory Engine
 *
 * First-fit block allocator over a fixed address space: the arena, the free
 * and allocated collections, and the operations that move blocks between
 * them. Every operation here is synchronous and expects the caller to hold
 * the state's lock.
 */

export * from './aging'
export * from './allocator'
export * from './block-arena'
export * from './block-collection'
export * from './coalescer'
export * from './inspector'
export * from './invariants'
export * from './memory-state'
export * from './reclaimer'
