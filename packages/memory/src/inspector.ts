/**
 * Inspector
 *
 * Read-only listing of both collections. Never mutates state.
 */

import type { BlockSnapshot, MemoryReport } from '@blockmem/types'
import type { MemoryState } from './memory-state'

export const FREE_HEADER = '==== Free Memory ===='
export const ALLOCATED_HEADER = '==== Allocated Memory ===='
export const EMPTY_LINE = 'empty'

export function inspect(state: MemoryState): MemoryReport {
  return {
    free: state.free.snapshot(),
    allocated: state.allocated.snapshot(),
    totalUnits: state.totalUnits,
  }
}

export function formatBlock(block: BlockSnapshot): string {
  return `block id=${block.id} base=${block.base} size=${block.size} age=${block.age}`
}

function formatSection(header: string, blocks: BlockSnapshot[]): string[] {
  if (blocks.length === 0) return [header, EMPTY_LINE]
  return [header, ...blocks.map(formatBlock)]
}

export function formatReport(report: MemoryReport): string {
  return [
    ...formatSection(FREE_HEADER, report.free),
    ...formatSection(ALLOCATED_HEADER, report.allocated),
  ].join('\n')
}
