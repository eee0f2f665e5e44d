/**
 * Generalized Event Bus Service
 *
 * Type-safe side channel through which the actors report what each tick did
 */

import type {
  AllocationOutcome,
  BlockSnapshot,
  CoalesceSummary,
  MemoryReport,
  Safe,
  SafePromise,
} from '@blockmem/types'
import { BaseService, safeResult } from '@blockmem/types'
import { logger } from './logger'

// Event types
export interface BlockAllocatedEvent {
  timestamp: number
  outcome: Exclude<AllocationOutcome, { kind: 'skipped' }>
}

export interface AllocationSkippedEvent {
  timestamp: number
  requested: number
  reason: 'no-fit' | 'arena-full'
}

export interface BlockReclaimedEvent {
  timestamp: number
  block: BlockSnapshot
  previousAge: number
}

export interface BlocksCoalescedEvent {
  timestamp: number
  summary: CoalesceSummary
}

export interface BlocksAgedEvent {
  timestamp: number
  count: number
}

export interface MemoryInspectedEvent {
  timestamp: number
  report: MemoryReport
  text: string
}

export interface ActorFailedEvent {
  timestamp: number
  actor: string
  error: Error
}

// Define the complete event map
export interface EventMap {
  blockAllocated: [BlockAllocatedEvent]
  allocationSkipped: [AllocationSkippedEvent]
  blockReclaimed: [BlockReclaimedEvent]
  blocksCoalesced: [BlocksCoalescedEvent]
  blocksAged: [BlocksAgedEvent]
  memoryInspected: [MemoryInspectedEvent]
  actorFailed: [ActorFailedEvent]
}

// Helper type to get callback signature from event args
export type EventCallback<T extends unknown[]> = (
  ...args: T
) => Safe<void> | SafePromise<void> | void | Promise<void>

type CallbackRegistry = {
  [K in keyof EventMap]?: EventCallback<EventMap[K]>[]
}

// Type-safe event bus
export class EventBusService extends BaseService {
  private callbacks: CallbackRegistry = {}

  constructor() {
    super('event-bus')
  }

  override stop(): Safe<boolean> {
    this.callbacks = {}
    this.setRunning(false)
    return safeResult(true)
  }

  /**
   * Register a callback for an event
   */
  on<K extends keyof EventMap>(
    eventName: K,
    callback: EventCallback<EventMap[K]>,
  ): void {
    const callbacks: CallbackRegistry[K] = (this.callbacks[eventName] ??= [])
    callbacks.push(callback)
  }

  /**
   * Remove a callback for an event
   */
  off<K extends keyof EventMap>(
    eventName: K,
    callback: EventCallback<EventMap[K]>,
  ): void {
    const callbacks: CallbackRegistry[K] = this.callbacks[eventName]
    if (!callbacks) return

    const index = callbacks.indexOf(callback)
    if (index > -1) {
      callbacks.splice(index, 1)
    }
  }

  /**
   * Emit an event with type-safe arguments
   */
  async emit<K extends keyof EventMap>(
    eventName: K,
    ...args: EventMap[K]
  ): Promise<void> {
    const callbacks: CallbackRegistry[K] = this.callbacks[eventName]
    if (!callbacks) return

    // copy so a callback may unsubscribe itself mid-emit
    for (const callback of [...callbacks]) {
      try {
        const result = await callback(...args)
        // Handle Safe/SafePromise results
        if (result && Array.isArray(result) && result[0]) {
          logger.error(`Error in ${String(eventName)} callback`, result[0])
        }
      } catch (error) {
        logger.error(`Error in ${String(eventName)} callback`, error)
      }
    }
  }

  addBlockAllocatedCallback(
    callback: EventCallback<EventMap['blockAllocated']>,
  ): void {
    this.on('blockAllocated', callback)
  }

  addBlockReclaimedCallback(
    callback: EventCallback<EventMap['blockReclaimed']>,
  ): void {
    this.on('blockReclaimed', callback)
  }

  addMemoryInspectedCallback(
    callback: EventCallback<EventMap['memoryInspected']>,
  ): void {
    this.on('memoryInspected', callback)
  }

  addActorFailedCallback(
    callback: EventCallback<EventMap['actorFailed']>,
  ): void {
    this.on('actorFailed', callback)
  }

  emitBlockAllocated(event: BlockAllocatedEvent): Promise<void> {
    return this.emit('blockAllocated', event)
  }

  emitAllocationSkipped(event: AllocationSkippedEvent): Promise<void> {
    return this.emit('allocationSkipped', event)
  }

  emitBlockReclaimed(event: BlockReclaimedEvent): Promise<void> {
    return this.emit('blockReclaimed', event)
  }

  emitBlocksCoalesced(event: BlocksCoalescedEvent): Promise<void> {
    return this.emit('blocksCoalesced', event)
  }

  emitBlocksAged(event: BlocksAgedEvent): Promise<void> {
    return this.emit('blocksAged', event)
  }

  emitMemoryInspected(event: MemoryInspectedEvent): Promise<void> {
    return this.emit('memoryInspected', event)
  }

  emitActorFailed(event: ActorFailedEvent): Promise<void> {
    return this.emit('actorFailed', event)
  }
}
