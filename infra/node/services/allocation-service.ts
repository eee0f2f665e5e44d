/**
 * Allocation Service
 *
 * Draws a request size each tick and services it first-fit against the
 * free collection. A request that fits nowhere is dropped; the next tick
 * draws a new one.
 */

import { logger, type SizeGenerator } from '@blockmem/core'
import { allocate } from '@blockmem/memory'
import { ActorService, type ActorServiceOptions } from './actor-service'

export class AllocationService extends ActorService {
  readonly essential = true
  private readonly sizeGenerator: SizeGenerator

  constructor(options: ActorServiceOptions & { sizeGenerator: SizeGenerator }) {
    super('allocation-service', options)
    this.sizeGenerator = options.sizeGenerator
  }

  protected async tick(): Promise<void> {
    const requested = this.sizeGenerator.next()
    const outcome = await this.withMemory((state) => allocate(state, requested))

    if (outcome.kind === 'skipped') {
      logger.debug('Allocation skipped', {
        requested,
        reason: outcome.reason,
      })
      await this.eventBusService.emitAllocationSkipped({
        timestamp: Date.now(),
        requested,
        reason: outcome.reason,
      })
      return
    }

    logger.info('Allocated block', {
      id: outcome.block.id,
      base: outcome.block.base,
      size: outcome.block.size,
      split: outcome.kind === 'split',
    })
    await this.eventBusService.emitBlockAllocated({
      timestamp: Date.now(),
      outcome,
    })
  }
}
