/**
 * Reclamation Service
 *
 * Garbage collector: each tick returns the oldest allocated block to the
 * free collection and coalesces the fragments left behind.
 */

import { logger } from '@blockmem/core'
import { reclaim } from '@blockmem/memory'
import type { CoalescePolicy } from '@blockmem/types'
import { ActorService, type ActorServiceOptions } from './actor-service'

export class ReclamationService extends ActorService {
  readonly essential = true
  private readonly coalescePolicy: CoalescePolicy

  constructor(
    options: ActorServiceOptions & { coalescePolicy?: CoalescePolicy },
  ) {
    super('reclamation-service', options)
    this.coalescePolicy = options.coalescePolicy ?? 'reservoir'
  }

  protected async tick(): Promise<void> {
    const outcome = await this.withMemory((state) =>
      reclaim(state, this.coalescePolicy),
    )
    if (outcome.kind === 'skipped') {
      logger.debug('Nothing to reclaim')
      return
    }

    logger.info('Reclaimed block', {
      id: outcome.block.id,
      size: outcome.block.size,
      previousAge: outcome.previousAge,
    })
    await this.eventBusService.emitBlockReclaimed({
      timestamp: Date.now(),
      block: outcome.block,
      previousAge: outcome.previousAge,
    })

    if (outcome.coalesce.merges.length > 0) {
      logger.info('Coalesced fragments', {
        policy: outcome.coalesce.policy,
        absorbed: outcome.coalesce.merges.map((merge) => merge.absorbed),
        unitsMoved: outcome.coalesce.unitsMoved,
      })
    }
    await this.eventBusService.emitBlocksCoalesced({
      timestamp: Date.now(),
      summary: outcome.coalesce,
    })
  }
}
