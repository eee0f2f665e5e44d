/**
 * Aging Clock Service
 *
 * Advances the residency age of every allocated block once per tick. Not
 * essential: without it reclamation still works, only its oldest-first
 * choice degrades to collection order.
 */

import { logger } from '@blockmem/core'
import { advanceAges } from '@blockmem/memory'
import { ActorService, type ActorServiceOptions } from './actor-service'

export class AgingClockService extends ActorService {
  readonly essential = false

  constructor(options: ActorServiceOptions) {
    super('aging-clock-service', options)
  }

  protected async tick(): Promise<void> {
    const count = await this.withMemory(advanceAges)
    if (count === 0) return

    logger.debug('Aged allocated blocks', { count })
    await this.eventBusService.emitBlocksAged({
      timestamp: Date.now(),
      count,
    })
  }
}
