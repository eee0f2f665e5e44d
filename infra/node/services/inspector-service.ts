/**
 * Inspector Service
 *
 * Periodically dumps both collections. Read-only.
 */

import { logger } from '@blockmem/core'
import { formatReport, inspect } from '@blockmem/memory'
import { ActorService, type ActorServiceOptions } from './actor-service'

export type ReportWriter = (text: string) => void

const writeToStdout: ReportWriter = (text) => {
  process.stdout.write(`${text}\n`)
}

export class InspectorService extends ActorService {
  readonly essential = true
  private readonly write: ReportWriter

  constructor(options: ActorServiceOptions & { write?: ReportWriter }) {
    super('inspector-service', options)
    this.write = options.write ?? writeToStdout
  }

  protected async tick(): Promise<void> {
    const report = await this.withMemory(inspect)
    const text = formatReport(report)

    logger.debug('Memory report', {
      free: report.free.length,
      allocated: report.allocated.length,
    })
    this.write(text)
    await this.eventBusService.emitMemoryInspected({
      timestamp: Date.now(),
      report,
      text,
    })
  }
}
