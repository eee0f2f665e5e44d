/**
 * Main Service - Entry Point for the simulator
 *
 * Builds the shared memory state, wires the four actors to it and the
 * event bus, and owns the application lifecycle
 */

import {
  createUniformSizeGenerator,
  EventBusService,
  logger,
  type SizeGenerator,
} from '@blockmem/core'
import { MemoryState } from '@blockmem/memory'
import {
  ActorStartupError,
  BaseService,
  type SafePromise,
  type ServiceStatus,
  safeError,
  safeResult,
} from '@blockmem/types'
import type { ActorService } from './actor-service'
import { AgingClockService } from './aging-clock-service'
import { AllocationService } from './allocation-service'
import type { ConfigService } from './config-service'
import { InspectorService, type ReportWriter } from './inspector-service'
import { ReclamationService } from './reclamation-service'
import { ServiceRegistry } from './registry'

export type StopReason =
  | { kind: 'signal' }
  | { kind: 'duration' }
  | { kind: 'manual' }
  | { kind: 'failure'; actor: string; error: Error }

/**
 * Everything an actor needs, shared by all of them
 */
export interface ActorContext {
  state: MemoryState
  eventBusService: EventBusService
  configService: ConfigService
  sizeGenerator: SizeGenerator
  reportWriter?: ReportWriter
}

/**
 * The four actors of the simulation, in start order
 */
export function buildDefaultActors(context: ActorContext): ActorService[] {
  const { configService: config } = context
  const shared = {
    state: context.state,
    eventBusService: context.eventBusService,
    verifyInvariants: config.verifyInvariants,
    invariantOptions: {
      checkAddressPartition: config.coalescePolicy === 'adjacent',
    },
  }
  return [
    new AllocationService({
      ...shared,
      intervalMs: config.allocationIntervalMs,
      sizeGenerator: context.sizeGenerator,
    }),
    new ReclamationService({
      ...shared,
      intervalMs: config.reclamationIntervalMs,
      coalescePolicy: config.coalescePolicy,
    }),
    new InspectorService({
      ...shared,
      intervalMs: config.inspectionIntervalMs,
      write: context.reportWriter,
    }),
    new AgingClockService({
      ...shared,
      intervalMs: config.agingIntervalMs,
    }),
  ]
}

export interface MainServiceOptions {
  configService: ConfigService
  /** Defaults to a uniform generator over the configured request range */
  sizeGenerator?: SizeGenerator
  eventBusService?: EventBusService
  /** Where the inspector writes its dumps; stdout by default */
  reportWriter?: ReportWriter
  /** Replaces the default actor set */
  createActors?: (context: ActorContext) => ActorService[]
}

export interface RunOptions {
  /** Stop on our own after this many milliseconds */
  durationMs?: number
  /** Stop when aborted (e.g. on SIGINT) */
  signal?: AbortSignal
}

/**
 * Main service implementation
 */
export class MainService extends BaseService {
  private readonly configService: ConfigService
  private readonly eventBusService: EventBusService
  private readonly sizeGenerator: SizeGenerator
  private readonly reportWriter: ReportWriter | undefined
  private readonly createActors: (context: ActorContext) => ActorService[]
  private readonly registry = new ServiceRegistry()
  private memoryState: MemoryState | null = null
  private actors: ActorService[] = []

  private resolveStop: ((reason: StopReason) => void) | null = null
  private readonly stopRequested = new Promise<StopReason>((resolve) => {
    this.resolveStop = resolve
  })

  constructor(options: MainServiceOptions) {
    super('main-service')
    this.configService = options.configService
    this.eventBusService = options.eventBusService ?? new EventBusService()
    this.sizeGenerator =
      options.sizeGenerator ??
      createUniformSizeGenerator(
        this.configService.minRequestSize,
        this.configService.maxRequestSize,
      )
    this.reportWriter = options.reportWriter
    this.createActors = options.createActors ?? buildDefaultActors
  }

  get state(): MemoryState | null {
    return this.memoryState
  }

  /**
   * Partition the address space and construct the actors.
   * Failing to build the initial state is fatal.
   */
  override async init(): SafePromise<boolean> {
    if (this.initialized) return safeResult(true)

    const config = this.configService
    const [stateError, state] = MemoryState.create({
      blockCount: config.blockCount,
      blockSize: config.blockSize,
      arenaCapacity: config.arenaCapacity,
    })
    if (stateError) {
      logger.error('Failed to build initial memory state', stateError)
      return safeError(stateError)
    }
    this.memoryState = state
    logger.info('Initialized memory', {
      blocks: config.blockCount,
      blockSize: config.blockSize,
      totalUnits: state.totalUnits,
    })

    this.actors = this.createActors({
      state,
      eventBusService: this.eventBusService,
      configService: config,
      sizeGenerator: this.sizeGenerator,
      reportWriter: this.reportWriter,
    })

    for (const actor of this.actors) {
      const [registerError] = this.registry.register(actor)
      if (registerError) return safeError(registerError)
    }
    const [registerError] = this.registry.register(this.eventBusService)
    if (registerError) return safeError(registerError)

    this.eventBusService.addActorFailedCallback((event) => {
      this.requestStop({
        kind: 'failure',
        actor: event.actor,
        error: event.error,
      })
    })

    const [, initFailures] = await this.registry.initAll()
    const firstFailure = initFailures?.[0]
    if (firstFailure) return safeError(firstFailure.error)

    this.setInitialized(true)
    return safeResult(true)
  }

  /**
   * Start every actor. An essential actor that fails to start aborts the
   * whole start; the aging clock only earns a warning.
   */
  override async start(): SafePromise<boolean> {
    if (!this.initialized) {
      return safeError(
        new ActorStartupError('Main service started before init', this.name, true),
      )
    }

    const [, failures] = await this.registry.startAll((failure) =>
      this.isEssential(failure.service.name),
    )

    for (const { service, error } of failures ?? []) {
      if (this.isEssential(service.name)) {
        logger.error('Essential actor failed to start', error, {
          name: service.name,
        })
        await this.registry.stopAll()
        return safeError(
          error instanceof ActorStartupError
            ? error
            : new ActorStartupError(error.message, service.name, true),
        )
      }
      logger.warn('Optional actor failed to start, continuing without it', {
        name: service.name,
        error: error.message,
      })
    }

    this.setRunning(true)
    logger.info('Simulation started')
    return safeResult(true)
  }

  override async stop(): SafePromise<boolean> {
    this.requestStop({ kind: 'manual' })
    const result = await this.registry.stopAll()
    this.setRunning(false)
    return result
  }

  /**
   * Init, start, then block until a stop is requested (duration elapsed,
   * signal aborted, explicit stop or an actor failure) and shut down.
   * Resolves to the stop reason; an actor failure comes back as the error.
   */
  async run(options: RunOptions = {}): SafePromise<StopReason> {
    const [initError] = await this.init()
    if (initError) return safeError(initError)
    const [startError] = await this.start()
    if (startError) return safeError(startError)

    let durationTimer: NodeJS.Timeout | null = null
    if (options.durationMs !== undefined) {
      durationTimer = setTimeout(
        () => this.requestStop({ kind: 'duration' }),
        options.durationMs,
      )
    }
    const onAbort = () => this.requestStop({ kind: 'signal' })
    if (options.signal?.aborted) {
      onAbort()
    } else {
      options.signal?.addEventListener('abort', onAbort, { once: true })
    }

    const reason = await this.stopRequested

    if (durationTimer) clearTimeout(durationTimer)
    options.signal?.removeEventListener('abort', onAbort)
    await this.stop()
    logger.info('Simulation stopped', { reason: reason.kind })

    if (reason.kind === 'failure') return safeError(reason.error)
    return safeResult(reason)
  }

  requestStop(reason: StopReason): void {
    // only the first request counts
    if (this.resolveStop) {
      this.resolveStop(reason)
      this.resolveStop = null
    }
  }

  getActor(name: string): ActorService | undefined {
    return this.actors.find((actor) => actor.name === name)
  }

  getAllStatus(): ServiceStatus[] {
    return this.registry.getAllStatus()
  }

  private isEssential(name: string): boolean {
    return this.actors.find((actor) => actor.name === name)?.essential ?? true
  }
}
