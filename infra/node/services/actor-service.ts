/**
 * Actor Service
 *
 * Base for the periodic actors that share the memory state. Each actor runs
 * one unit of work per tick under the memory lock, then schedules its next
 * tick a fixed interval after the current one settles, so ticks of the same
 * actor never overlap.
 */

import { type EventBusService, logger } from '@blockmem/core'
import {
  type InvariantOptions,
  type MemoryState,
  verifyInvariants,
} from '@blockmem/memory'
import {
  ActorStartupError,
  BaseService,
  type Safe,
  type SafePromise,
  type ServiceStatus,
  safeError,
  safeResult,
  safeTry,
  TIMING_CONSTANTS,
} from '@blockmem/types'

export interface ActorServiceOptions {
  state: MemoryState
  eventBusService: EventBusService
  intervalMs: number
  /** Run the invariant checker inside every critical section */
  verifyInvariants?: boolean
  invariantOptions?: InvariantOptions
}

export abstract class ActorService extends BaseService {
  protected readonly state: MemoryState
  protected readonly eventBusService: EventBusService
  readonly intervalMs: number
  /** Whether the simulation can run without this actor */
  abstract readonly essential: boolean

  private readonly verify: boolean
  private readonly invariantOptions: InvariantOptions
  private tickTimer: NodeJS.Timeout | null = null
  private inFlight: Promise<void> | null = null
  private completedTicks = 0
  private lastError: Error | null = null

  constructor(name: string, options: ActorServiceOptions) {
    super(name)
    this.state = options.state
    this.eventBusService = options.eventBusService
    this.intervalMs = options.intervalMs
    this.verify = options.verifyInvariants ?? false
    this.invariantOptions = options.invariantOptions ?? {}
  }

  /** One unit of work */
  protected abstract tick(): Promise<void>

  get ticks(): number {
    return this.completedTicks
  }

  get failure(): Error | null {
    return this.lastError
  }

  override start(): Safe<boolean> {
    if (!this.initialized) {
      return safeError(
        new ActorStartupError(
          `${this.name} cannot start before init`,
          this.name,
          this.essential,
        ),
      )
    }
    if (
      !Number.isFinite(this.intervalMs) ||
      this.intervalMs <= 0 ||
      this.intervalMs > TIMING_CONSTANTS.MAX_TIMER_DELAY_MS
    ) {
      return safeError(
        new ActorStartupError(
          `${this.name} has invalid interval ${this.intervalMs}ms`,
          this.name,
          this.essential,
        ),
      )
    }
    if (this.running) {
      logger.debug(`${this.name} already running`)
      return safeResult(true)
    }

    this.setRunning(true)
    // a tick still settling from before a stop reschedules the chain itself
    if (!this.inFlight) {
      // first unit of work runs right away, then the actor paces itself
      this.scheduleTick(0)
    }
    logger.info(`Started ${this.name} with ${this.intervalMs}ms interval`)
    return safeResult(true)
  }

  /**
   * Cancel the pending tick and wait for one in flight to settle
   */
  override async stop(): SafePromise<boolean> {
    this.setRunning(false)
    this.clearTimer()
    if (this.inFlight) {
      await this.inFlight
    }
    return safeResult(true)
  }

  override getStatus(): ServiceStatus {
    return {
      ...super.getStatus(),
      details: {
        intervalMs: this.intervalMs,
        essential: this.essential,
        ticks: this.completedTicks,
        lastError: this.lastError?.message ?? null,
      },
    }
  }

  /**
   * Run `fn` as one critical section over the shared state, verifying the
   * invariants before the lock is released when verification is enabled
   */
  protected withMemory<T>(fn: (state: MemoryState) => T): Promise<T> {
    return this.state.withLock((state) => {
      const result = fn(state)
      if (this.verify) {
        const [violation] = verifyInvariants(state, this.invariantOptions)
        if (violation) throw violation
      }
      return result
    })
  }

  private scheduleTick(delayMs: number): void {
    this.tickTimer = setTimeout(() => {
      this.tickTimer = null
      this.inFlight = this.runTick().finally(() => {
        this.inFlight = null
        if (this.running && this.tickTimer === null) {
          this.scheduleTick(this.intervalMs)
        }
      })
    }, delayMs)
  }

  private async runTick(): Promise<void> {
    const [error] = await safeTry(() => this.tick())
    if (error) {
      await this.fail(error)
      return
    }
    this.completedTicks++
  }

  /**
   * A failed tick halts the actor for good; corrupted state is never worked on
   */
  private async fail(error: Error): Promise<void> {
    this.lastError = error
    this.setRunning(false)
    this.clearTimer()
    logger.error(`${this.name} tick failed`, error)
    await this.eventBusService.emitActorFailed({
      timestamp: Date.now(),
      actor: this.name,
      error,
    })
  }

  private clearTimer(): void {
    if (this.tickTimer) {
      clearTimeout(this.tickTimer)
      this.tickTimer = null
    }
  }
}
