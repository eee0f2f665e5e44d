/**
 * Simulation Configuration Service
 *
 * Resolves and exposes the startup parameters of the simulator.
 * Values come from the environment (validated by the core env schema),
 * with CLI overrides layered on top.
 */

import {
  loadSimulationEnv,
  parseSimulationEnv,
  type SimulationEnv,
} from '@blockmem/core'
import {
  BaseService,
  type CoalescePolicy,
  ConfigError,
  type IConfigService,
  MEMORY_CONSTANTS,
  REQUEST_CONSTANTS,
  type Safe,
  type SimulationConfig,
  type SimulationLogLevel,
  safeError,
  safeResult,
  TIMING_CONSTANTS,
} from '@blockmem/types'

type EnvParseResult = ReturnType<typeof parseSimulationEnv>

export const DEFAULT_SIMULATION_CONFIG: SimulationConfig = {
  blockCount: MEMORY_CONSTANTS.BLOCK_COUNT,
  blockSize: MEMORY_CONSTANTS.BLOCK_SIZE,
  arenaCapacity: MEMORY_CONSTANTS.ARENA_CAPACITY,
  minRequestSize: REQUEST_CONSTANTS.MIN_REQUEST_SIZE,
  maxRequestSize: REQUEST_CONSTANTS.MAX_REQUEST_SIZE,
  tickMs: TIMING_CONSTANTS.TICK_MS,
  allocationTicks: TIMING_CONSTANTS.ALLOCATION_TICKS,
  reclamationTicks: TIMING_CONSTANTS.RECLAMATION_TICKS,
  agingTicks: TIMING_CONSTANTS.AGING_TICKS,
  inspectionTicks: TIMING_CONSTANTS.INSPECTION_TICKS,
  coalescePolicy: 'reservoir',
  verifyInvariants: false,
  logLevel: 'info',
}

export function configFromEnv(env: SimulationEnv): SimulationConfig {
  return {
    blockCount: env.BLOCK_COUNT,
    blockSize: env.BLOCK_SIZE,
    arenaCapacity: env.ARENA_CAPACITY,
    minRequestSize: env.MIN_REQUEST_SIZE,
    maxRequestSize: env.MAX_REQUEST_SIZE,
    tickMs: env.TICK_MS,
    allocationTicks: env.ALLOCATION_TICKS,
    reclamationTicks: env.RECLAMATION_TICKS,
    agingTicks: env.AGING_TICKS,
    inspectionTicks: env.INSPECTION_TICKS,
    coalescePolicy: env.COALESCE_POLICY,
    verifyInvariants: env.VERIFY_INVARIANTS,
    logLevel: env.LOG_LEVEL,
  }
}

function toConfigResult(
  parsed: EnvParseResult,
): Safe<SimulationConfig, ConfigError> {
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`,
    )
    return safeError(
      new ConfigError(`Invalid simulation configuration`, issues),
    )
  }
  return safeResult(configFromEnv(parsed.data))
}

/**
 * Configuration Service
 *
 * Provides access to the startup parameters with support for:
 * - Built-in defaults
 * - Environment / .env overrides
 * - CLI overrides
 */
export class ConfigService extends BaseService implements IConfigService {
  constructor(
    private readonly config: SimulationConfig = DEFAULT_SIMULATION_CONFIG,
  ) {
    super('config-service')
  }

  /**
   * Validate a variable map (e.g. a test fixture) into a config service
   */
  static fromSource(
    source: Record<string, string | undefined>,
  ): Safe<ConfigService, ConfigError> {
    const [error, config] = toConfigResult(parseSimulationEnv(source))
    if (error) return safeError(error)
    return safeResult(new ConfigService(config))
  }

  /**
   * Load .env and process.env, with `overrides` winning
   */
  static load(
    overrides: Record<string, string | undefined> = {},
    envPath?: string,
  ): Safe<ConfigService, ConfigError> {
    const [error, config] = toConfigResult(
      loadSimulationEnv(overrides, envPath),
    )
    if (error) return safeError(error)
    return safeResult(new ConfigService(config))
  }

  get blockCount(): number {
    return this.config.blockCount
  }

  /**
   * Uniform initial block size B; free blocks below it are fragments
   */
  get blockSize(): number {
    return this.config.blockSize
  }

  get arenaCapacity(): number {
    return this.config.arenaCapacity
  }

  /** N * B */
  get totalUnits(): number {
    return this.config.blockCount * this.config.blockSize
  }

  get minRequestSize(): number {
    return this.config.minRequestSize
  }

  get maxRequestSize(): number {
    return this.config.maxRequestSize
  }

  get coalescePolicy(): CoalescePolicy {
    return this.config.coalescePolicy
  }

  get verifyInvariants(): boolean {
    return this.config.verifyInvariants
  }

  get logLevel(): SimulationLogLevel {
    return this.config.logLevel
  }

  get tickMs(): number {
    return this.config.tickMs
  }

  get allocationIntervalMs(): number {
    return this.config.allocationTicks * this.config.tickMs
  }

  get reclamationIntervalMs(): number {
    return this.config.reclamationTicks * this.config.tickMs
  }

  get agingIntervalMs(): number {
    return this.config.agingTicks * this.config.tickMs
  }

  get inspectionIntervalMs(): number {
    return this.config.inspectionTicks * this.config.tickMs
  }

  toJSON(): SimulationConfig {
    return { ...this.config }
  }
}
