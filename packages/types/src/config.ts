import type { CoalescePolicy } from './memory'

export type SimulationLogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error'

/**
 * Fully resolved startup parameters
 */
export interface SimulationConfig {
  blockCount: number
  blockSize: number
  arenaCapacity: number
  minRequestSize: number
  maxRequestSize: number
  tickMs: number
  allocationTicks: number
  reclamationTicks: number
  agingTicks: number
  inspectionTicks: number
  coalescePolicy: CoalescePolicy
  verifyInvariants: boolean
  logLevel: SimulationLogLevel
}

export interface IConfigService {
  readonly blockCount: number
  readonly blockSize: number
  readonly arenaCapacity: number
  readonly totalUnits: number
  readonly minRequestSize: number
  readonly maxRequestSize: number
  readonly coalescePolicy: CoalescePolicy
  readonly verifyInvariants: boolean
  readonly logLevel: SimulationLogLevel
  readonly allocationIntervalMs: number
  readonly reclamationIntervalMs: number
  readonly agingIntervalMs: number
  readonly inspectionIntervalMs: number
}
