/**
 * Simulator Error Types
 *
 * Every failure the simulator can surface is a SimulationError carrying a
 * stable code. A tick that finds no work to do is not an error and never
 * produces one.
 */

export const SIMULATION_ERROR_CODES = {
  RESOURCE_EXHAUSTION: 'resource_exhaustion',
  INTEGRITY: 'integrity',
  ACTOR_STARTUP: 'actor_startup',
  INVALID_CONFIG: 'invalid_config',
} as const

export type SimulationErrorCode =
  (typeof SIMULATION_ERROR_CODES)[keyof typeof SIMULATION_ERROR_CODES]

export class SimulationError extends Error {
  constructor(
    message: string,
    public code: SimulationErrorCode,
    public context?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'SimulationError'
  }
}

/**
 * The arena could not create a block or collection.
 * Fatal at startup.
 */
export class ResourceExhaustionError extends SimulationError {
  constructor(
    message: string,
    public capacity?: number,
  ) {
    super(message, SIMULATION_ERROR_CODES.RESOURCE_EXHAUSTION, { capacity })
    this.name = 'ResourceExhaustionError'
  }
}

/**
 * A collection operation was applied to a block that is not where the caller
 * claims it is, or a structural invariant no longer holds.
 */
export class IntegrityError extends SimulationError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, SIMULATION_ERROR_CODES.INTEGRITY, context)
    this.name = 'IntegrityError'
  }
}

/**
 * An actor service failed to start
 */
export class ActorStartupError extends SimulationError {
  constructor(
    message: string,
    public actor: string,
    public essential: boolean,
  ) {
    super(message, SIMULATION_ERROR_CODES.ACTOR_STARTUP, { actor, essential })
    this.name = 'ActorStartupError'
  }
}

export class ConfigError extends SimulationError {
  constructor(
    message: string,
    public issues: string[] = [],
  ) {
    super(message, SIMULATION_ERROR_CODES.INVALID_CONFIG, { issues })
    this.name = 'ConfigError'
  }
}
