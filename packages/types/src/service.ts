/**
 * Service Interface
 *
 * Defines a standardized lifecycle for every long-running component of the
 * simulator (actors, registry members, the main service)
 */

import { type Safe, type SafePromise, safeResult } from './safe'

/**
 * Standard service interface that all services must implement
 */
export interface Service {
  /** Service name for identification */
  readonly name: string
  /** Whether the service is initialized */
  initialized: boolean
  /** Whether the service is running */
  running: boolean

  /** Initialize the service (setup, configuration, etc.) */
  init(): Safe<boolean> | SafePromise<boolean>

  /** Start the service (begin operation) */
  start(): Safe<boolean> | SafePromise<boolean>

  /** Stop the service (clean shutdown) */
  stop(): Safe<boolean> | SafePromise<boolean>

  /** Get service status */
  getStatus(): ServiceStatus
}

/**
 * Service status information
 */
export interface ServiceStatus {
  /** Service name */
  name: string
  /** Whether the service is initialized */
  initialized: boolean
  /** Whether the service is running */
  running: boolean
  /** Service-specific status details */
  details?: Record<string, unknown>
}

/**
 * Base service class that provides common functionality
 */
export abstract class BaseService implements Service {
  initialized = false
  running = false
  constructor(public readonly name: string) {}

  init(): Safe<boolean> | SafePromise<boolean> {
    this.initialized = true
    return safeResult(true)
  }
  start(): Safe<boolean> | SafePromise<boolean> {
    this.running = true
    return safeResult(true)
  }
  stop(): Safe<boolean> | SafePromise<boolean> {
    this.running = false
    return safeResult(true)
  }

  getStatus(): ServiceStatus {
    return {
      name: this.name,
      initialized: this.initialized,
      running: this.running,
    }
  }

  protected setInitialized(value: boolean): void {
    this.initialized = value
  }

  protected setRunning(value: boolean): void {
    this.running = value
  }
}
