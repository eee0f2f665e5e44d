import { logger } from '@blockmem/core'
import {
  type Safe,
  type SafePromise,
  type Service,
  type ServiceStatus,
  safeError,
  safeResult,
} from '@blockmem/types'

export interface ServiceFailure {
  service: Service
  error: Error
}

/**
 * Service registry for managing all services
 */
export class ServiceRegistry {
  private services: Map<string, Service> = new Map()

  /**
   * Register a service with the registry
   */
  register(service: Service): Safe<void> {
    if (this.services.has(service.name)) {
      return safeError(
        new Error(`Service with name '${service.name}' is already registered`),
      )
    }

    this.services.set(service.name, service)
    logger.debug('Service registered', { name: service.name })
    return safeResult(undefined)
  }

  /**
   * Get a service by name
   */
  get(name: string): Service | undefined {
    return this.services.get(name)
  }

  /**
   * Get all registered services
   */
  getAll(): Service[] {
    return Array.from(this.services.values())
  }

  /**
   * Initialize all services, collecting every failure
   */
  async initAll(): SafePromise<ServiceFailure[]> {
    const failures: ServiceFailure[] = []
    for (const service of this.services.values()) {
      const [initError] = await service.init()
      if (initError) {
        failures.push({ service, error: initError })
      }
    }

    for (const { service, error } of failures) {
      logger.error('Error initializing service', error, { name: service.name })
    }

    return safeResult(failures)
  }

  /**
   * Start services in registration order. Whether a failure is fatal is
   * the caller's decision; `isFatal` only stops the loop early.
   */
  async startAll(
    isFatal: (failure: ServiceFailure) => boolean = () => false,
  ): SafePromise<ServiceFailure[]> {
    const failures: ServiceFailure[] = []

    for (const service of this.services.values()) {
      const [startError] = await service.start()
      if (startError) {
        const failure = { service, error: startError }
        failures.push(failure)
        if (isFatal(failure)) break
      }
    }

    return safeResult(failures)
  }

  /**
   * Stop all services
   */
  async stopAll(): SafePromise<boolean> {
    const errors: Error[] = []

    for (const service of this.services.values()) {
      const [stopError] = await service.stop()
      if (stopError) {
        errors.push(stopError)
      }
    }

    for (const error of errors) {
      logger.error('Error stopping service', error)
    }

    return safeResult(errors.length === 0)
  }

  /**
   * Get status of all services
   */
  getAllStatus(): ServiceStatus[] {
    return Array.from(this.services.values()).map((service) =>
      service.getStatus(),
    )
  }
}
