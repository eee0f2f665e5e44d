/**
 * Node Services
 *
 * Exports the actor services and the lifecycle plumbing around them
 */

export {
  ActorService,
  type ActorServiceOptions,
} from './actor-service'
export { AgingClockService } from './aging-clock-service'
export { AllocationService } from './allocation-service'
export {
  ConfigService,
  configFromEnv,
  DEFAULT_SIMULATION_CONFIG,
} from './config-service'
export { InspectorService, type ReportWriter } from './inspector-service'
export {
  MainService,
  type ActorContext,
  buildDefaultActors,
  type MainServiceOptions,
  type RunOptions,
  type StopReason,
} from './main-service'
export { ReclamationService } from './reclamation-service'
export { ServiceRegistry, type ServiceFailure } from './registry'
