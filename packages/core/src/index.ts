/**
 * Core Package
 *
 * Logging, the event bus, environment loading and the concurrency
 * primitives shared by the engine and the actor services
 */

export * from './env'
export * from './event-bus'
// Export logger
export * from './logger'
export * from './mutex'
export * from './size-generator'
