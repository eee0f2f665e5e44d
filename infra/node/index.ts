/**
 * Block memory simulator node
 *
 * The actor services, their shared lifecycle and the main service that
 * wires them to one memory state
 */

export * from './services'
