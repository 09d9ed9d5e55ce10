/**
 * taskloop - Main module exports
 * Public API surface for embedding the loop
 */

// Core types
export * from './core/types.js'
export type { LoopEvents } from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'
export type { TypedEventBus } from './core/event-bus.js'
// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, setLogLevel, logger } from './utils/logger.js'
export * from './utils/helpers.js'

// Composition root
export { createTaskloop } from './core/taskloop-impl.js'
export type { Taskloop, TaskloopOptions } from './core/taskloop.js'

// Modules
export * from './modules/config/index.js'
export * from './modules/task-store/index.js'
export * from './modules/task-selector/index.js'
export * from './modules/trigger-engine/index.js'
export * from './modules/git/index.js'
export * from './modules/agent/index.js'
export * from './modules/iteration-controller/index.js'
export * from './modules/stuck-recovery/index.js'
export * from './modules/loop/index.js'
export * from './recovery/index.js'
