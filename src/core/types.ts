/**
 * Core types for taskloop
 * Shared type definitions used across all modules
 */

/** Dotted hierarchical task identifier, e.g. "A", "A.1", "A.1.2" */
export type TaskId = string

/** Lifecycle states of a task record */
export const TASK_STATUSES = ['pending', 'active', 'split', 'blocked', 'complete'] as const

/** Status of an individual task */
export type TaskStatus = (typeof TASK_STATUSES)[number]

/**
 * How the agent is asked to approach a task.
 *  - work:   do the leaf task, or split it when it is too big
 *  - verify: all children of a split task are done; check the original goal
 */
export type LoopMode = 'work' | 'verify'
