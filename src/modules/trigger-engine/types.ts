/**
 * Types shared by the trigger engine, the role loader and the iteration
 * controller that builds the context.
 */

import type { Task } from '../task-store/schemas.js'

/**
 * Everything a trigger condition may look at for one agent invocation.
 * Built fresh by the iteration controller before each call.
 */
export interface IterationContext {
  task: Task
  /** 1-based number of the invocation about to run on this task */
  iteration: number
  /** Commits on the task branch since it left the base branch */
  branchCommits: number
  lastIterationFailed: boolean
  /** The task is a split parent being re-evaluated against its goal */
  verifying: boolean
  /** Role name → iteration at which it was last applied to this task */
  roleHistory: ReadonlyMap<string, number>
}

/** A named block of instructions appended to the base prompt */
export interface Role {
  name: string
  content: string
}

/** Source of role content, keyed by role name */
export interface RoleLoader {
  /** Content for `name`, or null when no such role exists */
  load(name: string): Promise<Role | null>
}
