/**
 * LoopEvents interface: defines all typed events for the event bus.
 *
 * Event naming convention: {subject}:{action} (e.g. "task:completed", "branch:merged")
 */

import type { LoopMode, TaskId } from './types.js'

/**
 * Complete typed map of all events emitted on the loop event bus.
 * Use `keyof LoopEvents` to constrain event keys.
 */
export interface LoopEvents {
  // -------------------------------------------------------------------------
  // Task lifecycle
  // -------------------------------------------------------------------------

  /** A task was selected and marked active */
  'task:claimed': { taskId: TaskId; title: string; mode: LoopMode }

  /** The agent marked the task complete and it was merged and archived */
  'task:completed': { taskId: TaskId; title: string; commit: string }

  /** The agent split the task into children */
  'task:split': { taskId: TaskId; children: TaskId[] }

  /** The task was moved to blocked */
  'task:blocked': { taskId: TaskId; reason: string }

  // -------------------------------------------------------------------------
  // Iterations
  // -------------------------------------------------------------------------

  /** An agent invocation is about to start */
  'iteration:started': { taskId: TaskId; iteration: number; maxIterations: number; role: string | null }

  /** An agent invocation failed (after any retries) */
  'iteration:failed': { taskId: TaskId; iteration: number; kind: string; message: string }

  /** A role's content was appended to the prompt */
  'role:applied': { taskId: TaskId; iteration: number; role: string }

  // -------------------------------------------------------------------------
  // Branches
  // -------------------------------------------------------------------------

  'branch:opened': { taskId: TaskId; branchName: string; reused: boolean }

  'branch:merged': { taskId: TaskId; branchName: string; commit: string }

  'branch:abandoned': { taskId: TaskId; branchName: string }

  // -------------------------------------------------------------------------
  // Outer loop
  // -------------------------------------------------------------------------

  /** No task can be worked on */
  'loop:idle': { daemon: boolean }

  /** The loop is exiting */
  'loop:stopped': { reason: 'signal' | 'idle' }
}
