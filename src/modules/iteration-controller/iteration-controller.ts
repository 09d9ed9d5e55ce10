/**
 * IterationController: drives one task to an outcome per call.
 *
 * Responsible for:
 *  - Selecting the task and opening its branch
 *  - Running up to `maxIterations` agent invocations, each with a fresh
 *    context, role and prompt
 *  - Acting on the status the agent leaves in the task store
 *  - Merging and archiving finished work, or routing it to recovery
 *
 * Implementation: IterationControllerImpl (iteration-controller-impl.ts)
 */

import type { TaskId } from '../../core/types.js'

export type IterationOutcome =
  /** Nothing to work on */
  | { kind: 'idle' }
  | { kind: 'completed'; taskId: TaskId; commit: string }
  /** The task was split; a child is picked on the next pass */
  | { kind: 'split'; taskId: TaskId; children: TaskId[] }
  | { kind: 'blocked'; taskId: TaskId; reason: string }
  /** The iteration cap was reached */
  | { kind: 'stuck'; taskId: TaskId }
  /** A stop was requested between iterations; the task stays active */
  | { kind: 'stopped'; taskId: TaskId }
  /** The task disappeared from the store mid-run */
  | { kind: 'vanished'; taskId: TaskId }

/** Cooperative stop request, polled between iterations */
export interface StopCheck {
  isRequested(): Promise<boolean>
}

export interface IterationController {
  runOnce(): Promise<IterationOutcome>
}
