/**
 * Task selection: decides which task the loop works on next.
 *
 * Pure functions over the task records; the caller always passes a freshly
 * loaded view of the store.
 */

import type { LoopMode } from '../../core/types.js'
import type { Task } from '../task-store/schemas.js'
import type { TaskTree } from '../task-store/task-tree.js'

/** A task chosen for the next iteration run, with the mode to run it in */
export interface Selection {
  task: Task
  mode: LoopMode
  /** True when the task was left `active` by an earlier run */
  resumed: boolean
}

/** A task the agent may work on directly */
export function isWorkable(task: Task): boolean {
  return task.leaf && task.status === 'pending'
}

/**
 * First workable task in file order, or null when none is available.
 * Never returns a container (`leaf: false`) task.
 */
export function nextWorkable(tasks: readonly Task[]): Task | null {
  return tasks.find(isWorkable) ?? null
}

/**
 * Choose the next task, in priority order:
 *  1. a task left `active` by an interrupted run (resumed)
 *  2. the next workable leaf
 *  3. a split parent whose children are all done, for re-evaluation
 */
export function selectNext(tree: TaskTree): Selection | null {
  const [interrupted] = tree.interrupted()
  if (interrupted !== undefined) {
    return { task: interrupted, mode: interrupted.leaf ? 'work' : 'verify', resumed: true }
  }

  const workable = nextWorkable(tree.tasks)
  if (workable !== null) {
    return { task: workable, mode: 'work', resumed: false }
  }

  const [review] = tree.awaitingReview()
  if (review !== undefined) {
    return { task: review, mode: 'verify', resumed: false }
  }

  return null
}
