/**
 * reconcileStore: repairs the task store after a crash, before the first pass.
 *
 * Archiving appends to the archive before rewriting the active store, so a
 * crash between the two leaves a completed task in both files. Such records
 * are dropped from the active store.
 *
 * A task that is `complete` in the active store but absent from the archive
 * was never merged. It is put back to `active` so the selector resumes it on
 * its branch and the loop gets to merge it.
 *
 * Tasks left `active` are not touched: the selector resumes them first.
 */

import type { TaskId } from '../core/types.js'
import type { TaskStore } from '../modules/task-store/task-store.js'
import { withStatus } from '../modules/task-store/task-store-impl.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('crash-recovery')

export interface ReconcileResult {
  /** Completed tasks dropped from the active store because they were already archived */
  removed: TaskId[]
  /** Completed but unarchived tasks put back to active */
  resumed: TaskId[]
}

export async function reconcileStore(store: TaskStore): Promise<ReconcileResult> {
  const tree = await store.loadTree()
  const result: ReconcileResult = { removed: [], resumed: [] }

  const tasks = tree.tasks.flatMap((task) => {
    if (task.status !== 'complete') return [task]
    if (tree.isArchived(task.id)) {
      result.removed.push(task.id)
      return []
    }
    result.resumed.push(task.id)
    return [withStatus(task, 'active')]
  })

  if (result.removed.length === 0 && result.resumed.length === 0) {
    return result
  }

  await store.save(tasks)
  logger.warn(result, 'Task store reconciled after an interrupted run')
  return result
}
