/**
 * Stuck-task recovery and task blocking.
 *
 * A task that reaches the iteration cap is blocked with a fixed reason and
 * its branch is parked, neither merged nor deleted, so an operator can
 * inspect it. The loop then moves on to other tasks.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { TaskId } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import type { BranchHandle, BranchWorkflowManager } from '../git/branch-workflow-manager.js'
import type { Task } from '../task-store/schemas.js'
import type { TaskStore } from '../task-store/task-store.js'
import { withStatus } from '../task-store/task-store-impl.js'

const logger = createLogger('stuck-recovery')

export const ITERATION_LIMIT_REASON = 'iteration limit reached'

/**
 * Move a task to `blocked` with `reason` and announce it. Blocked tasks are
 * not selected again until unblocked or re-split.
 */
export async function blockTask(
  store: TaskStore,
  eventBus: TypedEventBus,
  taskId: TaskId,
  reason: string,
): Promise<Task> {
  const blocked = await store.update(taskId, (task) => withStatus(task, 'blocked', reason))
  logger.warn({ taskId, reason }, 'Task blocked')
  eventBus.emit('task:blocked', { taskId, reason })
  return blocked
}

export class StuckTaskRecovery {
  private readonly _store: TaskStore
  private readonly _branches: BranchWorkflowManager
  private readonly _eventBus: TypedEventBus

  constructor(store: TaskStore, branches: BranchWorkflowManager, eventBus: TypedEventBus) {
    this._store = store
    this._branches = branches
    this._eventBus = eventBus
  }

  /** Block the task with the iteration-limit reason and park its branch */
  async handleStuck(taskId: TaskId, handle: BranchHandle): Promise<Task> {
    const blocked = await blockTask(this._store, this._eventBus, taskId, ITERATION_LIMIT_REASON)
    await this._branches.park(handle)
    logger.info({ taskId, branchName: handle.branchName }, 'Stuck task parked for inspection')
    return blocked
  }
}
