/**
 * TaskTree: in-memory arena of active tasks indexed by id.
 *
 * The hierarchy is implied by the ids (parent = all segments but the last),
 * so every structural question is an explicit query over this index rather
 * than a walk over scattered status fields. File order is preserved for the
 * selector.
 */

import type { TaskId } from '../../core/types.js'
import type { Task } from './schemas.js'
import { compareTaskIds, isChildOf, isDescendantOf, nextChildId, parentIdOf } from './task-id.js'

export class TaskTree {
  private readonly _tasks: readonly Task[]
  private readonly _byId: Map<TaskId, Task>
  private readonly _archivedIds: ReadonlySet<TaskId>

  /**
   * @param tasks       - Active tasks in file order (ids must be unique)
   * @param archivedIds - Ids already moved to the archive
   */
  constructor(tasks: readonly Task[], archivedIds: Iterable<TaskId> = []) {
    this._tasks = tasks
    this._byId = new Map(tasks.map((task) => [task.id, task]))
    this._archivedIds = new Set(archivedIds)
  }

  /** Active tasks in file order */
  get tasks(): readonly Task[] {
    return this._tasks
  }

  get size(): number {
    return this._tasks.length
  }

  get(id: TaskId): Task | undefined {
    return this._byId.get(id)
  }

  has(id: TaskId): boolean {
    return this._byId.has(id)
  }

  /** Ids already moved to the archive */
  get archivedIds(): TaskId[] {
    return [...this._archivedIds]
  }

  isArchived(id: TaskId): boolean {
    return this._archivedIds.has(id)
  }

  parentOf(id: TaskId): Task | undefined {
    const parentId = parentIdOf(id)
    return parentId === null ? undefined : this._byId.get(parentId)
  }

  /** Direct children in the active store, ordered by child index */
  childrenOf(id: TaskId): Task[] {
    return this._tasks
      .filter((task) => isChildOf(task.id, id))
      .sort((a, b) => compareTaskIds(a.id, b.id))
  }

  /** The task itself (when active) followed by all active descendants, in id order */
  subtreeOf(id: TaskId): Task[] {
    return this._tasks
      .filter((task) => task.id === id || isDescendantOf(task.id, id))
      .sort((a, b) => compareTaskIds(a.id, b.id))
  }

  /** Next free child id, counting both active and archived children */
  nextChildId(parentId: TaskId): TaskId {
    return nextChildId(parentId, [...this._byId.keys(), ...this._archivedIds])
  }

  /** True when any direct child is still in the active store and not complete */
  hasOpenChildren(id: TaskId): boolean {
    return this.childrenOf(id).some((child) => child.status !== 'complete')
  }

  /** True when the task has at least one direct child, active or archived */
  hasAnyChildren(id: TaskId): boolean {
    if (this._tasks.some((task) => isChildOf(task.id, id))) return true
    for (const archivedId of this._archivedIds) {
      if (isChildOf(archivedId, id)) return true
    }
    return false
  }

  /**
   * Tasks left in `active`; the loop claims one task at a time, so any
   * active record seen at selection time was interrupted by a crash or stop.
   */
  interrupted(): Task[] {
    return this._tasks.filter((task) => task.status === 'active')
  }

  /**
   * Split parents whose children have all reached a terminal state and which
   * therefore need re-evaluation against their original goal.
   */
  awaitingReview(): Task[] {
    return this._tasks.filter(
      (task) =>
        task.status === 'split' &&
        !task.leaf &&
        this.hasAnyChildren(task.id) &&
        !this.hasOpenChildren(task.id),
    )
  }
}
