/**
 * TaskStore: interface for the durable task store.
 *
 * Responsible for:
 *  - Reading the active task collection, all-or-nothing
 *  - Rewriting it atomically (write-temp-then-rename)
 *  - Moving completed tasks to the append-only archive
 *  - Hierarchy queries (children, subtree) and operator edits
 *
 * The store keeps nothing in memory between calls: the agent writes the same
 * file, so every read goes back to disk.
 *
 * Implementation: JsonlTaskStore (task-store-impl.ts)
 */

import type { TaskId } from '../../core/types.js'
import type { ArchivedTask, Task } from './schemas.js'
import type { TaskTree } from './task-tree.js'

export interface TaskStore {
  /** Absolute path of the active task file */
  readonly tasksPath: string

  /** Absolute path of the archive file */
  readonly archivePath: string

  /**
   * Read all active task records in file order.
   *
   * @throws StoreCorruptError if any line is malformed, fails validation,
   *         carries a malformed id or repeats an id. Nothing is dropped silently.
   */
  load(): Promise<Task[]>

  /** Read the archive in append order */
  loadArchive(): Promise<ArchivedTask[]>

  /** Load active tasks and archived ids into a TaskTree */
  loadTree(): Promise<TaskTree>

  /** Atomically replace the active task collection */
  save(tasks: readonly Task[]): Promise<void>

  /**
   * Append the task to the archive with its completion metadata, then remove
   * it from the active collection. Archiving an id that is already archived
   * only performs the removal.
   */
  archive(task: Task, commitRef: string, timestamp: Date): Promise<ArchivedTask>

  /** Direct children of a task, ordered by child index */
  childrenOf(id: TaskId): Promise<Task[]>

  /** The task and all of its descendants at any depth */
  subtreeOf(id: TaskId): Promise<Task[]>

  /**
   * Load, replace one record with `mutate(record)` and save.
   *
   * @throws TaskNotFoundError if the id is not in the active store
   */
  update(id: TaskId, mutate: (task: Task) => Task): Promise<Task>

  /** Create a pending leaf task with the next free root or child id */
  add(title: string, parentId?: TaskId): Promise<Task>

  /**
   * Split a task into pending leaf children. The parent becomes a `split`
   * container (`leaf: false`); child ids continue after the highest existing
   * child index, archived children included.
   */
  split(id: TaskId, titles: readonly string[]): Promise<Task[]>

  /** Reset a blocked task to pending and clear its reason */
  unblock(id: TaskId): Promise<Task>
}
