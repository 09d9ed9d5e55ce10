/**
 * JsonlTaskStore: TaskStore backed by two line-oriented JSON files:
 *   tasks.jsonl       active tasks, rewritten atomically
 *   tasks-done.jsonl  completed tasks, append-only
 */

import { appendFile, mkdir, readFile, rename, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { StoreCorruptError, TaskNotFoundError, TaskStateError } from '../../core/errors.js'
import type { TaskId, TaskStatus } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { ArchivedTaskSchema, TaskRecordSchema } from './schemas.js'
import type { ArchivedTask, Task } from './schemas.js'
import { isDescendantOf, nextChildId, nextRootId, parentIdOf } from './task-id.js'
import type { TaskStore } from './task-store.js'
import { TaskTree } from './task-tree.js'

const logger = createLogger('task-store')

// ---------------------------------------------------------------------------
// Record helpers
// ---------------------------------------------------------------------------

/**
 * Return a copy of `task` in `status`. `blocked_reason` is kept only for
 * blocked tasks.
 */
export function withStatus(task: Task, status: TaskStatus, blockedReason?: string): Task {
  const { blocked_reason: _previous, ...rest } = task
  if (status === 'blocked') {
    return { ...rest, status, blocked_reason: blockedReason ?? _previous ?? 'blocked' }
  }
  return { ...rest, status }
}

function describeIssues(issues: ReadonlyArray<{ path: (string | number)[]; message: string }>): string {
  return issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(record)'}: ${issue.message}`)
    .join('; ')
}

/**
 * Parse the content of a task file. Blank lines are skipped; anything else
 * must be a valid, uniquely identified task record.
 *
 * @throws StoreCorruptError naming the offending line
 */
export function parseTaskLines(content: string, source: string): Task[] {
  const tasks: Task[] = []
  const seen = new Map<TaskId, number>()
  const lines = content.split('\n')

  for (let i = 0; i < lines.length; i++) {
    const line = (lines[i] ?? '').trim()
    if (line.length === 0) continue
    const lineNumber = i + 1

    let json: unknown
    try {
      json = JSON.parse(line)
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err)
      throw new StoreCorruptError(`${source}:${String(lineNumber)}: invalid JSON (${detail})`, {
        source,
        line: lineNumber,
      })
    }

    const parsed = TaskRecordSchema.safeParse(json)
    if (!parsed.success) {
      throw new StoreCorruptError(
        `${source}:${String(lineNumber)}: invalid task record (${describeIssues(parsed.error.issues)})`,
        { source, line: lineNumber },
      )
    }

    const task = parsed.data
    const firstLine = seen.get(task.id)
    if (firstLine !== undefined) {
      throw new StoreCorruptError(
        `${source}:${String(lineNumber)}: duplicate task id "${task.id}" (first seen on line ${String(firstLine)})`,
        { source, line: lineNumber, taskId: task.id },
      )
    }
    seen.set(task.id, lineNumber)
    tasks.push(task)
  }

  return tasks
}

/**
 * Reject a malformed hierarchy: a task whose parent is in neither the active
 * store nor the archive, or a leaf that has children. A task the agent marked
 * `split` may still carry `leaf: true`; the loop clears it.
 *
 * @throws StoreCorruptError naming the first offending task
 */
export function checkHierarchy(tasks: readonly Task[], archivedIds: Iterable<TaskId>, source: string): void {
  const known = new Set<TaskId>(archivedIds)
  for (const task of tasks) known.add(task.id)

  const childrenByParent = new Map<TaskId, TaskId[]>()
  for (const id of known) {
    const parentId = parentIdOf(id)
    if (parentId === null) continue
    childrenByParent.set(parentId, [...(childrenByParent.get(parentId) ?? []), id])
  }

  for (const task of tasks) {
    const parentId = parentIdOf(task.id)
    if (parentId !== null && !known.has(parentId)) {
      throw new StoreCorruptError(
        `${source}: task "${task.id}" has no parent "${parentId}" in the active store or the archive`,
        { source, taskId: task.id },
      )
    }

    const children = childrenByParent.get(task.id)
    if (task.leaf && task.status !== 'split' && children !== undefined) {
      throw new StoreCorruptError(
        `${source}: task "${task.id}" is a leaf but has children (${children.join(', ')})`,
        { source, taskId: task.id },
      )
    }
  }
}

/** Parse the archive file with the same all-or-nothing rule */
export function parseArchiveLines(content: string, source: string): ArchivedTask[] {
  const records: ArchivedTask[] = []
  const lines = content.split('\n')

  for (let i = 0; i < lines.length; i++) {
    const line = (lines[i] ?? '').trim()
    if (line.length === 0) continue
    const lineNumber = i + 1

    let json: unknown
    try {
      json = JSON.parse(line)
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err)
      throw new StoreCorruptError(`${source}:${String(lineNumber)}: invalid JSON (${detail})`, {
        source,
        line: lineNumber,
      })
    }

    const parsed = ArchivedTaskSchema.safeParse(json)
    if (!parsed.success) {
      throw new StoreCorruptError(
        `${source}:${String(lineNumber)}: invalid archive record (${describeIssues(parsed.error.issues)})`,
        { source, line: lineNumber },
      )
    }
    records.push(parsed.data)
  }

  return records
}

function serialize(records: readonly object[]): string {
  if (records.length === 0) return ''
  return records.map((record) => JSON.stringify(record)).join('\n') + '\n'
}

/** Index just after the last record of `id`'s subtree, or the end of the list */
function insertionIndex(tasks: readonly Task[], id: TaskId): number {
  let index = -1
  tasks.forEach((task, i) => {
    if (task.id === id || isDescendantOf(task.id, id)) index = i
  })
  return index === -1 ? tasks.length : index + 1
}

// ---------------------------------------------------------------------------
// JsonlTaskStore
// ---------------------------------------------------------------------------

export interface JsonlTaskStoreOptions {
  tasksPath: string
  archivePath: string
}

export class JsonlTaskStore implements TaskStore {
  readonly tasksPath: string
  readonly archivePath: string

  constructor(options: JsonlTaskStoreOptions) {
    this.tasksPath = options.tasksPath
    this.archivePath = options.archivePath
  }

  async load(): Promise<Task[]> {
    const { tasks } = await this._loadChecked()
    return tasks
  }

  async loadArchive(): Promise<ArchivedTask[]> {
    const content = await this._readIfExists(this.archivePath)
    if (content === null) return []
    return parseArchiveLines(content, this.archivePath)
  }

  async loadTree(): Promise<TaskTree> {
    const { tasks, archivedIds } = await this._loadChecked()
    return new TaskTree(tasks, archivedIds)
  }

  async save(tasks: readonly Task[]): Promise<void> {
    const ids = new Set<TaskId>()
    for (const task of tasks) {
      if (ids.has(task.id)) {
        throw new StoreCorruptError(`Refusing to save duplicate task id "${task.id}"`, { taskId: task.id })
      }
      ids.add(task.id)
    }

    await mkdir(dirname(this.tasksPath), { recursive: true })
    const tempPath = `${this.tasksPath}.${String(process.pid)}.tmp`
    await writeFile(tempPath, serialize(tasks), 'utf-8')
    await rename(tempPath, this.tasksPath)
    logger.debug({ count: tasks.length }, 'Task store saved')
  }

  async archive(task: Task, commitRef: string, timestamp: Date): Promise<ArchivedTask> {
    if (commitRef.trim().length === 0) {
      throw new TaskStateError(`Cannot archive task ${task.id} without a commit reference`, {
        taskId: task.id,
      })
    }

    const { blocked_reason: _reason, ...rest } = task
    const record: ArchivedTask = {
      ...rest,
      status: 'complete',
      completed: timestamp.toISOString(),
      commit: commitRef,
    }

    // Archive first, then remove: a crash in between leaves a duplicate the
    // start-up reconciliation clears, never a lost task.
    const archived = await this.loadArchive()
    if (archived.some((existing) => existing.id === task.id)) {
      logger.warn({ taskId: task.id }, 'Task already archived; only removing it from the active store')
    } else {
      await mkdir(dirname(this.archivePath), { recursive: true })
      await appendFile(this.archivePath, serialize([record]), 'utf-8')
    }

    const active = await this.load()
    await this.save(active.filter((candidate) => candidate.id !== task.id))
    logger.info({ taskId: task.id, commit: commitRef }, 'Task archived')
    return record
  }

  async childrenOf(id: TaskId): Promise<Task[]> {
    const tree = await this.loadTree()
    return tree.childrenOf(id)
  }

  async subtreeOf(id: TaskId): Promise<Task[]> {
    const tree = await this.loadTree()
    return tree.subtreeOf(id)
  }

  async update(id: TaskId, mutate: (task: Task) => Task): Promise<Task> {
    const tasks = await this.load()
    const index = tasks.findIndex((task) => task.id === id)
    const current = tasks[index]
    if (current === undefined) {
      throw new TaskNotFoundError(id)
    }

    const next = mutate(current)
    if (next.id !== id) {
      throw new TaskStateError(`update() may not change a task id (${id} -> ${next.id})`, { taskId: id })
    }
    tasks[index] = next
    await this.save(tasks)
    return next
  }

  async add(title: string, parentId?: TaskId): Promise<Task> {
    const tree = await this.loadTree()
    const tasks = [...tree.tasks]

    if (parentId === undefined) {
      const task: Task = {
        id: nextRootId([...tasks.map((task) => task.id), ...tree.archivedIds]),
        title,
        status: 'pending',
        leaf: true,
      }
      tasks.push(task)
      await this.save(tasks)
      return task
    }

    const parent = tree.get(parentId)
    if (parent === undefined) {
      throw new TaskNotFoundError(parentId)
    }
    if (parent.leaf) {
      throw new TaskStateError(
        `Task ${parentId} is a leaf; split it to turn it into a container`,
        { taskId: parentId },
      )
    }

    const child: Task = { id: tree.nextChildId(parentId), title, status: 'pending', leaf: true }
    tasks.splice(insertionIndex(tasks, parentId), 0, child)
    await this.save(tasks)
    return child
  }

  async split(id: TaskId, titles: readonly string[]): Promise<Task[]> {
    if (titles.length === 0) {
      throw new TaskStateError(`Splitting task ${id} needs at least one child title`, { taskId: id })
    }

    const tree = await this.loadTree()
    const parent = tree.get(id)
    if (parent === undefined) {
      throw new TaskNotFoundError(id)
    }
    if (parent.status === 'complete') {
      throw new TaskStateError(`Task ${id} is complete and cannot be split`, { taskId: id })
    }

    const knownIds = [...tree.tasks.map((task) => task.id), ...tree.archivedIds]
    const children: Task[] = []
    for (const title of titles) {
      const child: Task = { id: nextChildId(id, knownIds), title, status: 'pending', leaf: true }
      knownIds.push(child.id)
      children.push(child)
    }

    const tasks = tree.tasks.map((task) =>
      task.id === id ? { ...withStatus(task, 'split'), leaf: false } : task,
    )
    tasks.splice(insertionIndex(tasks, id), 0, ...children)
    await this.save(tasks)
    logger.info({ taskId: id, children: children.map((child) => child.id) }, 'Task split')
    return children
  }

  async unblock(id: TaskId): Promise<Task> {
    return this.update(id, (task) => {
      if (task.status !== 'blocked') {
        throw new TaskStateError(`Task ${id} is ${task.status}, not blocked`, { taskId: id })
      }
      return withStatus(task, 'pending')
    })
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  private async _loadChecked(): Promise<{ tasks: Task[]; archivedIds: TaskId[] }> {
    const content = await this._readIfExists(this.tasksPath)
    const tasks = content === null ? [] : parseTaskLines(content, this.tasksPath)
    const archivedIds = (await this.loadArchive()).map((record) => record.id)
    checkHierarchy(tasks, archivedIds, this.tasksPath)
    return { tasks, archivedIds }
  }

  private async _readIfExists(path: string): Promise<string | null> {
    try {
      return await readFile(path, 'utf-8')
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return null
      }
      throw err
    }
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createTaskStore(options: JsonlTaskStoreOptions): TaskStore {
  return new JsonlTaskStore(options)
}
