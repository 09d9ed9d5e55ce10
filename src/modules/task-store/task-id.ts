/**
 * Hierarchical task id helpers.
 *
 * An id is a root segment followed by zero or more numeric child indices:
 *   "A"      root task
 *   "A.1"    first child of A
 *   "A.1.2"  second child of A.1
 *
 * The parent id is always derived from the id itself and never stored.
 */

import type { TaskId } from '../../core/types.js'

const ROOT_SEGMENT = /^[A-Za-z0-9_]+$/
const CHILD_SEGMENT = /^\d+$/
const NUMERIC = /^\d+$/

/**
 * Split an id into its segments, or return null when the id is malformed
 * (empty, empty segment, non-numeric child index).
 */
export function parseTaskId(id: string): string[] | null {
  if (id.length === 0) return null
  const segments = id.split('.')
  const [root, ...children] = segments
  if (root === undefined || !ROOT_SEGMENT.test(root)) return null
  for (const child of children) {
    if (!CHILD_SEGMENT.test(child)) return null
  }
  return segments
}

export function isValidTaskId(id: string): boolean {
  return parseTaskId(id) !== null
}

/** Number of segments; a root task has depth 1 */
export function depthOf(id: TaskId): number {
  return id.split('.').length
}

/** Parent id derived from the id, or null for a root task */
export function parentIdOf(id: TaskId): TaskId | null {
  const index = id.lastIndexOf('.')
  return index === -1 ? null : id.slice(0, index)
}

/** Numeric index of the last segment, or null for a root task */
export function childIndexOf(id: TaskId): number | null {
  if (parentIdOf(id) === null) return null
  const last = id.slice(id.lastIndexOf('.') + 1)
  return Number.parseInt(last, 10)
}

/** True when `candidate` is a strict descendant of `ancestor` */
export function isDescendantOf(candidate: TaskId, ancestor: TaskId): boolean {
  return candidate.startsWith(`${ancestor}.`)
}

/** True when `candidate` is a direct child of `parent` */
export function isChildOf(candidate: TaskId, parent: TaskId): boolean {
  return parentIdOf(candidate) === parent
}

/**
 * Order ids segment by segment: numeric segments compare as numbers
 * ("A.2" < "A.10"), anything else compares lexically; a parent sorts
 * before its descendants.
 */
export function compareTaskIds(a: TaskId, b: TaskId): number {
  const left = a.split('.')
  const right = b.split('.')
  const length = Math.min(left.length, right.length)
  for (let i = 0; i < length; i++) {
    const l = left[i] ?? ''
    const r = right[i] ?? ''
    if (l === r) continue
    if (NUMERIC.test(l) && NUMERIC.test(r)) {
      return Number.parseInt(l, 10) - Number.parseInt(r, 10)
    }
    return l < r ? -1 : 1
  }
  return left.length - right.length
}

/**
 * Next free child id under `parentId`: max existing child index + 1.
 * `knownIds` must include archived ids so ids are never reused.
 */
export function nextChildId(parentId: TaskId, knownIds: Iterable<TaskId>): TaskId {
  let max = 0
  for (const id of knownIds) {
    if (!isChildOf(id, parentId)) continue
    const index = childIndexOf(id)
    if (index !== null && index > max) max = index
  }
  return `${parentId}.${String(max + 1)}`
}

/**
 * Next free numeric root id: max numeric root + 1 (non-numeric roots such as
 * "A" do not take part). The first root is "1".
 */
export function nextRootId(knownIds: Iterable<TaskId>): TaskId {
  let max = 0
  for (const id of knownIds) {
    const root = id.split('.')[0] ?? ''
    if (!NUMERIC.test(root)) continue
    const value = Number.parseInt(root, 10)
    if (value > max) max = value
  }
  return String(max + 1)
}
