/**
 * Human-readable status formatter for the `taskloop status` command.
 */

import type { TaskStatus } from '../../core/types.js'
import type { TaskTree } from '../../modules/task-store/task-tree.js'
import { compareTaskIds } from '../../modules/task-store/task-id.js'
import type { StatusSnapshot, StatusTaskNode } from '../types/status.js'
import { formatTable } from '../utils/formatting.js'

const STATUS_SYMBOLS: Record<TaskStatus, string> = {
  pending: '[ ]',
  active: '[>]',
  split: '[+]',
  blocked: '[!]',
  complete: '[x]',
}

// ---------------------------------------------------------------------------
// buildStatusSnapshot
// ---------------------------------------------------------------------------

/**
 * Flatten the active tree depth-first. A task whose parent is no longer in
 * the active store is shown as a root.
 */
export function buildStatusSnapshot(tree: TaskTree, stopRequested: boolean): StatusSnapshot {
  const tasks: StatusTaskNode[] = []

  const visit = (id: string, depth: number): void => {
    const task = tree.get(id)
    if (task === undefined) return
    tasks.push({
      id: task.id,
      title: task.title,
      status: task.status,
      leaf: task.leaf,
      depth,
      ...(task.branch !== undefined ? { branch: task.branch } : {}),
    })
    for (const child of tree.childrenOf(id)) {
      visit(child.id, depth + 1)
    }
  }

  const roots = tree.tasks
    .filter((task) => tree.parentOf(task.id) === undefined)
    .sort((a, b) => compareTaskIds(a.id, b.id))
  for (const root of roots) {
    visit(root.id, 0)
  }

  const counts: Record<TaskStatus, number> = { pending: 0, active: 0, split: 0, blocked: 0, complete: 0 }
  for (const task of tree.tasks) {
    counts[task.status]++
  }

  const blocked = tasks
    .filter((node) => node.status === 'blocked')
    .map((node) => ({ id: node.id, title: node.title, reason: tree.get(node.id)?.blocked_reason ?? '' }))

  return { tasks, counts, blocked, archivedCount: tree.archivedIds.length, stopRequested }
}

// ---------------------------------------------------------------------------
// renderStatusHuman
// ---------------------------------------------------------------------------

/**
 * Output sections:
 *  - the active tree, two spaces of indent per level
 *  - a counts table
 *  - blocked tasks with their reasons
 *  - a pending stop request, if any
 */
export function renderStatusHuman(snapshot: StatusSnapshot): string {
  const lines: string[] = []

  if (snapshot.tasks.length === 0) {
    lines.push('No active tasks.')
  }
  for (const node of snapshot.tasks) {
    const branch = node.branch !== undefined ? `  (${node.branch})` : ''
    lines.push(`${'  '.repeat(node.depth)}${STATUS_SYMBOLS[node.status]} ${node.id}  ${node.title}${branch}`)
  }

  lines.push('')
  lines.push(
    formatTable(
      ['Pending', 'Active', 'Split', 'Blocked', 'Archived'],
      [
        {
          pending: String(snapshot.counts.pending),
          active: String(snapshot.counts.active),
          split: String(snapshot.counts.split),
          blocked: String(snapshot.counts.blocked),
          archived: String(snapshot.archivedCount),
        },
      ],
      ['pending', 'active', 'split', 'blocked', 'archived'],
    ),
  )

  if (snapshot.blocked.length > 0) {
    lines.push('')
    lines.push('Blocked:')
    for (const task of snapshot.blocked) {
      lines.push(`  ${task.id}  ${task.title}: ${task.reason}`)
    }
  }

  if (snapshot.stopRequested) {
    lines.push('')
    lines.push('Stop requested: the loop exits before its next iteration.')
  }

  return lines.join('\n')
}
