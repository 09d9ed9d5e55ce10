/**
 * Types for `taskloop status` output.
 */

import type { TaskId, TaskStatus } from '../../core/types.js'

export interface StatusTaskNode {
  id: TaskId
  title: string
  status: TaskStatus
  leaf: boolean
  /** Depth below the nearest task shown as a root (0 for roots) */
  depth: number
  branch?: string
}

export interface BlockedTaskInfo {
  id: TaskId
  title: string
  reason: string
}

/** Point-in-time view of the task store */
export interface StatusSnapshot {
  /** Active tasks in tree order */
  tasks: StatusTaskNode[]
  counts: Record<TaskStatus, number>
  blocked: BlockedTaskInfo[]
  archivedCount: number
  /** Whether a stop request is waiting for the loop */
  stopRequested: boolean
}
