/**
 * BranchWorkflowManager: interface and types for per-task git branches.
 *
 * Responsible for:
 *  - Opening an isolated branch for the task being worked on
 *  - Reporting how many commits the agent has made on it
 *  - Squash-merging a finished task into the base branch
 *  - Abandoning or parking a branch that will not be merged
 *
 * Branch lifecycle per handle:
 *
 *   open ──► merged
 *     │ ──► abandoned
 *     └───► parked      (branch kept for inspection; also after a merge conflict)
 *
 * Any operation on a handle that is no longer `open` raises GitError. Only
 * one handle may be open at a time: the working copy is shared.
 *
 * Implementation: BranchWorkflowManagerImpl (branch-workflow-manager-impl.ts)
 */

import type { BaseService } from '../../core/lifecycle.js'
import type { TaskId } from '../../core/types.js'
import type { Task } from '../task-store/schemas.js'

export type BranchState = 'open' | 'merged' | 'abandoned' | 'parked'

/** Why a branch is merged: `complete` tags the commit with a `Completes:` trailer */
export type MergeReason = 'complete' | 'split'

export interface BranchHandle {
  taskId: TaskId
  branchName: string
  baseBranch: string
  /** True when an existing branch owned by the task was checked out again */
  reused: boolean
  state: BranchState
}

export interface BranchWorkflowManager extends BaseService {
  /** Branch that task branches start from and merge back into */
  baseBranch(): string

  /** Deterministic branch name for a task */
  branchNameFor(task: Task): string

  /**
   * Create and check out the task branch from the base branch. An existing
   * branch is reused only when `task.branch` names it.
   *
   * @throws BranchExistsError if the name is taken by a branch the task does not own
   * @throws GitError if another branch is still open
   */
  open(task: Task): Promise<BranchHandle>

  /** Commits on the branch since it left the base branch; makes no git writes */
  recordProgress(handle: BranchHandle): Promise<number>

  /**
   * Squash-merge into the base branch, commit, delete the branch. Only a
   * `complete` merge marks the task done in the commit message.
   *
   * @returns short hash of the resulting commit on the base branch
   * @throws MergeConflictError if the squash conflicts; the merge is reset and
   *         the handle is left `parked`
   */
  merge(handle: BranchHandle, title: string, reason?: MergeReason): Promise<string>

  /** Return to the base branch and delete the branch without merging */
  abandon(handle: BranchHandle): Promise<void>

  /** Return to the base branch and keep the branch */
  park(handle: BranchHandle): Promise<void>
}
