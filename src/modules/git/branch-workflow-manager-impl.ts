/**
 * BranchWorkflowManagerImpl: concrete implementation of BranchWorkflowManager.
 *
 * Architecture constraints:
 *  - Uses child_process.spawn for all git operations (via git-utils)
 *  - Branch names: "<prefix><taskId>-<slug>"
 *  - Works in the project working copy; no remote interaction
 *  - Implements BaseService lifecycle (initialize / shutdown)
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import { BranchExistsError, GitError, MergeConflictError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { Task } from '../task-store/schemas.js'
import type { BranchHandle, BranchWorkflowManager, MergeReason } from './branch-workflow-manager.js'
import { branchNameFor, DEFAULT_BRANCH_NAMING } from './branch-naming.js'
import type { BranchNamingOptions } from './branch-naming.js'
import * as gitUtils from './git-utils.js'

const logger = createLogger('branch-workflow')

export interface BranchWorkflowManagerOptions {
  projectRoot: string
  /** Defaults to the branch checked out when initialize() runs */
  baseBranch?: string
  naming?: BranchNamingOptions
}

/** Commit message for a squash merge */
export function squashCommitMessage(taskId: string, title: string, reason: MergeReason = 'complete'): string {
  const subject = `[${taskId}] ${title}`
  return reason === 'complete' ? `${subject}\n\nCompletes: ${taskId}` : subject
}

export class BranchWorkflowManagerImpl implements BranchWorkflowManager {
  private readonly _eventBus: TypedEventBus
  private readonly _projectRoot: string
  private readonly _naming: BranchNamingOptions
  private _baseBranch: string | null
  private _current: BranchHandle | null = null

  constructor(eventBus: TypedEventBus, options: BranchWorkflowManagerOptions) {
    this._eventBus = eventBus
    this._projectRoot = options.projectRoot
    this._naming = options.naming ?? DEFAULT_BRANCH_NAMING
    this._baseBranch = options.baseBranch ?? null
  }

  // ---------------------------------------------------------------------------
  // BaseService lifecycle
  // ---------------------------------------------------------------------------

  async initialize(): Promise<void> {
    await gitUtils.verifyGitVersion()

    if (this._baseBranch === null) {
      const current = await gitUtils.getCurrentBranch(this._projectRoot)
      if (current.startsWith(this._naming.prefix)) {
        throw new GitError(
          `The working copy is on task branch "${current}"; check out the base branch or pass --base-branch`,
          { branch: current },
        )
      }
      this._baseBranch = current
    } else if (!(await gitUtils.branchExists(this._baseBranch, this._projectRoot))) {
      throw new GitError(`Base branch "${this._baseBranch}" does not exist`, { branch: this._baseBranch })
    }

    logger.info({ baseBranch: this._baseBranch }, 'Branch workflow initialized')
  }

  async shutdown(): Promise<void> {
    if (this._current !== null) {
      logger.info({ branchName: this._current.branchName }, 'Parking open branch on shutdown')
      await this.park(this._current)
    }
  }

  // ---------------------------------------------------------------------------
  // BranchWorkflowManager
  // ---------------------------------------------------------------------------

  baseBranch(): string {
    if (this._baseBranch === null) {
      throw new GitError('Branch workflow used before initialize()')
    }
    return this._baseBranch
  }

  branchNameFor(task: Task): string {
    return branchNameFor(task, this._naming)
  }

  async open(task: Task): Promise<BranchHandle> {
    if (this._current !== null) {
      throw new GitError(
        `Cannot open a branch for task ${task.id}: "${this._current.branchName}" is still open`,
        { taskId: task.id, openBranch: this._current.branchName },
      )
    }

    const baseBranch = this.baseBranch()
    const branchName = this.branchNameFor(task)
    let reused = false

    if (await gitUtils.branchExists(branchName, this._projectRoot)) {
      if (task.branch !== branchName) {
        throw new BranchExistsError(branchName, task.id)
      }
      await gitUtils.checkoutBranch(branchName, this._projectRoot)
      reused = true
    } else {
      await gitUtils.createBranch(branchName, baseBranch, this._projectRoot)
    }

    const handle: BranchHandle = { taskId: task.id, branchName, baseBranch, reused, state: 'open' }
    this._current = handle
    logger.info({ taskId: task.id, branchName, reused }, 'Branch opened')
    this._eventBus.emit('branch:opened', { taskId: task.id, branchName, reused })
    return handle
  }

  async recordProgress(handle: BranchHandle): Promise<number> {
    this._assertOpen(handle, 'record progress on')
    return gitUtils.countCommitsSince(handle.baseBranch, handle.branchName, this._projectRoot)
  }

  async merge(handle: BranchHandle, title: string, reason: MergeReason = 'complete'): Promise<string> {
    this._assertOpen(handle, 'merge')
    const cwd = this._projectRoot

    await gitUtils.checkoutBranch(handle.baseBranch, cwd)
    const clean = await gitUtils.squashMerge(handle.branchName, cwd)

    if (!clean) {
      const conflictingFiles = await gitUtils.getConflictingFiles(cwd)
      await gitUtils.resetMerge(cwd)
      this._close(handle, 'parked')
      logger.warn({ taskId: handle.taskId, branchName: handle.branchName, conflictingFiles }, 'Squash merge conflicted')
      throw new MergeConflictError(handle.branchName, handle.taskId, conflictingFiles)
    }

    if (await gitUtils.hasStagedChanges(cwd)) {
      await gitUtils.commit(squashCommitMessage(handle.taskId, title, reason), cwd)
    } else {
      logger.info({ taskId: handle.taskId }, 'Nothing to commit after squash; recording the base head')
    }

    const commit = await gitUtils.getShortHead(cwd)
    await gitUtils.removeBranch(handle.branchName, cwd)
    this._close(handle, 'merged')

    logger.info({ taskId: handle.taskId, branchName: handle.branchName, commit }, 'Branch merged')
    this._eventBus.emit('branch:merged', { taskId: handle.taskId, branchName: handle.branchName, commit })
    return commit
  }

  async abandon(handle: BranchHandle): Promise<void> {
    this._assertOpen(handle, 'abandon')
    await gitUtils.checkoutBranch(handle.baseBranch, this._projectRoot)
    await gitUtils.removeBranch(handle.branchName, this._projectRoot)
    this._close(handle, 'abandoned')

    logger.info({ taskId: handle.taskId, branchName: handle.branchName }, 'Branch abandoned')
    this._eventBus.emit('branch:abandoned', { taskId: handle.taskId, branchName: handle.branchName })
  }

  async park(handle: BranchHandle): Promise<void> {
    this._assertOpen(handle, 'park')
    await gitUtils.checkoutBranch(handle.baseBranch, this._projectRoot)
    this._close(handle, 'parked')
    logger.info({ taskId: handle.taskId, branchName: handle.branchName }, 'Branch parked')
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  private _assertOpen(handle: BranchHandle, action: string): void {
    if (handle.state !== 'open' || this._current !== handle) {
      throw new GitError(`Cannot ${action} branch "${handle.branchName}": it is ${handle.state}`, {
        taskId: handle.taskId,
        branchName: handle.branchName,
        state: handle.state,
      })
    }
  }

  private _close(handle: BranchHandle, state: 'merged' | 'abandoned' | 'parked'): void {
    handle.state = state
    this._current = null
  }
}

export function createBranchWorkflowManager(
  eventBus: TypedEventBus,
  options: BranchWorkflowManagerOptions,
): BranchWorkflowManager {
  return new BranchWorkflowManagerImpl(eventBus, options)
}
