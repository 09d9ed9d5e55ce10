/**
 * In-process test doubles for the git branch workflow and the agent process.
 */

import { BranchExistsError, GitError, MergeConflictError } from '../../src/core/errors.js'
import type { TaskId } from '../../src/core/types.js'
import type { AgentRequest, AgentResult, AgentRunner } from '../../src/modules/agent/agent-runner.js'
import { branchNameFor } from '../../src/modules/git/branch-naming.js'
import type { BranchHandle, BranchWorkflowManager, MergeReason } from '../../src/modules/git/branch-workflow-manager.js'
import type { Task } from '../../src/modules/task-store/schemas.js'

// ---------------------------------------------------------------------------
// FakeBranchManager
// ---------------------------------------------------------------------------

/**
 * Branch workflow kept entirely in memory. `calls` records every operation
 * as "<op>:<branch>" in order.
 */
export class FakeBranchManager implements BranchWorkflowManager {
  readonly calls: string[] = []
  /** Branches that currently exist besides the base branch */
  readonly existing = new Set<string>()
  /** Task ids whose merge should stop on a conflict */
  readonly conflicts = new Map<TaskId, string[]>()
  /** Reason passed to each merge, in order */
  readonly mergeReasons: MergeReason[] = []
  private readonly _commits = new Map<string, number>()
  private _current: BranchHandle | null = null
  private _mergeCount = 0

  async initialize(): Promise<void> {}

  async shutdown(): Promise<void> {}

  baseBranch(): string {
    return 'main'
  }

  branchNameFor(task: Task): string {
    return branchNameFor(task)
  }

  /** Simulate the agent committing on a branch */
  addCommits(branchName: string, count: number): void {
    this._commits.set(branchName, (this._commits.get(branchName) ?? 0) + count)
  }

  async open(task: Task): Promise<BranchHandle> {
    if (this._current !== null) {
      throw new GitError(`Branch "${this._current.branchName}" is still open`)
    }
    const branchName = this.branchNameFor(task)
    const exists = this.existing.has(branchName)
    if (exists && task.branch !== branchName) {
      throw new BranchExistsError(branchName, task.id)
    }
    this.existing.add(branchName)
    this.calls.push(`open:${branchName}`)
    const handle: BranchHandle = { taskId: task.id, branchName, baseBranch: 'main', reused: exists, state: 'open' }
    this._current = handle
    return handle
  }

  async recordProgress(handle: BranchHandle): Promise<number> {
    return this._commits.get(handle.branchName) ?? 0
  }

  async merge(handle: BranchHandle, _title: string, reason: MergeReason = 'complete'): Promise<string> {
    this._assertOpen(handle)
    this.calls.push(`merge:${handle.branchName}`)
    this.mergeReasons.push(reason)
    const files = this.conflicts.get(handle.taskId)
    if (files !== undefined) {
      this._close(handle, 'parked')
      throw new MergeConflictError(handle.branchName, handle.taskId, files)
    }
    this._mergeCount++
    this.existing.delete(handle.branchName)
    this._commits.delete(handle.branchName)
    this._close(handle, 'merged')
    return `c0ffee${String(this._mergeCount)}`
  }

  async abandon(handle: BranchHandle): Promise<void> {
    this._assertOpen(handle)
    this.calls.push(`abandon:${handle.branchName}`)
    this.existing.delete(handle.branchName)
    this._commits.delete(handle.branchName)
    this._close(handle, 'abandoned')
  }

  async park(handle: BranchHandle): Promise<void> {
    this._assertOpen(handle)
    this.calls.push(`park:${handle.branchName}`)
    this._close(handle, 'parked')
  }

  private _assertOpen(handle: BranchHandle): void {
    if (handle.state !== 'open') {
      throw new GitError(`Cannot use branch "${handle.branchName}": it is ${handle.state}`)
    }
  }

  private _close(handle: BranchHandle, state: BranchHandle['state']): void {
    handle.state = state
    this._current = null
  }
}

// ---------------------------------------------------------------------------
// ScriptedAgentRunner
// ---------------------------------------------------------------------------

export type AgentStep = (request: AgentRequest) => Promise<Partial<AgentResult> | void>

export function agentResult(overrides: Partial<AgentResult> = {}): AgentResult {
  return { exitCode: 0, stdout: 'done', stderr: '', timedOut: false, durationMs: 5, ...overrides }
}

/**
 * Agent runner that plays one scripted step per invocation. A step may edit
 * the task store the way the real agent would. Once the script runs out,
 * every call succeeds without doing anything.
 */
export class ScriptedAgentRunner implements AgentRunner {
  readonly requests: AgentRequest[] = []
  private readonly _steps: AgentStep[]

  constructor(steps: AgentStep[] = []) {
    this._steps = [...steps]
  }

  async invoke(request: AgentRequest): Promise<AgentResult> {
    this.requests.push(request)
    const step = this._steps.shift()
    const overrides = step === undefined ? undefined : await step(request)
    return agentResult(overrides ?? {})
  }
}
