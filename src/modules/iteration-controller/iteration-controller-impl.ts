/**
 * IterationControllerImpl: concrete implementation of IterationController.
 *
 * The task store is re-read before every decision: the agent edits the same
 * file while it runs, so nothing read before an invocation is trusted after it.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import { BranchExistsError, MergeConflictError } from '../../core/errors.js'
import type { LoopMode, TaskId } from '../../core/types.js'
import { sleep as defaultSleep } from '../../utils/helpers.js'
import { childLogger, createLogger } from '../../utils/logger.js'
import type { AgentInvoker } from '../agent/agent-invoker.js'
import type { BranchHandle, BranchWorkflowManager } from '../git/branch-workflow-manager.js'
import { blockTask } from '../stuck-recovery/stuck-recovery.js'
import type { StuckTaskRecovery } from '../stuck-recovery/stuck-recovery.js'
import { selectNext } from '../task-selector/task-selector.js'
import type { Task } from '../task-store/schemas.js'
import type { TaskStore } from '../task-store/task-store.js'
import { withStatus } from '../task-store/task-store-impl.js'
import type { TaskTree } from '../task-store/task-tree.js'
import { buildBasePrompt, composePrompt } from '../trigger-engine/prompt.js'
import type { TriggerEngine } from '../trigger-engine/trigger-engine.js'
import type { IterationContext, RoleLoader } from '../trigger-engine/types.js'
import type { IterationController, IterationOutcome, StopCheck } from './iteration-controller.js'

const logger = createLogger('iteration-controller')

export const SPLIT_MERGE_TITLE = 'Split into subtasks'
export const SPLIT_WITHOUT_CHILDREN_REASON = 'split without subtasks'

export interface IterationControllerDeps {
  store: TaskStore
  branches: BranchWorkflowManager
  agent: AgentInvoker
  triggers: TriggerEngine
  roles: RoleLoader
  recovery: StuckTaskRecovery
  eventBus: TypedEventBus
  stop?: StopCheck
  /** Operator message for the next prompt; consumed when read */
  readInbox?: () => Promise<string | null>
}

export interface IterationControllerOptions {
  maxIterations: number
  /** Pause between iterations on the same task */
  iterationDelayMs: number
  /** Working agreement path named in every prompt */
  workingAgreement: string
  sleep?: (ms: number) => Promise<void>
  now?: () => Date
}

function conflictReason(err: MergeConflictError): string {
  const files = err.conflictingFiles.length > 0 ? err.conflictingFiles.join(', ') : 'unknown files'
  return `merge conflict: ${files}`
}

export class IterationControllerImpl implements IterationController {
  private readonly _deps: IterationControllerDeps
  private readonly _options: IterationControllerOptions
  private readonly _sleep: (ms: number) => Promise<void>
  private readonly _now: () => Date

  constructor(deps: IterationControllerDeps, options: IterationControllerOptions) {
    this._deps = deps
    this._options = options
    this._sleep = options.sleep ?? defaultSleep
    this._now = options.now ?? (() => new Date())
  }

  async runOnce(): Promise<IterationOutcome> {
    const { store, branches, eventBus } = this._deps

    const selection = selectNext(await store.loadTree())
    if (selection === null) {
      return { kind: 'idle' }
    }

    const { task, mode } = selection
    const log = childLogger(logger, { taskId: task.id })

    let handle: BranchHandle
    try {
      handle = await branches.open(task)
    } catch (err) {
      if (err instanceof BranchExistsError) {
        await blockTask(store, eventBus, task.id, err.message)
        return { kind: 'blocked', taskId: task.id, reason: err.message }
      }
      throw err
    }

    await store.update(task.id, (current) => ({ ...withStatus(current, 'active'), branch: handle.branchName }))
    log.info({ mode, resumed: selection.resumed, branchName: handle.branchName }, 'Task claimed')
    eventBus.emit('task:claimed', { taskId: task.id, title: task.title, mode })

    return this._iterate(task.id, mode, handle)
  }

  // ---------------------------------------------------------------------------
  // Iteration loop
  // ---------------------------------------------------------------------------

  private async _iterate(taskId: TaskId, mode: LoopMode, handle: BranchHandle): Promise<IterationOutcome> {
    const { store, branches, agent, triggers, roles, eventBus } = this._deps
    const { maxIterations, iterationDelayMs, workingAgreement } = this._options
    const log = childLogger(logger, { taskId })

    const roleHistory = new Map<string, number>()
    let lastIterationFailed = false

    for (let iteration = 1; iteration <= maxIterations; iteration++) {
      if (iteration > 1 && this._deps.stop !== undefined && (await this._deps.stop.isRequested())) {
        log.info({ iteration }, 'Stop requested; leaving task active')
        await branches.park(handle)
        return { kind: 'stopped', taskId }
      }

      const task = (await store.loadTree()).get(taskId)
      if (task === undefined) {
        return this._vanished(taskId, handle)
      }

      const context: IterationContext = {
        task,
        iteration,
        branchCommits: await branches.recordProgress(handle),
        lastIterationFailed,
        verifying: mode === 'verify',
        roleHistory,
      }

      const roleName = triggers.selectRole(context)
      const role = roleName === null ? null : await roles.load(roleName)
      if (role !== null) {
        roleHistory.set(role.name, iteration)
        eventBus.emit('role:applied', { taskId, iteration, role: role.name })
      }

      const inbox = this._deps.readInbox !== undefined ? await this._deps.readInbox() : null
      const prompt = composePrompt(buildBasePrompt({ task, mode, workingAgreement, inbox }), role)

      log.info({ iteration, maxIterations, role: role?.name ?? null, branchCommits: context.branchCommits }, 'Invoking agent')
      eventBus.emit('iteration:started', { taskId, iteration, maxIterations, role: role?.name ?? null })

      const outcome = await agent.invoke({ prompt, taskId, title: task.title, mode })
      if (!outcome.ok) {
        eventBus.emit('iteration:failed', {
          taskId,
          iteration,
          kind: outcome.failure.kind,
          message: outcome.failure.message,
        })
      }

      const tree = await store.loadTree()
      const updated = tree.get(taskId)
      if (updated === undefined) {
        return this._vanished(taskId, handle)
      }

      if (updated.status === 'complete') {
        return this._complete(updated, handle)
      }
      if (updated.status === 'split' || (!updated.leaf && tree.hasOpenChildren(taskId))) {
        return this._split(updated, handle, tree)
      }
      if (updated.status === 'blocked') {
        const reason = updated.blocked_reason ?? 'blocked'
        await branches.park(handle)
        log.warn({ reason }, 'Agent blocked the task')
        eventBus.emit('task:blocked', { taskId, reason })
        return { kind: 'blocked', taskId, reason }
      }

      lastIterationFailed = !outcome.ok
      if (iteration < maxIterations) {
        await this._sleep(iterationDelayMs)
      }
    }

    log.warn({ maxIterations }, 'Iteration limit reached')
    await this._deps.recovery.handleStuck(taskId, handle)
    return { kind: 'stuck', taskId }
  }

  // ---------------------------------------------------------------------------
  // Outcomes
  // ---------------------------------------------------------------------------

  private async _complete(task: Task, handle: BranchHandle): Promise<IterationOutcome> {
    const { store, branches, eventBus } = this._deps

    let commit: string
    try {
      commit = await branches.merge(handle, task.title)
    } catch (err) {
      if (err instanceof MergeConflictError) {
        const reason = conflictReason(err)
        await blockTask(store, eventBus, task.id, reason)
        return { kind: 'blocked', taskId: task.id, reason }
      }
      throw err
    }

    await store.archive(task, commit, this._now())
    eventBus.emit('task:completed', { taskId: task.id, title: task.title, commit })
    return { kind: 'completed', taskId: task.id, commit }
  }

  private async _split(task: Task, handle: BranchHandle, tree: TaskTree): Promise<IterationOutcome> {
    const { store, branches, eventBus } = this._deps
    const log = childLogger(logger, { taskId: task.id })

    if (!tree.hasOpenChildren(task.id)) {
      await store.update(task.id, (current) => ({ ...current, leaf: false }))
      await branches.park(handle)
      await blockTask(store, eventBus, task.id, SPLIT_WITHOUT_CHILDREN_REASON)
      return { kind: 'blocked', taskId: task.id, reason: SPLIT_WITHOUT_CHILDREN_REASON }
    }

    // Work done before the split (often the plan itself) goes to the base
    // branch so the children start from it.
    if ((await branches.recordProgress(handle)) > 0) {
      try {
        await branches.merge(handle, SPLIT_MERGE_TITLE, 'split')
      } catch (err) {
        if (err instanceof MergeConflictError) {
          const reason = conflictReason(err)
          await blockTask(store, eventBus, task.id, reason)
          return { kind: 'blocked', taskId: task.id, reason }
        }
        throw err
      }
    } else {
      await branches.abandon(handle)
    }

    await store.update(task.id, (current) => {
      const { branch: _branch, ...rest } = withStatus(current, 'split')
      return { ...rest, leaf: false }
    })

    const children = tree
      .childrenOf(task.id)
      .filter((child) => child.status !== 'complete')
      .map((child) => child.id)
    log.info({ children }, 'Task split')
    eventBus.emit('task:split', { taskId: task.id, children })
    return { kind: 'split', taskId: task.id, children }
  }

  private async _vanished(taskId: TaskId, handle: BranchHandle): Promise<IterationOutcome> {
    logger.warn({ taskId }, 'Task no longer in the store; ending its run')
    await this._deps.branches.park(handle)
    return { kind: 'vanished', taskId }
  }
}

export function createIterationController(
  deps: IterationControllerDeps,
  options: IterationControllerOptions,
): IterationController {
  return new IterationControllerImpl(deps, options)
}
