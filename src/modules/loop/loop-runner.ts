/**
 * Loop Runner: factory and core implementation of the outer loop.
 *
 * Repeats top-level passes of the iteration controller until a stop is
 * requested or, outside daemon mode, nothing is left to do. Fatal errors
 * (corrupt store, agent auth failure, consecutive-failure halt) propagate to
 * the caller unchanged.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import { sleep as defaultSleep } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { reconcileStore } from '../../recovery/crash-recovery.js'
import type { AgentInvoker } from '../agent/agent-invoker.js'
import type { IterationController, IterationOutcome } from '../iteration-controller/iteration-controller.js'
import type { TaskStore } from '../task-store/task-store.js'
import { buildCompletionCheckPrompt, buildIdleMessagePrompt } from '../trigger-engine/prompt.js'
import type { StopSignal } from './stop-signal.js'

const logger = createLogger('loop')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface LoopRunnerDeps {
  store: TaskStore
  controller: IterationController
  /** Used for project-level invocations: completion check and idle operator messages */
  agent: AgentInvoker
  stopSignal: StopSignal
  eventBus: TypedEventBus
  readInbox?: () => Promise<string | null>
  config: LoopRunnerConfig
}

export interface LoopRunnerConfig {
  pollIntervalMs: number
  /** Ask the agent whether the project is finished before exiting idle */
  completionCheck: boolean
  workingAgreement: string
  /** Task file path as shown to the agent */
  tasksFile: string
  sleep?: (ms: number) => Promise<void>
}

export interface LoopSummary {
  passes: number
  completed: number
  split: number
  blocked: number
  stuck: number
}

export interface LoopRunResult {
  exitCode: number
  reason: 'signal' | 'idle'
  summary: LoopSummary
}

export interface LoopRunner {
  run(options?: { daemon?: boolean }): Promise<LoopRunResult>
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createLoopRunner(deps: LoopRunnerDeps): LoopRunner {
  const { store, controller, agent, stopSignal, eventBus, config } = deps
  const sleep = config.sleep ?? defaultSleep

  function tally(summary: LoopSummary, outcome: IterationOutcome): void {
    summary.passes++
    switch (outcome.kind) {
      case 'completed':
        summary.completed++
        break
      case 'split':
        summary.split++
        break
      case 'blocked':
        summary.blocked++
        break
      case 'stuck':
        summary.stuck++
        break
      default:
        break
    }
  }

  async function invokeForProject(prompt: string): Promise<void> {
    const outcome = await agent.invoke({ prompt, taskId: '', title: '', mode: 'project' })
    if (!outcome.ok) {
      logger.warn({ kind: outcome.failure.kind, message: outcome.failure.message }, 'Project-level invocation failed')
    }
  }

  async function run(options: { daemon?: boolean } = {}): Promise<LoopRunResult> {
    const daemon = options.daemon ?? false
    const summary: LoopSummary = { passes: 0, completed: 0, split: 0, blocked: 0, stuck: 0 }

    const finish = (reason: LoopRunResult['reason']): LoopRunResult => {
      logger.info({ reason, ...summary }, 'Loop stopped')
      eventBus.emit('loop:stopped', { reason })
      return { exitCode: 0, reason, summary }
    }

    await reconcileStore(store)
    logger.info({ daemon }, 'Loop starting')

    let idleAnnounced = false
    let checkedSinceWork = false

    for (;;) {
      if (await stopSignal.consume()) {
        return finish('signal')
      }

      const outcome = await controller.runOnce()
      if (outcome.kind !== 'idle') {
        tally(summary, outcome)
        idleAnnounced = false
        checkedSinceWork = false
        continue
      }

      const message = deps.readInbox !== undefined ? await deps.readInbox() : null
      if (message !== null) {
        logger.info('Handing the operator message to the agent')
        await invokeForProject(buildIdleMessagePrompt({ message, tasksFile: config.tasksFile }))
        idleAnnounced = false
        checkedSinceWork = false
        continue
      }

      if (!idleAnnounced) {
        eventBus.emit('loop:idle', { daemon })
      }

      if (daemon) {
        if (!idleAnnounced) {
          logger.info('No workable task; waiting')
          idleAnnounced = true
        }
        await sleep(config.pollIntervalMs)
        continue
      }

      if (!config.completionCheck || checkedSinceWork) {
        return finish('idle')
      }

      logger.info('No workable task; checking whether the project is finished')
      idleAnnounced = true
      checkedSinceWork = true
      await invokeForProject(
        buildCompletionCheckPrompt({ workingAgreement: config.workingAgreement, tasksFile: config.tasksFile }),
      )
    }
  }

  return { run }
}
