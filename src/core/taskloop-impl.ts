/**
 * TaskloopImpl: concrete implementation of the Taskloop interface.
 *
 * The createTaskloop() factory:
 *  1. Instantiates the TypedEventBus
 *  2. Creates every module via constructor injection
 *  3. Initializes the branch workflow (the one service with outside state)
 *  4. Sets up SIGTERM/SIGINT stop handlers
 *
 * Modules never import each other's implementations; all wiring happens here.
 */

import { relative } from 'node:path'
import { createLogger, setLogLevel } from '../utils/logger.js'
import { createEventBus } from './event-bus.js'
import type { TypedEventBus } from './event-bus.js'
import type { Taskloop, TaskloopOptions } from './taskloop.js'
import { AgentInvoker } from '../modules/agent/agent-invoker.js'
import { CliAgentRunner } from '../modules/agent/cli-agent-runner.js'
import { resolveProjectPaths } from '../modules/config/project-paths.js'
import { createBranchWorkflowManager } from '../modules/git/branch-workflow-manager-impl.js'
import type { BranchWorkflowManager } from '../modules/git/branch-workflow-manager.js'
import { createIterationController } from '../modules/iteration-controller/iteration-controller-impl.js'
import { readInbox } from '../modules/loop/inbox.js'
import { createLoopRunner } from '../modules/loop/loop-runner.js'
import type { LoopRunner, LoopRunResult } from '../modules/loop/loop-runner.js'
import { StopSignal } from '../modules/loop/stop-signal.js'
import { StuckTaskRecovery } from '../modules/stuck-recovery/stuck-recovery.js'
import { createTaskStore } from '../modules/task-store/task-store-impl.js'
import type { TaskStore } from '../modules/task-store/task-store.js'
import { FileRoleLoader } from '../modules/trigger-engine/role-loader.js'
import { loadTriggerEngine } from '../modules/trigger-engine/trigger-engine.js'
import { setupGracefulShutdown } from '../recovery/shutdown-handler.js'

const logger = createLogger('taskloop')

// ---------------------------------------------------------------------------
// TaskloopImpl
// ---------------------------------------------------------------------------

/** Internal symbol used to expose lifecycle hooks to the factory only */
const INTERNAL = Symbol('TaskloopImpl.internal')

class TaskloopImpl implements Taskloop {
  readonly eventBus: TypedEventBus
  readonly store: TaskStore
  readonly stopSignal: StopSignal
  private readonly _branches: BranchWorkflowManager
  private readonly _runner: LoopRunner
  private _ready = false
  private _shutdown = false
  private _removeSignalHandlers: (() => void) | null = null

  constructor(
    eventBus: TypedEventBus,
    store: TaskStore,
    stopSignal: StopSignal,
    branches: BranchWorkflowManager,
    runner: LoopRunner,
  ) {
    this.eventBus = eventBus
    this.store = store
    this.stopSignal = stopSignal
    this._branches = branches
    this._runner = runner
  }

  get isReady(): boolean {
    return this._ready
  }

  run(options: { daemon?: boolean } = {}): Promise<LoopRunResult> {
    return this._runner.run(options)
  }

  async shutdown(): Promise<void> {
    if (this._shutdown) return
    this._shutdown = true

    if (this._removeSignalHandlers !== null) {
      this._removeSignalHandlers()
      this._removeSignalHandlers = null
    }

    try {
      await this._branches.shutdown()
    } catch (err) {
      logger.error({ err }, 'Error during taskloop shutdown')
    }

    logger.info('Taskloop shut down')
  }

  /**
   * Internal accessor used exclusively by the createTaskloop factory.
   * @internal
   */
  [INTERNAL](): {
    markReady: () => void
    setSignalCleanup: (cleanup: () => void) => void
  } {
    return {
      markReady: () => {
        this._ready = true
      },
      setSignalCleanup: (cleanup: () => void) => {
        this._removeSignalHandlers = cleanup
      },
    }
  }
}

// ---------------------------------------------------------------------------
// createTaskloop factory
// ---------------------------------------------------------------------------

/**
 * Wire the loop for one project.
 *
 * @throws GitError when the base branch cannot be resolved
 * @throws ConfigError when the trigger file is invalid
 */
export async function createTaskloop(options: TaskloopOptions): Promise<Taskloop> {
  const { config } = options
  const paths = resolveProjectPaths(options.projectRoot)

  if (config.global.log_level !== undefined) {
    setLogLevel(config.global.log_level)
  }
  logger.info({ projectRoot: paths.root }, 'Initializing taskloop')

  const eventBus = createEventBus()

  const store = createTaskStore({ tasksPath: paths.tasksFile, archivePath: paths.archiveFile })

  const branches =
    options.branches ??
    createBranchWorkflowManager(eventBus, {
      projectRoot: paths.root,
      baseBranch: config.git.base_branch,
      naming: { prefix: config.git.branch_prefix, slugMaxLength: config.git.slug_max_length },
    })

  const runner =
    options.agentRunner ??
    new CliAgentRunner({
      command: config.agent.command,
      args: config.agent.args,
      timeoutMs: config.agent.timeout_ms,
      cwd: paths.root,
    })

  const agent = new AgentInvoker(runner, {
    maxConsecutiveFailures: config.loop.max_consecutive_failures,
    retryDelaysMs: config.loop.retry_delays_ms,
    sleep: options.sleep,
  })

  const triggers = await loadTriggerEngine(paths.triggersFile)
  const roles = new FileRoleLoader(paths.rolesDir)
  const recovery = new StuckTaskRecovery(store, branches, eventBus)
  const stopSignal = new StopSignal(paths.stopFile)
  const inbox = (): Promise<string | null> => readInbox(paths.inboxFile)

  // Prompts name files relative to the project root, where the agent runs
  const workingAgreement = relative(paths.root, paths.workingAgreement)
  const tasksFile = relative(paths.root, paths.tasksFile)

  const controller = createIterationController(
    { store, branches, agent, triggers, roles, recovery, eventBus, stop: stopSignal, readInbox: inbox },
    {
      maxIterations: config.loop.max_iterations,
      iterationDelayMs: config.loop.iteration_delay_ms,
      workingAgreement,
      sleep: options.sleep,
    },
  )

  const loopRunner = createLoopRunner({
    store,
    controller,
    agent,
    stopSignal,
    eventBus,
    readInbox: inbox,
    config: {
      pollIntervalMs: config.loop.poll_interval_ms,
      completionCheck: config.loop.completion_check,
      workingAgreement,
      tasksFile,
      sleep: options.sleep,
    },
  })

  const taskloop = new TaskloopImpl(eventBus, store, stopSignal, branches, loopRunner)
  const internal = taskloop[INTERNAL]()

  try {
    await branches.initialize()
  } catch (err) {
    logger.error({ err }, 'Branch workflow initialization failed; cleaning up')
    try {
      await branches.shutdown()
    } catch (shutdownErr) {
      logger.error({ err: shutdownErr }, 'Error during cleanup after failed initialization')
    }
    throw err
  }

  if (options.handleSignals ?? true) {
    internal.setSignalCleanup(setupGracefulShutdown({ stopSignal }))
  }

  internal.markReady()
  logger.info('Taskloop ready')
  return taskloop
}
