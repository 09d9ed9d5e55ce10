/**
 * `taskloop run` command
 *
 * Loads configuration, wires the loop and runs it until no task is workable
 * (or forever with --daemon) or a stop is requested. Progress is printed to
 * stdout from event bus events.
 *
 * Usage:
 *   taskloop run                         Run until idle
 *   taskloop run --daemon                Poll for new tasks when idle
 *   taskloop run --max-iterations 10     Override loop.max_iterations
 *   taskloop run --base-branch main      Override git.base_branch
 *
 * Exit codes:
 *   0 - Idle exit or clean stop
 *   1 - Fatal error (config, git, corrupt store, agent halt)
 */

import { InvalidArgumentError } from 'commander'
import type { Command } from 'commander'
import { createTaskloop } from '../../core/taskloop-impl.js'
import type { Taskloop, TaskloopOptions } from '../../core/taskloop.js'
import type { PartialTaskloopConfig } from '../../modules/config/config-schema.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import { resolveProjectPaths } from '../../modules/config/project-paths.js'
import { createLogger } from '../../utils/logger.js'
import { attachProgressReporter, formatRunSummary } from '../formatters/progress-formatter.js'
import { errorMessage } from '../utils/formatting.js'

const logger = createLogger('run-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const RUN_EXIT_SUCCESS = 0
export const RUN_EXIT_ERROR = 1

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RunActionOptions {
  projectRoot: string
  daemon: boolean
  maxIterations?: number
  baseBranch?: string
  /** Environment for TASKLOOP_* overrides (default: process.env) */
  env?: NodeJS.ProcessEnv
  /** Collaborator overrides passed through to createTaskloop */
  wiring?: Pick<TaskloopOptions, 'agentRunner' | 'branches' | 'handleSignals' | 'sleep'>
}

/** Commander argument parser for --max-iterations */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.')
  }
  return parsed
}

function buildOverrides(options: RunActionOptions): PartialTaskloopConfig {
  const overrides: PartialTaskloopConfig = {}
  if (options.maxIterations !== undefined) {
    overrides.loop = { max_iterations: options.maxIterations }
  }
  if (options.baseBranch !== undefined) {
    overrides.git = { base_branch: options.baseBranch }
  }
  return overrides
}

// ---------------------------------------------------------------------------
// runRunAction: testable core logic
// ---------------------------------------------------------------------------

export async function runRunAction(options: RunActionOptions): Promise<number> {
  const paths = resolveProjectPaths(options.projectRoot)
  let taskloop: Taskloop | null = null
  let detach: (() => void) | null = null

  try {
    const configSystem = createConfigSystem({
      projectConfigDir: paths.stateDir,
      cliOverrides: buildOverrides(options),
      ...(options.env !== undefined ? { env: options.env } : {}),
    })
    await configSystem.load()

    taskloop = await createTaskloop({
      projectRoot: paths.root,
      config: configSystem.getConfig(),
      ...options.wiring,
    })
    detach = attachProgressReporter(taskloop.eventBus, (line) => {
      process.stdout.write(`${line}\n`)
    })

    const result = await taskloop.run({ daemon: options.daemon })
    process.stdout.write(`${formatRunSummary(result)}\n`)
    return RUN_EXIT_SUCCESS
  } catch (err) {
    logger.error({ err }, 'Loop halted')
    process.stderr.write(`Error: ${errorMessage(err)}\n`)
    return RUN_EXIT_ERROR
  } finally {
    if (detach !== null) detach()
    if (taskloop !== null) await taskloop.shutdown()
  }
}

// ---------------------------------------------------------------------------
// registerRunCommand
// ---------------------------------------------------------------------------

export function registerRunCommand(program: Command, _version = '0.0.0', projectRoot = process.cwd()): void {
  program
    .command('run')
    .description('Run the loop until no task is workable')
    .option('-d, --daemon', 'Keep polling for new tasks when idle', false)
    .option('--max-iterations <n>', 'Agent invocations per task before it is blocked', parsePositiveInt)
    .option('--base-branch <name>', 'Branch task branches start from and merge into')
    .action(async (opts: { daemon: boolean; maxIterations?: number; baseBranch?: string }) => {
      process.exitCode = await runRunAction({
        projectRoot,
        daemon: opts.daemon,
        ...(opts.maxIterations !== undefined ? { maxIterations: opts.maxIterations } : {}),
        ...(opts.baseBranch !== undefined ? { baseBranch: opts.baseBranch } : {}),
      })
    })
}
