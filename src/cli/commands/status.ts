/**
 * `taskloop status` command
 *
 * Shows the active task tree, blocked tasks with their reasons and the
 * number of archived tasks.
 *
 * Usage:
 *   taskloop status                        Human-readable report
 *   taskloop status --output-format json   Machine-readable snapshot
 *
 * Exit codes:
 *   0 - Success
 *   1 - The task store could not be read
 */

import type { Command } from 'commander'
import { resolveProjectPaths } from '../../modules/config/project-paths.js'
import { StopSignal } from '../../modules/loop/stop-signal.js'
import { createTaskStore } from '../../modules/task-store/task-store-impl.js'
import { createLogger } from '../../utils/logger.js'
import { buildStatusSnapshot, renderStatusHuman } from '../formatters/status-formatter.js'
import { buildJsonOutput, errorMessage } from '../utils/formatting.js'

const logger = createLogger('status-cmd')

export const STATUS_EXIT_SUCCESS = 0
export const STATUS_EXIT_ERROR = 1

export interface StatusActionOptions {
  projectRoot: string
  outputFormat: 'human' | 'json'
  version?: string
}

export async function runStatusAction(options: StatusActionOptions): Promise<number> {
  const { outputFormat, version = '0.0.0' } = options
  const paths = resolveProjectPaths(options.projectRoot)

  try {
    const store = createTaskStore({ tasksPath: paths.tasksFile, archivePath: paths.archiveFile })
    const tree = await store.loadTree()
    const stopRequested = await new StopSignal(paths.stopFile).isRequested()
    const snapshot = buildStatusSnapshot(tree, stopRequested)

    if (outputFormat === 'json') {
      process.stdout.write(`${JSON.stringify(buildJsonOutput('taskloop status', snapshot, version), null, 2)}\n`)
    } else {
      process.stdout.write(`${renderStatusHuman(snapshot)}\n`)
    }
    return STATUS_EXIT_SUCCESS
  } catch (err) {
    logger.error({ err }, 'runStatusAction failed')
    process.stderr.write(`Error: ${errorMessage(err)}\n`)
    return STATUS_EXIT_ERROR
  }
}

export function registerStatusCommand(program: Command, version = '0.0.0', projectRoot = process.cwd()): void {
  program
    .command('status')
    .description('Show the task tree, blocked tasks and archive count')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (opts: { outputFormat: string }) => {
      const outputFormat: 'human' | 'json' = opts.outputFormat === 'json' ? 'json' : 'human'
      process.exitCode = await runStatusAction({ projectRoot, outputFormat, version })
    })
}
