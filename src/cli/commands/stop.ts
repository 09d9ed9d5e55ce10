/**
 * `taskloop stop` command
 *
 * Writes the stop signal file. A running loop sees it before its next
 * iteration, parks the open branch and exits with code 0.
 *
 * Exit codes:
 *   0 - Stop requested
 *   1 - The signal file could not be written
 */

import type { Command } from 'commander'
import { relative } from 'node:path'
import { resolveProjectPaths } from '../../modules/config/project-paths.js'
import { StopSignal } from '../../modules/loop/stop-signal.js'
import { createLogger } from '../../utils/logger.js'
import { errorMessage } from '../utils/formatting.js'

const logger = createLogger('stop-cmd')

export const STOP_EXIT_SUCCESS = 0
export const STOP_EXIT_ERROR = 1

export interface StopActionOptions {
  projectRoot: string
}

export async function runStopAction(options: StopActionOptions): Promise<number> {
  const paths = resolveProjectPaths(options.projectRoot)
  try {
    await new StopSignal(paths.stopFile).requestFile()
  } catch (err) {
    logger.error({ err }, 'Failed to write stop signal')
    process.stderr.write(`Error: ${errorMessage(err)}\n`)
    return STOP_EXIT_ERROR
  }
  process.stdout.write(
    `Stop requested (${relative(paths.root, paths.stopFile)}); the loop exits before its next iteration.\n`,
  )
  return STOP_EXIT_SUCCESS
}

export function registerStopCommand(program: Command, _version = '0.0.0', projectRoot = process.cwd()): void {
  program
    .command('stop')
    .description('Ask a running loop to stop after its current iteration')
    .action(async () => {
      process.exitCode = await runStopAction({ projectRoot })
    })
}
