/**
 * Operator task edits: `taskloop add`, `taskloop split`, `taskloop unblock`.
 *
 * Each command is one read-modify-write of the task store. Running them
 * while the loop is mid-iteration is safe only between agent calls; the
 * loop re-reads the store before every decision.
 *
 * Exit codes:
 *   0 - Success
 *   1 - Unknown task, a transition the task's state does not allow, or an
 *       unreadable store
 */

import type { Command } from 'commander'
import { resolveProjectPaths } from '../../modules/config/project-paths.js'
import { createTaskStore } from '../../modules/task-store/task-store-impl.js'
import type { TaskStore } from '../../modules/task-store/task-store.js'
import { createLogger } from '../../utils/logger.js'
import { errorMessage } from '../utils/formatting.js'

const logger = createLogger('tasks-cmd')

export const TASKS_EXIT_SUCCESS = 0
export const TASKS_EXIT_ERROR = 1

function openStore(projectRoot: string): TaskStore {
  const paths = resolveProjectPaths(projectRoot)
  return createTaskStore({ tasksPath: paths.tasksFile, archivePath: paths.archiveFile })
}

async function runEdit(name: string, edit: () => Promise<string>): Promise<number> {
  try {
    process.stdout.write(`${await edit()}\n`)
    return TASKS_EXIT_SUCCESS
  } catch (err) {
    logger.error({ err, command: name }, 'Task edit failed')
    process.stderr.write(`Error: ${errorMessage(err)}\n`)
    return TASKS_EXIT_ERROR
  }
}

// ---------------------------------------------------------------------------
// add
// ---------------------------------------------------------------------------

export interface AddActionOptions {
  projectRoot: string
  title: string
  parent?: string
}

export function runAddAction(options: AddActionOptions): Promise<number> {
  return runEdit('add', async () => {
    const task = await openStore(options.projectRoot).add(options.title, options.parent)
    return `Added ${task.id}: ${task.title}`
  })
}

// ---------------------------------------------------------------------------
// split
// ---------------------------------------------------------------------------

export interface SplitActionOptions {
  projectRoot: string
  taskId: string
  titles: string[]
}

export function runSplitAction(options: SplitActionOptions): Promise<number> {
  return runEdit('split', async () => {
    const children = await openStore(options.projectRoot).split(options.taskId, options.titles)
    return [`Split ${options.taskId} into:`, ...children.map((child) => `  ${child.id}: ${child.title}`)].join('\n')
  })
}

// ---------------------------------------------------------------------------
// unblock
// ---------------------------------------------------------------------------

export interface UnblockActionOptions {
  projectRoot: string
  taskId: string
}

export function runUnblockAction(options: UnblockActionOptions): Promise<number> {
  return runEdit('unblock', async () => {
    const task = await openStore(options.projectRoot).unblock(options.taskId)
    return `Unblocked ${task.id}: ${task.title} is pending again`
  })
}

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

export function registerTaskCommands(program: Command, _version = '0.0.0', projectRoot = process.cwd()): void {
  program
    .command('add <title>')
    .description('Add a pending task at the root, or under a split task')
    .option('--parent <id>', 'Parent task id')
    .action(async (title: string, opts: { parent?: string }) => {
      process.exitCode = await runAddAction({
        projectRoot,
        title,
        ...(opts.parent !== undefined ? { parent: opts.parent } : {}),
      })
    })

  program
    .command('split <id> <titles...>')
    .description('Split a task into pending subtasks, one per title')
    .action(async (taskId: string, titles: string[]) => {
      process.exitCode = await runSplitAction({ projectRoot, taskId, titles })
    })

  program
    .command('unblock <id>')
    .description('Return a blocked task to pending and clear its reason')
    .action(async (taskId: string) => {
      process.exitCode = await runUnblockAction({ projectRoot, taskId })
    })
}
