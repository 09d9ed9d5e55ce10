/**
 * `taskloop init` command
 *
 * Creates a `.taskloop/` directory in the project from the bundled templates:
 *   - config.yaml, triggers.yaml, working.md
 *   - roles/*.md
 *   - an empty tasks.jsonl
 *
 * Existing files are kept unless --force is given. The task store is never
 * overwritten.
 *
 * Exit codes:
 *   0 - Success
 *   1 - Error (templates missing, write failure)
 */

import type { Command } from 'commander'
import { copyFile, mkdir, stat, writeFile } from 'node:fs/promises'
import { dirname, join, relative, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { resolveProjectPaths } from '../../modules/config/project-paths.js'
import { createLogger } from '../../utils/logger.js'
import { errorMessage } from '../utils/formatting.js'

const logger = createLogger('init-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const INIT_EXIT_SUCCESS = 0
export const INIT_EXIT_ERROR = 1

// ---------------------------------------------------------------------------
// Templates
// ---------------------------------------------------------------------------

/** Files copied into `.taskloop/`, relative to the templates directory */
export const TEMPLATE_FILES: readonly string[] = [
  'config.yaml',
  'triggers.yaml',
  'working.md',
  'roles/architect.md',
  'roles/debugger.md',
  'roles/reviewer.md',
]

/** `templates/` at the package root; the same depth from src/ and dist/ */
export function defaultTemplatesDir(): string {
  return resolve(dirname(fileURLToPath(import.meta.url)), '../../../templates')
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await stat(path)
    return true
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return false
    throw err
  }
}

// ---------------------------------------------------------------------------
// runInitAction
// ---------------------------------------------------------------------------

export interface InitActionOptions {
  projectRoot: string
  /** Overwrite existing template files */
  force: boolean
  templatesDir?: string
}

/**
 * Core init logic, separate from the Commander action.
 */
export async function runInitAction(options: InitActionOptions): Promise<number> {
  const paths = resolveProjectPaths(options.projectRoot)
  const templatesDir = options.templatesDir ?? defaultTemplatesDir()
  const created: string[] = []
  const skipped: string[] = []

  try {
    for (const file of TEMPLATE_FILES) {
      const target = join(paths.stateDir, file)
      if (!options.force && (await fileExists(target))) {
        skipped.push(target)
        continue
      }
      await mkdir(dirname(target), { recursive: true })
      await copyFile(join(templatesDir, file), target)
      created.push(target)
    }

    if (await fileExists(paths.tasksFile)) {
      skipped.push(paths.tasksFile)
    } else {
      await writeFile(paths.tasksFile, '', 'utf-8')
      created.push(paths.tasksFile)
    }
  } catch (err) {
    logger.error({ err }, 'Failed to scaffold .taskloop/')
    process.stderr.write(`Error: failed to initialize ${paths.stateDir}: ${errorMessage(err)}\n`)
    return INIT_EXIT_ERROR
  }

  const show = (path: string): string => relative(paths.root, path)
  for (const path of created) process.stdout.write(`  Created ${show(path)}\n`)
  for (const path of skipped) process.stdout.write(`  Kept    ${show(path)} (exists)\n`)
  process.stdout.write(
    '\nNext steps:\n' +
      `  1. Add a task: taskloop add "Describe the first piece of work"\n` +
      '  2. Start the loop: taskloop run\n',
  )
  return INIT_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// registerInitCommand
// ---------------------------------------------------------------------------

export function registerInitCommand(program: Command, _version = '0.0.0', projectRoot = process.cwd()): void {
  program
    .command('init')
    .description('Create .taskloop/ with default config, triggers, roles and an empty task store')
    .option('--force', 'Overwrite existing template files (the task store is always kept)', false)
    .action(async (opts: { force: boolean }) => {
      process.exitCode = await runInitAction({ projectRoot, force: opts.force })
    })
}
