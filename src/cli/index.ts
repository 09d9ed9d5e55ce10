#!/usr/bin/env node
/**
 * taskloop CLI - Main entry point
 * Provides the `taskloop` command-line interface
 */

import { Command } from 'commander'
import { fileURLToPath } from 'node:url'
import { dirname, resolve } from 'node:path'
import { readFile } from 'node:fs/promises'
import { isPlainObject } from '../utils/helpers.js'
import { createLogger } from '../utils/logger.js'
import { registerInitCommand } from './commands/init.js'
import { registerRunCommand } from './commands/run.js'
import { registerStatusCommand } from './commands/status.js'
import { registerStopCommand } from './commands/stop.js'
import { registerTaskCommands } from './commands/tasks.js'

const logger = createLogger('cli')

/** Read the version from package.json; the same depth from src/ and dist/ */
export async function getPackageVersion(): Promise<string> {
  const pkgPath = resolve(dirname(fileURLToPath(import.meta.url)), '../../package.json')
  try {
    const pkg: unknown = JSON.parse(await readFile(pkgPath, 'utf-8'))
    if (isPlainObject(pkg) && typeof pkg.version === 'string') {
      return pkg.version
    }
  } catch (err) {
    logger.debug({ err, pkgPath }, 'Could not read package version')
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(projectRoot = process.cwd()): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('taskloop')
    .description('Drive an AI coding agent through a hierarchy of tasks, one git branch per task')
    .version(version, '-v, --version', 'Output the current version')

  registerInitCommand(program, version, projectRoot)
  registerRunCommand(program, version, projectRoot)
  registerStopCommand(program, version, projectRoot)
  registerStatusCommand(program, version, projectRoot)
  registerTaskCommands(program, version, projectRoot)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

// Errors are handled internally by main() which calls process.exit(1)
void main()
