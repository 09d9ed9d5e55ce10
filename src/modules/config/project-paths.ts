/**
 * Fixed locations of the loop's files inside a project.
 */

import { join, resolve } from 'node:path'

export const STATE_DIR_NAME = '.taskloop'

export interface ProjectPaths {
  root: string
  stateDir: string
  configFile: string
  tasksFile: string
  archiveFile: string
  triggersFile: string
  rolesDir: string
  workingAgreement: string
  stopFile: string
  /** Kept at the project root so the operator can find it easily */
  inboxFile: string
}

export function resolveProjectPaths(projectRoot: string): ProjectPaths {
  const root = resolve(projectRoot)
  const stateDir = join(root, STATE_DIR_NAME)
  return {
    root,
    stateDir,
    configFile: join(stateDir, 'config.yaml'),
    tasksFile: join(stateDir, 'tasks.jsonl'),
    archiveFile: join(stateDir, 'tasks-done.jsonl'),
    triggersFile: join(stateDir, 'triggers.yaml'),
    rolesDir: join(stateDir, 'roles'),
    workingAgreement: join(stateDir, 'working.md'),
    stopFile: join(stateDir, 'stop'),
    inboxFile: join(root, 'inbox.txt'),
  }
}
