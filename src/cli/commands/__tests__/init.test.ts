/**
 * Unit tests for the `taskloop init` command
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { captureOutput } from '../../../../test/helpers/output.js'
import type { CapturedOutput } from '../../../../test/helpers/output.js'
import {
  defaultTemplatesDir,
  runInitAction,
  INIT_EXIT_ERROR,
  INIT_EXIT_SUCCESS,
  TEMPLATE_FILES,
} from '../init.js'
import { createConfigSystem } from '../../../modules/config/config-system-impl.js'
import { DEFAULT_CONFIG } from '../../../modules/config/defaults.js'
import { loadTriggerEngine } from '../../../modules/trigger-engine/trigger-engine.js'

let projectRoot: string
let output: CapturedOutput

beforeEach(async () => {
  projectRoot = await mkdtemp(join(tmpdir(), 'taskloop-init-'))
  output = captureOutput()
})

afterEach(async () => {
  vi.restoreAllMocks()
  await rm(projectRoot, { recursive: true, force: true })
})

describe('runInitAction', () => {
  it('copies every template and creates an empty task store', async () => {
    const exitCode = await runInitAction({ projectRoot, force: false })

    expect(exitCode).toBe(INIT_EXIT_SUCCESS)
    for (const file of TEMPLATE_FILES) {
      const copied = await readFile(join(projectRoot, '.taskloop', file), 'utf-8')
      const template = await readFile(join(defaultTemplatesDir(), file), 'utf-8')
      expect(copied).toBe(template)
    }
    expect(await readFile(join(projectRoot, '.taskloop', 'tasks.jsonl'), 'utf-8')).toBe('')
    expect(output.stdout()).toContain('  Created .taskloop/config.yaml\n')
    expect(output.stdout()).toContain('  Created .taskloop/roles/debugger.md\n')
    expect(output.stdout()).toContain('  Created .taskloop/tasks.jsonl\n')
  })

  it('scaffolds a config equal to the defaults and loadable triggers', async () => {
    await runInitAction({ projectRoot, force: false })

    const config = createConfigSystem({ projectConfigDir: join(projectRoot, '.taskloop'), env: {} })
    await config.load()
    expect(config.getConfig()).toEqual(DEFAULT_CONFIG)

    const engine = await loadTriggerEngine(join(projectRoot, '.taskloop', 'triggers.yaml'))
    expect(engine.triggers.map((trigger) => trigger.role)).toEqual(['debugger', 'architect', 'reviewer'])
  })

  it('keeps existing files without --force', async () => {
    await mkdir(join(projectRoot, '.taskloop'))
    await writeFile(join(projectRoot, '.taskloop', 'config.yaml'), 'loop:\n  max_iterations: 3\n', 'utf-8')

    const exitCode = await runInitAction({ projectRoot, force: false })

    expect(exitCode).toBe(INIT_EXIT_SUCCESS)
    expect(await readFile(join(projectRoot, '.taskloop', 'config.yaml'), 'utf-8')).toBe(
      'loop:\n  max_iterations: 3\n',
    )
    expect(output.stdout()).toContain('  Kept    .taskloop/config.yaml (exists)\n')
    expect(output.stdout()).toContain('  Created .taskloop/triggers.yaml\n')
  })

  it('overwrites templates with --force but never the task store', async () => {
    const tasks = '{"id":"1","title":"Ship it","status":"pending","leaf":true}\n'
    await mkdir(join(projectRoot, '.taskloop'))
    await writeFile(join(projectRoot, '.taskloop', 'config.yaml'), 'loop:\n  max_iterations: 3\n', 'utf-8')
    await writeFile(join(projectRoot, '.taskloop', 'tasks.jsonl'), tasks, 'utf-8')

    const exitCode = await runInitAction({ projectRoot, force: true })

    expect(exitCode).toBe(INIT_EXIT_SUCCESS)
    expect(await readFile(join(projectRoot, '.taskloop', 'config.yaml'), 'utf-8')).toBe(
      await readFile(join(defaultTemplatesDir(), 'config.yaml'), 'utf-8'),
    )
    expect(await readFile(join(projectRoot, '.taskloop', 'tasks.jsonl'), 'utf-8')).toBe(tasks)
    expect(output.stdout()).toContain('  Kept    .taskloop/tasks.jsonl (exists)\n')
  })

  it('fails with exit 1 when the templates are missing', async () => {
    const exitCode = await runInitAction({
      projectRoot,
      force: false,
      templatesDir: join(projectRoot, 'no-templates'),
    })

    expect(exitCode).toBe(INIT_EXIT_ERROR)
    expect(output.stderr()).toMatch(/^Error: failed to initialize .*\.taskloop: ENOENT/)
  })
})
