/**
 * Unit tests for config-system-impl.ts
 *
 * Tests:
 *  - Hierarchy loading (defaults < project < env < CLI)
 *  - Config validation errors
 *  - get() dot-notation access
 *  - Environment override parsing
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { createConfigSystem, readEnvOverrides } from '../config-system-impl.js'
import type { ConfigSystemOptions } from '../config-system.js'
import { DEFAULT_CONFIG } from '../defaults.js'
import { ConfigError } from '../../../core/errors.js'

// ---------------------------------------------------------------------------
// Test setup: temporary directories
// ---------------------------------------------------------------------------

let testDir: string
let projectConfigDir: string

beforeEach(async () => {
  testDir = await mkdtemp(join(tmpdir(), 'taskloop-config-'))
  projectConfigDir = join(testDir, '.taskloop')
  await mkdir(projectConfigDir, { recursive: true })
})

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true })
})

// ---------------------------------------------------------------------------
// Helper
// ---------------------------------------------------------------------------

function createSystem(overrides: ConfigSystemOptions = {}): ReturnType<typeof createConfigSystem> {
  return createConfigSystem({ projectConfigDir, env: {}, ...overrides })
}

async function writeConfig(content: string): Promise<void> {
  await writeFile(join(projectConfigDir, 'config.yaml'), content, 'utf-8')
}

// ---------------------------------------------------------------------------
// Default config loading
// ---------------------------------------------------------------------------

describe('ConfigSystem - default config', () => {
  it('returns the defaults when no config file exists', async () => {
    const system = createSystem()
    await system.load()
    expect(system.getConfig()).toEqual(DEFAULT_CONFIG)
  })

  it('has the documented defaults', async () => {
    const system = createSystem()
    await system.load()
    const config = system.getConfig()
    expect(config.loop).toEqual({
      max_iterations: 20,
      poll_interval_ms: 5000,
      iteration_delay_ms: 2000,
      max_consecutive_failures: 5,
      retry_delays_ms: [5000, 15000, 30000, 60000],
      completion_check: true,
    })
    expect(config.agent.command).toBe('claude')
    expect(config.agent.timeout_ms).toBe(3_600_000)
    expect(config.git).toEqual({ branch_prefix: 'task/', slug_max_length: 30 })
    expect(config.global.log_level).toBeUndefined()
  })

  it('treats an empty config file as no overrides', async () => {
    await writeConfig('')
    const system = createSystem()
    await system.load()
    expect(system.getConfig()).toEqual(DEFAULT_CONFIG)
  })

  it('throws ConfigError if getConfig called before load', () => {
    const system = createSystem()
    expect(system.isLoaded).toBe(false)
    expect(() => system.getConfig()).toThrow(ConfigError)
  })
})

// ---------------------------------------------------------------------------
// Hierarchy loading
// ---------------------------------------------------------------------------

describe('ConfigSystem - hierarchy loading', () => {
  it('project config overrides defaults and keeps the rest', async () => {
    await writeConfig('loop:\n  max_iterations: 8\n  retry_delays_ms: [10]\n')

    const system = createSystem()
    await system.load()
    const config = system.getConfig()
    expect(config.loop.max_iterations).toBe(8)
    expect(config.loop.retry_delays_ms).toEqual([10])
    expect(config.loop.poll_interval_ms).toBe(5000)
  })

  it('env var overrides project config', async () => {
    await writeConfig('loop:\n  max_iterations: 8\n')

    const system = createSystem({ env: { TASKLOOP_MAX_ITERATIONS: '12' } })
    await system.load()
    expect(system.getConfig().loop.max_iterations).toBe(12)
  })

  it('CLI overrides take highest priority', async () => {
    await writeConfig('git:\n  base_branch: develop\n')

    const system = createSystem({
      env: { TASKLOOP_BASE_BRANCH: 'release' },
      cliOverrides: { git: { base_branch: 'main' } },
    })
    await system.load()
    expect(system.getConfig().git.base_branch).toBe('main')
  })

  it('get() reads dot-notation keys', async () => {
    const system = createSystem()
    await system.load()
    expect(system.get('agent.command')).toBe('claude')
    expect(system.get('loop.nope')).toBeUndefined()
    expect(system.get('agent.command.length')).toBeUndefined()
  })
})

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

describe('ConfigSystem - validation', () => {
  it('rejects unknown keys in the config file', async () => {
    await writeConfig('loop:\n  max_iteration: 5\n')

    await expect(createSystem().load()).rejects.toThrow(ConfigError)
    await expect(createSystem().load()).rejects.toThrow(/^Invalid config file at /)
  })

  it('rejects values of the wrong type', async () => {
    await writeConfig('agent:\n  timeout_ms: soon\n')
    await expect(createSystem().load()).rejects.toThrow(/agent\.timeout_ms/)
  })

  it('rejects malformed YAML', async () => {
    await writeConfig('loop: [unclosed\n')
    await expect(createSystem().load()).rejects.toThrow(/^Invalid YAML in config file at /)
  })

  it('rejects an unsupported format version', async () => {
    await writeConfig('config_format_version: "9"\n')
    await expect(createSystem().load()).rejects.toThrow('Unsupported config_format_version "9"')
  })

  it('rejects an invalid CLI override', async () => {
    const system = createSystem({ cliOverrides: { loop: { max_iterations: 0 } } })
    await expect(system.load()).rejects.toThrow(/^Configuration validation failed:/)
  })
})

// ---------------------------------------------------------------------------
// readEnvOverrides
// ---------------------------------------------------------------------------

describe('readEnvOverrides', () => {
  it('maps and coerces the known variables', () => {
    expect(
      readEnvOverrides({
        TASKLOOP_LOG_LEVEL: 'debug',
        TASKLOOP_POLL_INTERVAL_MS: '250',
        TASKLOOP_AGENT_COMMAND: 'my-agent',
        TASKLOOP_AGENT_TIMEOUT_MS: '60000',
        UNRELATED: 'x',
      }),
    ).toEqual({
      global: { log_level: 'debug' },
      loop: { poll_interval_ms: 250 },
      agent: { command: 'my-agent', timeout_ms: 60000 },
    })
  })

  it('skips invalid values and keeps valid ones', () => {
    expect(
      readEnvOverrides({
        TASKLOOP_MAX_ITERATIONS: 'lots',
        TASKLOOP_POLL_INTERVAL_MS: '100',
        TASKLOOP_LOG_LEVEL: 'loud',
      }),
    ).toEqual({ loop: { poll_interval_ms: 100 } })
  })

  it('ignores empty values', () => {
    expect(readEnvOverrides({ TASKLOOP_BASE_BRANCH: '' })).toEqual({})
  })
})
