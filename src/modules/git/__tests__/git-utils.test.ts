/**
 * Tests for git-utils.
 *
 * Uses vi.mock to simulate child_process.spawn with fake processes
 * so no real git processes are spawned.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { EventEmitter } from 'node:events'
import { PassThrough } from 'node:stream'

// ---------------------------------------------------------------------------
// Mock child_process.spawn
// ---------------------------------------------------------------------------

interface ScriptedResult {
  stdout?: string
  stderr?: string
  code?: number
  error?: Error
}

const scripted: ScriptedResult[] = []

function createFakeProcess(result: ScriptedResult) {
  const emitter = new EventEmitter()
  const stdout = new PassThrough()
  const stderr = new PassThrough()
  const proc = Object.assign(emitter, { stdin: null, stdout, stderr, pid: 12345, kill: vi.fn() })

  setImmediate(() => {
    if (result.error !== undefined) {
      emitter.emit('error', result.error)
      return
    }
    if (result.stdout !== undefined) stdout.push(result.stdout)
    if (result.stderr !== undefined) stderr.push(result.stderr)
    setImmediate(() => emitter.emit('close', result.code ?? 0))
  })

  return proc
}

vi.mock('node:child_process', () => ({
  spawn: vi.fn(() => createFakeProcess(scripted.shift() ?? {})),
}))

// Import after mocking
import { spawn } from 'node:child_process'
import { GitError } from '../../../core/errors.js'
import {
  countCommitsSince,
  getConflictingFiles,
  getCurrentBranch,
  hasStagedChanges,
  isGitVersionSupported,
  parseGitVersion,
  spawnGit,
} from '../git-utils.js'

beforeEach(() => {
  scripted.length = 0
  vi.mocked(spawn).mockClear()
})

describe('spawnGit', () => {
  it('collects trimmed output and the exit code', async () => {
    scripted.push({ stdout: 'main\n', code: 0 })
    await expect(spawnGit(['branch', '--show-current'], { cwd: '/repo' })).resolves.toEqual({
      stdout: 'main',
      stderr: '',
      code: 0,
    })
    expect(vi.mocked(spawn).mock.calls[0]?.[1]).toEqual(['branch', '--show-current'])
  })

  it('reports a spawn failure as exit code 1 instead of rejecting', async () => {
    scripted.push({ error: new Error('spawn git ENOENT') })
    await expect(spawnGit(['status'])).resolves.toEqual({ stdout: '', stderr: 'spawn git ENOENT', code: 1 })
  })
})

describe('branch helpers', () => {
  it('counts commits between the base and the branch', async () => {
    scripted.push({ stdout: '3\n' })
    await expect(countCommitsSince('main', 'task/A-x', '/repo')).resolves.toBe(3)
    expect(vi.mocked(spawn).mock.calls[0]?.[1]).toEqual(['rev-list', '--count', 'main..task/A-x'])
  })

  it('raises GitError when rev-list fails', async () => {
    scripted.push({ stderr: 'fatal: bad revision', code: 128 })
    await expect(countCommitsSince('main', 'task/A-x', '/repo')).rejects.toThrow(
      'git rev-list --count failed: fatal: bad revision',
    )
  })

  it('rejects a detached HEAD', async () => {
    scripted.push({ stdout: 'HEAD\n' })
    await expect(getCurrentBranch('/repo')).rejects.toBeInstanceOf(GitError)
  })

  it('lists conflicted files', async () => {
    scripted.push({ stdout: 'src/a.ts\nsrc/b.ts\n' })
    await expect(getConflictingFiles('/repo')).resolves.toEqual(['src/a.ts', 'src/b.ts'])
  })

  it('treats a non-zero diff --cached --quiet as staged changes', async () => {
    scripted.push({ code: 1 })
    await expect(hasStagedChanges('/repo')).resolves.toBe(true)
    scripted.push({ code: 0 })
    await expect(hasStagedChanges('/repo')).resolves.toBe(false)
  })
})

describe('git version', () => {
  it('parses partial versions', () => {
    expect(parseGitVersion('2.20')).toEqual({ major: 2, minor: 20, patch: 0 })
  })

  it('requires 2.20 or newer', () => {
    expect(isGitVersionSupported('2.19.9')).toBe(false)
    expect(isGitVersionSupported('2.20.0')).toBe(true)
    expect(isGitVersionSupported('3.0.0')).toBe(true)
  })
})
