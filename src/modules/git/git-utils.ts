/**
 * git-utils.ts: Low-level git command helpers.
 *
 * All git commands are executed via child_process.spawn against the project
 * working copy. Helpers that the branch workflow cannot continue without
 * throw GitError; cleanup helpers log and report failure instead.
 *
 * Functions:
 *  - spawnGit: Execute git with given args, returns stdout/stderr/code
 *  - getGitVersion / parseGitVersion / isGitVersionSupported / verifyGitVersion
 *  - getCurrentBranch: Name of the checked-out branch
 *  - branchExists: Whether a local branch exists
 *  - createBranch: Create a branch from a base and check it out
 *  - checkoutBranch: Check out an existing branch
 *  - countCommitsSince: Commits on a branch that are not on its base
 *  - squashMerge: git merge --squash
 *  - getConflictingFiles: git diff --name-only --diff-filter=U
 *  - resetMerge: git reset --merge, to back out of a conflicted squash
 *  - hasStagedChanges: git diff --cached --quiet
 *  - commit: Commit the index with a message
 *  - getShortHead: Abbreviated hash of HEAD
 *  - removeBranch: git branch -D
 */

import { spawn } from 'node:child_process'
import { GitError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('git-utils')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SpawnOptions {
  cwd?: string
  env?: NodeJS.ProcessEnv
}

export interface GitSpawnResult {
  stdout: string
  stderr: string
  code: number
}

export interface GitVersion {
  major: number
  minor: number
  patch: number
}

// Minimum supported git version (merge --squash with reset --merge recovery)
const MIN_GIT_MAJOR = 2
const MIN_GIT_MINOR = 20

// ---------------------------------------------------------------------------
// spawnGit
// ---------------------------------------------------------------------------

/**
 * Spawn a git subprocess with the given args. Never rejects: a failure to
 * start git is reported as exit code 1 with the error message on stderr.
 *
 * @param args    - Arguments to pass to git (e.g., ['checkout', '-b', ...])
 * @param options - Optional spawn options (cwd, env)
 */
export function spawnGit(args: string[], options?: SpawnOptions): Promise<GitSpawnResult> {
  return new Promise((resolve) => {
    logger.debug({ args, cwd: options?.cwd }, 'spawnGit')

    const proc = spawn('git', args, {
      cwd: options?.cwd,
      env: options?.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    })

    let stdout = ''
    let stderr = ''

    proc.stdout?.on('data', (chunk: Buffer) => {
      stdout += chunk.toString()
    })

    proc.stderr?.on('data', (chunk: Buffer) => {
      stderr += chunk.toString()
    })

    proc.on('close', (code) => {
      resolve({ stdout: stdout.trim(), stderr: stderr.trim(), code: code ?? 1 })
    })

    proc.on('error', (err) => {
      resolve({ stdout: '', stderr: err.message, code: 1 })
    })
  })
}

function failure(action: string, result: GitSpawnResult, context: Record<string, unknown> = {}): GitError {
  const detail = result.stderr || result.stdout || `exit code ${String(result.code)}`
  return new GitError(`git ${action} failed: ${detail}`, { ...context, exitCode: result.code })
}

function lines(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
}

// ---------------------------------------------------------------------------
// Version checks
// ---------------------------------------------------------------------------

/**
 * Get the installed git version string, e.g. "2.42.0".
 *
 * @throws GitError if git is not installed or the version cannot be parsed
 */
export async function getGitVersion(): Promise<string> {
  const result = await spawnGit(['--version'])

  if (result.code !== 0) {
    throw failure('--version', result)
  }

  // Output is like: "git version 2.42.0"
  const match = /git version\s+(\d+\.\d+(?:\.\d+)?)/.exec(result.stdout)
  if (match === null || match[1] === undefined) {
    throw new GitError(`Unable to parse git version from output: "${result.stdout}"`)
  }

  return match[1]
}

export function parseGitVersion(versionString: string): GitVersion {
  const parts = versionString.split('.').map(Number)
  return {
    major: parts[0] ?? 0,
    minor: parts[1] ?? 0,
    patch: parts[2] ?? 0,
  }
}

export function isGitVersionSupported(version: string): boolean {
  const { major, minor } = parseGitVersion(version)
  if (major > MIN_GIT_MAJOR) return true
  if (major === MIN_GIT_MAJOR && minor >= MIN_GIT_MINOR) return true
  return false
}

/**
 * Verify that git is installed and version >= 2.20.
 *
 * @throws GitError if git is missing or too old
 */
export async function verifyGitVersion(): Promise<void> {
  let version: string
  try {
    version = await getGitVersion()
  } catch (err) {
    throw new GitError(
      `git is not installed or could not be executed. Please install git 2.20 or newer. Details: ${String(err)}`,
    )
  }

  if (!isGitVersionSupported(version)) {
    const { major, minor, patch } = parseGitVersion(version)
    throw new GitError(
      `Git version ${String(major)}.${String(minor)}.${String(patch)} is too old; git 2.20 or newer is required`,
      { version },
    )
  }

  logger.debug({ version }, 'git version verified')
}

// ---------------------------------------------------------------------------
// Branches
// ---------------------------------------------------------------------------

/**
 * @throws GitError outside a repository or on a detached HEAD
 */
export async function getCurrentBranch(cwd: string): Promise<string> {
  const result = await spawnGit(['rev-parse', '--abbrev-ref', 'HEAD'], { cwd })
  if (result.code !== 0) {
    throw failure('rev-parse --abbrev-ref HEAD', result, { cwd })
  }
  if (result.stdout === 'HEAD') {
    throw new GitError('HEAD is detached; check out a branch first', { cwd })
  }
  return result.stdout
}

export async function branchExists(branchName: string, cwd: string): Promise<boolean> {
  const result = await spawnGit(['rev-parse', '--verify', '--quiet', `refs/heads/${branchName}`], { cwd })
  return result.code === 0
}

/**
 * Create `branchName` from `baseBranch` and check it out.
 *
 * @throws GitError if the branch cannot be created
 */
export async function createBranch(branchName: string, baseBranch: string, cwd: string): Promise<void> {
  const result = await spawnGit(['checkout', '-b', branchName, baseBranch], { cwd })
  if (result.code !== 0) {
    throw failure(`checkout -b ${branchName}`, result, { branchName, baseBranch })
  }
  logger.debug({ branchName, baseBranch }, 'Branch created')
}

/**
 * @throws GitError if the checkout fails (e.g. local changes would be overwritten)
 */
export async function checkoutBranch(branchName: string, cwd: string): Promise<void> {
  const result = await spawnGit(['checkout', branchName], { cwd })
  if (result.code !== 0) {
    throw failure(`checkout ${branchName}`, result, { branchName })
  }
}

/**
 * Number of commits reachable from `branchName` but not from `baseBranch`.
 *
 * @throws GitError if either ref is unknown
 */
export async function countCommitsSince(baseBranch: string, branchName: string, cwd: string): Promise<number> {
  const result = await spawnGit(['rev-list', '--count', `${baseBranch}..${branchName}`], { cwd })
  if (result.code !== 0) {
    throw failure('rev-list --count', result, { baseBranch, branchName })
  }
  const count = Number.parseInt(result.stdout, 10)
  if (Number.isNaN(count)) {
    throw new GitError(`Unexpected rev-list output: "${result.stdout}"`, { baseBranch, branchName })
  }
  return count
}

/**
 * Delete a branch with `git branch -D`.
 *
 * @returns true if the branch was deleted, false otherwise
 */
export async function removeBranch(branchName: string, cwd: string): Promise<boolean> {
  const result = await spawnGit(['branch', '-D', branchName], { cwd })

  if (result.code !== 0) {
    logger.warn({ branchName, stderr: result.stderr }, 'git branch -D failed (may already be deleted)')
    return false
  }

  logger.debug({ branchName }, 'Branch deleted')
  return true
}

// ---------------------------------------------------------------------------
// Merging
// ---------------------------------------------------------------------------

/**
 * Squash `branchName` into the index of the checked-out branch.
 *
 * @returns true if the squash applied cleanly, false on conflicts
 */
export async function squashMerge(branchName: string, cwd: string): Promise<boolean> {
  const result = await spawnGit(['merge', '--squash', branchName], { cwd })
  if (result.code !== 0) {
    logger.warn({ branchName, stderr: result.stderr }, 'git merge --squash failed')
    return false
  }
  return true
}

/**
 * Files left unmerged by a conflicted merge. Must be called before the merge
 * state is reset.
 */
export async function getConflictingFiles(cwd: string): Promise<string[]> {
  const result = await spawnGit(['diff', '--name-only', '--diff-filter=U'], { cwd })

  if (result.code !== 0) {
    logger.warn({ cwd, stderr: result.stderr }, 'getConflictingFiles: git diff returned non-zero')
    return []
  }

  return lines(result.stdout)
}

/**
 * Back out of a conflicted squash merge, restoring the index and work tree.
 *
 * @throws GitError if the reset fails and the working copy is left mid-merge
 */
export async function resetMerge(cwd: string): Promise<void> {
  const result = await spawnGit(['reset', '--merge'], { cwd })
  if (result.code !== 0) {
    throw failure('reset --merge', result)
  }
}

/** True when the index differs from HEAD */
export async function hasStagedChanges(cwd: string): Promise<boolean> {
  const result = await spawnGit(['diff', '--cached', '--quiet'], { cwd })
  return result.code !== 0
}

/**
 * @throws GitError if the commit fails
 */
export async function commit(message: string, cwd: string): Promise<void> {
  const result = await spawnGit(['commit', '-m', message], { cwd })
  if (result.code !== 0) {
    throw failure('commit', result)
  }
}

/**
 * @throws GitError if HEAD cannot be resolved
 */
export async function getShortHead(cwd: string): Promise<string> {
  const result = await spawnGit(['rev-parse', '--short', 'HEAD'], { cwd })
  if (result.code !== 0 || result.stdout.length === 0) {
    throw failure('rev-parse --short HEAD', result)
  }
  return result.stdout
}
