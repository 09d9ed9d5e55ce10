/**
 * CliAgentRunner: runs the agent as a child process.
 *
 * Architecture constraints:
 *  - Uses child_process.spawn, not exec
 *  - Prompt delivered via stdin
 *  - Task identity exposed through TASKLOOP_* environment variables
 *  - Per-call ceiling: SIGTERM, then SIGKILL after a grace period
 */

import { spawn } from 'node:child_process'
import { createLogger } from '../../utils/logger.js'
import type { AgentRequest, AgentResult, AgentRunner } from './agent-runner.js'

const logger = createLogger('agent-runner')

// Grace period (ms) between SIGTERM and SIGKILL after a timeout
const DEFAULT_KILL_GRACE_MS = 10_000

export interface CliAgentRunnerOptions {
  command: string
  args: readonly string[]
  /** Per-call ceiling in milliseconds */
  timeoutMs: number
  /** Working directory of the agent (the project root) */
  cwd: string
  killGraceMs?: number
  /** Base environment; defaults to process.env */
  env?: NodeJS.ProcessEnv
}

export class CliAgentRunner implements AgentRunner {
  private readonly _options: CliAgentRunnerOptions

  constructor(options: CliAgentRunnerOptions) {
    this._options = options
  }

  invoke(request: AgentRequest): Promise<AgentResult> {
    const { command, args, timeoutMs, cwd } = this._options
    const killGraceMs = this._options.killGraceMs ?? DEFAULT_KILL_GRACE_MS

    return new Promise((resolve) => {
      const startedAt = Date.now()
      const proc = spawn(command, [...args], {
        cwd,
        env: {
          ...(this._options.env ?? process.env),
          TASKLOOP_TASK_ID: request.taskId,
          TASKLOOP_TASK_TITLE: request.title,
          TASKLOOP_MODE: request.mode,
        },
        stdio: ['pipe', 'pipe', 'pipe'],
      })

      logger.debug({ taskId: request.taskId, command, pid: proc.pid }, 'Agent spawned')

      const stdoutChunks: Buffer[] = []
      const stderrChunks: Buffer[] = []
      let timedOut = false
      let settled = false
      let killHandle: ReturnType<typeof setTimeout> | null = null

      const timeoutHandle = setTimeout(() => {
        timedOut = true
        logger.warn({ taskId: request.taskId, timeoutMs }, 'Agent timed out; sending SIGTERM')
        killHandle = setTimeout(() => {
          logger.warn({ taskId: request.taskId }, 'Agent ignored SIGTERM; sending SIGKILL')
          proc.kill('SIGKILL')
        }, killGraceMs)
        proc.kill('SIGTERM')
      }, timeoutMs)

      const finish = (exitCode: number, extraStderr = ''): void => {
        if (settled) return
        settled = true
        clearTimeout(timeoutHandle)
        if (killHandle !== null) clearTimeout(killHandle)

        const stderr = Buffer.concat(stderrChunks).toString('utf-8') + extraStderr
        const result: AgentResult = {
          exitCode,
          stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
          stderr,
          timedOut,
          durationMs: Date.now() - startedAt,
        }
        logger.debug(
          { taskId: request.taskId, exitCode, timedOut, durationMs: result.durationMs },
          'Agent finished',
        )
        resolve(result)
      }

      proc.stdout?.on('data', (chunk: Buffer) => {
        stdoutChunks.push(chunk)
      })
      proc.stderr?.on('data', (chunk: Buffer) => {
        stderrChunks.push(chunk)
      })

      proc.on('close', (code) => {
        finish(code ?? 1)
      })
      proc.on('error', (err) => {
        logger.error({ taskId: request.taskId, command, err: err.message }, 'Agent process error')
        finish(1, err.message)
      })

      // Guard against EPIPE if the process exits before reading its stdin
      if (proc.stdin !== null) {
        proc.stdin.on('error', (err: NodeJS.ErrnoException) => {
          if (err.code !== 'EPIPE') {
            logger.warn({ taskId: request.taskId, error: err.message }, 'stdin write error')
          }
        })
        proc.stdin.end(request.prompt)
      }
    })
  }
}
