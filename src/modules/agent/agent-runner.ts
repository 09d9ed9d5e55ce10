/**
 * AgentRunner: the boundary to the external coding agent.
 *
 * The loop hands the agent an opaque prompt plus the task identity and mode,
 * and gets back only the process outcome. Task state changes are observed
 * through the task store, never parsed from the agent's output.
 *
 * Implementation: CliAgentRunner (cli-agent-runner.ts)
 */

import type { LoopMode, TaskId } from '../../core/types.js'

/** `project` covers invocations not tied to one task, such as the completion check */
export type AgentMode = LoopMode | 'project'

export interface AgentRequest {
  prompt: string
  /** Empty for project-level invocations */
  taskId: TaskId
  title: string
  mode: AgentMode
}

export interface AgentResult {
  /** Process exit code; 1 when the process was killed or could not start */
  exitCode: number
  stdout: string
  stderr: string
  /** True when the per-call ceiling expired and the process was killed */
  timedOut: boolean
  durationMs: number
}

export interface AgentRunner {
  /**
   * Run one blocking agent invocation. Never rejects for process failures:
   * a failed spawn, a non-zero exit and a timeout are all reported in the result.
   */
  invoke(request: AgentRequest): Promise<AgentResult>
}
