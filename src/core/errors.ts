/**
 * Error definitions for taskloop
 * Provides the structured error hierarchy used across the loop
 */

/** Base error class for all taskloop errors */
export class TaskloopError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'TaskloopError'
    this.code = code
    this.context = context
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TaskloopError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Error thrown when the task store holds a malformed or inconsistent record */
export class StoreCorruptError extends TaskloopError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'STORE_CORRUPT', context)
    this.name = 'StoreCorruptError'
  }
}

/** Error thrown when a task id is not present in the active store */
export class TaskNotFoundError extends TaskloopError {
  constructor(taskId: string) {
    super(`Task not found: ${taskId}`, 'TASK_NOT_FOUND', { taskId })
    this.name = 'TaskNotFoundError'
  }
}

/** Error thrown when an operation does not apply to the task's current status */
export class TaskStateError extends TaskloopError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'TASK_STATE', context)
    this.name = 'TaskStateError'
  }
}

/** Error thrown when git operations fail */
export class GitError extends TaskloopError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'GIT_ERROR', context)
    this.name = 'GitError'
  }
}

/** Error thrown when a task branch name is already taken by a branch the loop does not own */
export class BranchExistsError extends TaskloopError {
  constructor(branchName: string, taskId: string) {
    super(
      `Branch "${branchName}" already exists and is not owned by task ${taskId}; resolve it manually`,
      'BRANCH_EXISTS',
      { branchName, taskId }
    )
    this.name = 'BranchExistsError'
  }
}

/** Error thrown when a squash merge stops on conflicts */
export class MergeConflictError extends TaskloopError {
  public readonly conflictingFiles: string[]

  constructor(branchName: string, taskId: string, conflictingFiles: string[]) {
    super(
      `Squash merge of "${branchName}" conflicts in ${String(conflictingFiles.length)} file(s)`,
      'MERGE_CONFLICT',
      { branchName, taskId, conflictingFiles }
    )
    this.name = 'MergeConflictError'
    this.conflictingFiles = conflictingFiles
  }
}

/** Error thrown when the external agent fails in a way that must not be retried */
export class AgentInvocationError extends TaskloopError {
  constructor(message: string, context: Record<string, unknown> = {}, code = 'AGENT_INVOCATION_FAILED') {
    super(message, code, context)
    this.name = 'AgentInvocationError'
  }
}

/** Error thrown when the agent reports an authentication, credit or quota failure */
export class AgentAuthError extends AgentInvocationError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, context, 'AGENT_AUTH_FAILURE')
    this.name = 'AgentAuthError'
  }
}

/** Error thrown when too many agent invocations fail back to back */
export class ConsecutiveFailureHaltError extends TaskloopError {
  constructor(failures: number, lastMessage: string) {
    super(
      `Halting after ${String(failures)} consecutive agent failures; last failure: ${lastMessage}`,
      'CONSECUTIVE_FAILURE_HALT',
      { failures, lastMessage }
    )
    this.name = 'ConsecutiveFailureHaltError'
  }
}

/** Error thrown when a trigger condition cannot be parsed */
export class TriggerSyntaxError extends TaskloopError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'TRIGGER_SYNTAX', context)
    this.name = 'TriggerSyntaxError'
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends TaskloopError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}
