/**
 * AgentInvoker: applies the failure policy around an AgentRunner.
 *
 * Policy:
 *  - success resets the consecutive-failure counter
 *  - every failed invocation increments it, across all tasks
 *  - auth failures halt immediately (AgentAuthError)
 *  - reaching the consecutive-failure limit halts (ConsecutiveFailureHaltError)
 *  - transient failures are retried after each configured delay in turn
 *  - task failures, and transient ones with no delays left, are returned
 *    to the caller as a failed iteration
 */

import { AgentAuthError, ConsecutiveFailureHaltError } from '../../core/errors.js'
import { sleep as defaultSleep } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { AgentRequest, AgentResult, AgentRunner } from './agent-runner.js'
import { classifyAgentResult } from './failure-classifier.js'
import type { AgentFailure } from './failure-classifier.js'

const logger = createLogger('agent-invoker')

export type InvocationOutcome =
  | { ok: true; result: AgentResult }
  | { ok: false; result: AgentResult; failure: AgentFailure }

export interface AgentInvokerOptions {
  maxConsecutiveFailures: number
  retryDelaysMs: readonly number[]
  sleep?: (ms: number) => Promise<void>
}

export class AgentInvoker {
  private readonly _runner: AgentRunner
  private readonly _maxConsecutiveFailures: number
  private readonly _retryDelaysMs: readonly number[]
  private readonly _sleep: (ms: number) => Promise<void>
  private _consecutiveFailures = 0

  constructor(runner: AgentRunner, options: AgentInvokerOptions) {
    this._runner = runner
    this._maxConsecutiveFailures = options.maxConsecutiveFailures
    this._retryDelaysMs = options.retryDelaysMs
    this._sleep = options.sleep ?? defaultSleep
  }

  get consecutiveFailures(): number {
    return this._consecutiveFailures
  }

  /**
   * @throws AgentAuthError on an auth failure
   * @throws ConsecutiveFailureHaltError when the failure limit is reached
   */
  async invoke(request: AgentRequest): Promise<InvocationOutcome> {
    let retry = 0

    for (;;) {
      const result = await this._runner.invoke(request)
      const failure = classifyAgentResult(result)

      if (failure === null) {
        this._consecutiveFailures = 0
        return { ok: true, result }
      }

      this._consecutiveFailures++
      logger.warn(
        {
          taskId: request.taskId,
          kind: failure.kind,
          exitCode: result.exitCode,
          consecutiveFailures: this._consecutiveFailures,
          message: failure.message,
        },
        'Agent invocation failed',
      )

      if (failure.kind === 'auth') {
        throw new AgentAuthError(`Agent authentication failed: ${failure.message}`, {
          taskId: request.taskId,
          exitCode: result.exitCode,
        })
      }

      if (this._consecutiveFailures >= this._maxConsecutiveFailures) {
        throw new ConsecutiveFailureHaltError(this._consecutiveFailures, failure.message)
      }

      const delay = this._retryDelaysMs[retry]
      if (failure.kind === 'transient' && delay !== undefined) {
        retry++
        logger.info(
          { taskId: request.taskId, attempt: retry, of: this._retryDelaysMs.length, delayMs: delay },
          'Retrying agent after transient failure',
        )
        await this._sleep(delay)
        continue
      }

      return { ok: false, result, failure }
    }
  }
}
