/**
 * Classification of failed agent invocations.
 *
 *  - auth:      credentials, credit or quota problems; retrying cannot help
 *  - transient: rate limits, overload, server and network errors; retry with backoff
 *  - task:      the agent ran but produced nothing useful; counts toward the iteration cap
 */

import type { AgentResult } from './agent-runner.js'

export type AgentFailureKind = 'auth' | 'transient' | 'task'

export interface AgentFailure {
  kind: AgentFailureKind
  message: string
}

const AUTH_PATTERNS = [
  /\bunauthori[sz]ed\b/i,
  /\bauthentication\b/i,
  /invalid[ _-]?api[ _-]?key/i,
  /\b401\b/,
  /\b403\b/,
  /insufficient/i,
  /\bcredits?\b/i,
  /\bquota\b/i,
  /\bbilling\b/i,
  /please (?:run )?\/?login/i,
]

const TRANSIENT_PATTERNS = [
  /rate[ _-]?limit/i,
  /\b429\b/,
  /overloaded/i,
  /\b5(?:00|02|03|29)\b/,
  /internal server error/i,
  /api_error/i,
  /ECONNRESET|ECONNREFUSED|ETIMEDOUT|EAI_AGAIN/,
  /socket hang up/i,
]

const MAX_MESSAGE_LENGTH = 500

/** Kind suggested by an error text, or null when it matches no known pattern */
export function classifyMessage(text: string): Exclude<AgentFailureKind, 'task'> | null {
  if (AUTH_PATTERNS.some((pattern) => pattern.test(text))) return 'auth'
  if (TRANSIENT_PATTERNS.some((pattern) => pattern.test(text))) return 'transient'
  return null
}

interface StructuredOutput {
  isError: boolean
  message: string
}

/**
 * Read a JSON result object from the last non-empty stdout line, as printed by
 * agents run with a JSON output format: `{"is_error": false, "result": "..."}`.
 */
export function parseStructuredOutput(stdout: string): StructuredOutput | null {
  const lines = stdout.split('\n').filter((line) => line.trim().length > 0)
  const last = lines[lines.length - 1]
  if (last === undefined) return null

  let parsed: unknown
  try {
    parsed = JSON.parse(last)
  } catch {
    return null
  }
  if (typeof parsed !== 'object' || parsed === null || !('is_error' in parsed)) return null
  if (typeof parsed.is_error !== 'boolean') return null

  let message = ''
  if ('result' in parsed && typeof parsed.result === 'string') {
    message = parsed.result
  } else if ('subtype' in parsed && typeof parsed.subtype === 'string') {
    message = parsed.subtype
  }
  return { isError: parsed.is_error, message }
}

function clip(text: string): string {
  const trimmed = text.trim()
  return trimmed.length > MAX_MESSAGE_LENGTH ? `${trimmed.slice(0, MAX_MESSAGE_LENGTH)}...` : trimmed
}

/**
 * Classify an invocation result. Only stderr and the error result of
 * structured output are matched against the known patterns; the agent's
 * ordinary stdout is never read as an error text.
 *
 * @returns null when the invocation succeeded
 */
export function classifyAgentResult(result: AgentResult): AgentFailure | null {
  if (result.timedOut) {
    return { kind: 'task', message: `Agent timed out after ${String(result.durationMs)}ms` }
  }

  const exitMessage = `Agent exited with code ${String(result.exitCode)}`
  const structured = parseStructuredOutput(result.stdout)
  if (structured !== null) {
    if (!structured.isError && result.exitCode === 0) return null
    const errorText = structured.isError ? structured.message : ''
    const message = clip(errorText || result.stderr) || exitMessage
    return { kind: classifyMessage(`${errorText}\n${result.stderr}`) ?? 'task', message }
  }

  if (result.exitCode === 0) {
    if (result.stdout.trim().length === 0) {
      return { kind: 'task', message: 'Agent exited without output' }
    }
    return null
  }

  const message = clip(result.stderr) || exitMessage
  return { kind: classifyMessage(result.stderr) ?? 'transient', message }
}
