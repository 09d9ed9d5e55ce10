import { describe, it, expect } from 'vitest'
import type { AgentResult } from '../agent-runner.js'
import { classifyAgentResult, parseStructuredOutput } from '../failure-classifier.js'

function result(overrides: Partial<AgentResult>): AgentResult {
  return { exitCode: 0, stdout: '', stderr: '', timedOut: false, durationMs: 1000, ...overrides }
}

describe('parseStructuredOutput', () => {
  it('reads the JSON object on the last non-empty line', () => {
    const stdout = 'progress...\n{"type":"result","is_error":true,"result":"Reached max turns"}\n\n'
    expect(parseStructuredOutput(stdout)).toEqual({ isError: true, message: 'Reached max turns' })
  })

  it('ignores plain text and JSON without is_error', () => {
    expect(parseStructuredOutput('all done')).toBeNull()
    expect(parseStructuredOutput('{"result":"x"}')).toBeNull()
  })
})

describe('classifyAgentResult', () => {
  it('accepts a zero exit with output', () => {
    expect(classifyAgentResult(result({ stdout: 'done\n' }))).toBeNull()
  })

  it('accepts a structured success', () => {
    expect(classifyAgentResult(result({ stdout: '{"type":"result","is_error":false,"result":"ok"}' }))).toBeNull()
  })

  it('treats a zero exit without output as a task failure', () => {
    expect(classifyAgentResult(result({ stdout: '  \n' }))).toEqual({
      kind: 'task',
      message: 'Agent exited without output',
    })
  })

  it('treats a timeout as a task failure', () => {
    expect(classifyAgentResult(result({ exitCode: 1, timedOut: true }))).toEqual({
      kind: 'task',
      message: 'Agent timed out after 1000ms',
    })
  })

  it('classifies structured errors by their message', () => {
    const structured = (message: string) =>
      result({ exitCode: 1, stdout: JSON.stringify({ is_error: true, result: message }) })

    expect(classifyAgentResult(structured('Credit balance is too low'))).toEqual({
      kind: 'auth',
      message: 'Credit balance is too low',
    })
    expect(classifyAgentResult(structured('API Error: 529 overloaded'))?.kind).toBe('transient')
    expect(classifyAgentResult(structured('Reached max turns'))?.kind).toBe('task')
  })

  it('classifies unstructured failures from stderr', () => {
    expect(classifyAgentResult(result({ exitCode: 1, stderr: 'Invalid API key · Please run /login' }))?.kind).toBe(
      'auth',
    )
    expect(classifyAgentResult(result({ exitCode: 1, stderr: 'Error: 429 Too Many Requests' }))?.kind).toBe(
      'transient',
    )
  })

  it('retries unknown non-zero exits as transient', () => {
    expect(classifyAgentResult(result({ exitCode: 2, stderr: 'segfault\n' }))).toEqual({
      kind: 'transient',
      message: 'segfault',
    })
    expect(classifyAgentResult(result({ exitCode: 2 }))).toEqual({
      kind: 'transient',
      message: 'Agent exited with code 2',
    })
  })

  it('does not read error kinds from the agent\'s ordinary stdout', () => {
    const prose = 'Refactored the billing module and fixed the 403 handler.'

    expect(classifyAgentResult(result({ exitCode: 1, stdout: prose }))).toEqual({
      kind: 'transient',
      message: 'Agent exited with code 1',
    })
  })

  it('ignores the result text of a structured success that exited non-zero', () => {
    const stdout = JSON.stringify({ is_error: false, result: 'Updated the credits page' })

    expect(classifyAgentResult(result({ exitCode: 1, stdout }))).toEqual({
      kind: 'task',
      message: 'Agent exited with code 1',
    })
  })
})
