/**
 * Progress lines for `taskloop run`, printed from event bus events.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { LoopEvents } from '../../core/event-bus.types.js'
import type { LoopRunResult } from '../../modules/loop/loop-runner.js'

type Formatters = { [K in keyof LoopEvents]?: (payload: LoopEvents[K]) => string }

export const PROGRESS_FORMATTERS: Formatters = {
  'task:claimed': ({ taskId, title, mode }) => `→ ${taskId}  ${title}${mode === 'verify' ? '  [verify]' : ''}`,
  'iteration:started': ({ iteration, maxIterations, role }) =>
    `  iteration ${String(iteration)}/${String(maxIterations)}${role !== null ? `  role: ${role}` : ''}`,
  'iteration:failed': ({ iteration, kind, message }) =>
    `  ! iteration ${String(iteration)} failed (${kind}): ${message}`,
  'task:completed': ({ taskId, commit }) => `✓ ${taskId}  merged as ${commit}`,
  'task:split': ({ taskId, children }) => `↳ ${taskId}  split into ${children.join(', ')}`,
  'task:blocked': ({ taskId, reason }) => `✗ ${taskId}  blocked: ${reason}`,
  'loop:idle': ({ daemon }) => (daemon ? 'Idle; waiting for new tasks' : 'No workable task left'),
}

/**
 * Subscribe to the events that have a progress line and hand each line to
 * `write`.
 *
 * @returns a function that removes the subscriptions
 */
export function attachProgressReporter(bus: TypedEventBus, write: (line: string) => void): () => void {
  const detachers: Array<() => void> = []

  const subscribe = <K extends keyof LoopEvents>(event: K): void => {
    const format = PROGRESS_FORMATTERS[event]
    if (format === undefined) return
    const handler = (payload: LoopEvents[K]): void => write(format(payload))
    bus.on(event, handler)
    detachers.push(() => bus.off(event, handler))
  }

  subscribe('task:claimed')
  subscribe('iteration:started')
  subscribe('iteration:failed')
  subscribe('task:completed')
  subscribe('task:split')
  subscribe('task:blocked')
  subscribe('loop:idle')

  return () => {
    for (const detach of detachers) detach()
  }
}

/** One-line summary printed when the loop exits */
export function formatRunSummary(result: LoopRunResult): string {
  const { summary } = result
  const why = result.reason === 'signal' ? 'Stopped on request' : 'Finished: nothing left to do'
  return (
    `${why}. ${String(summary.passes)} task run(s): ` +
    `${String(summary.completed)} completed, ${String(summary.split)} split, ` +
    `${String(summary.blocked)} blocked, ${String(summary.stuck)} stuck`
  )
}
