/**
 * Prompt assembly for agent invocations.
 */

import type { LoopMode } from '../../core/types.js'
import type { Task } from '../task-store/schemas.js'
import type { Role } from './types.js'

export interface BasePromptOptions {
  task: Task
  mode: LoopMode
  /** Path of the working agreement, relative to the project root */
  workingAgreement: string
  /** Operator message from the inbox, placed ahead of everything else */
  inbox?: string | null
}

export function buildBasePrompt(options: BasePromptOptions): string {
  const { task, mode, workingAgreement } = options
  const lines: string[] = []

  const inbox = options.inbox?.trim()
  if (inbox !== undefined && inbox.length > 0) {
    lines.push('OPERATOR MESSAGE (handle this before anything else):', inbox, '')
  }

  lines.push(`Follow the working agreement in ${workingAgreement}.`, '')
  lines.push(`TASK: [${task.id}] ${task.title}`)

  if (mode === 'verify') {
    lines.push(
      'MODE: VERIFY',
      'Every subtask of this task is finished. Check the original goal against the code.',
      `- Goal met: set [${task.id}] to "complete".`,
      `- Gaps remain: add subtasks under [${task.id}] for what is missing.`,
    )
  } else {
    lines.push(
      'MODE: WORK',
      `- Small enough: do the work, commit it and set [${task.id}] to "complete".`,
      `- Too large: set [${task.id}] to "split" and add subtasks under it.`,
      `- Cannot proceed: set [${task.id}] to "blocked" with a blocked_reason.`,
    )
  }

  return lines.join('\n')
}

/** Append the role section to the base prompt; no role leaves it unchanged */
export function composePrompt(base: string, role: Role | null): string {
  if (role === null) return base
  return `${base}\n\n---\n\nROLE: ${role.name}\n\n${role.content.trimEnd()}`
}

export interface CompletionCheckOptions {
  workingAgreement: string
  tasksFile: string
}

/** Prompt used once the store has no workable task left */
export function buildCompletionCheckPrompt(options: CompletionCheckOptions): string {
  return [
    'No open tasks remain. Decide whether the project is finished.',
    '',
    `Read ${options.workingAgreement}, then review what has been built against the project goals.`,
    '',
    '- Everything is done and verified: make no changes.',
    `- Something is missing: append pending tasks to ${options.tasksFile}, one JSON object per line,`,
    '  for example {"id": "7", "title": "Describe the missing piece", "status": "pending"}',
  ].join('\n')
}

export interface IdleMessagePromptOptions {
  message: string
  tasksFile: string
}

/** Prompt used when an operator message arrives while no task is workable */
export function buildIdleMessagePrompt(options: IdleMessagePromptOptions): string {
  return [
    'No task is open. The operator says:',
    '',
    options.message.trim(),
    '',
    `- A request for work: append it to ${options.tasksFile} as pending tasks.`,
    '- A question: answer it briefly.',
    '- Feedback on the project: act on it where it belongs.',
  ].join('\n')
}
