/**
 * Zod schemas for task store records.
 *
 * One JSON object per line. Fields the agent adds that the loop does not know
 * about are kept (passthrough) so a rewrite never drops them.
 */

import { z } from 'zod'
import { TASK_STATUSES } from '../../core/types.js'
import { isValidTaskId } from './task-id.js'

// ---------------------------------------------------------------------------
// TaskRecordSchema
// ---------------------------------------------------------------------------

export const TaskStatusSchema = z.enum(TASK_STATUSES)

export const TaskRecordSchema = z
  .object({
    id: z
      .string({ required_error: 'Task id is required' })
      .refine(isValidTaskId, (id) => ({ message: `Malformed task id "${id}"` })),
    title: z.string().default(''),
    status: TaskStatusSchema,
    leaf: z.boolean().default(true),
    blocked_reason: z.string().optional(),
    /** Branch opened for this task; lets a resumed task reclaim its own branch */
    branch: z.string().optional(),
    /** Set by the agent when it considers the work done but wants it confirmed */
    ready_to_complete: z.boolean().optional(),
  })
  .passthrough()
  .superRefine((task, ctx) => {
    if (task.blocked_reason !== undefined && task.status !== 'blocked') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['blocked_reason'],
        message: `blocked_reason is only allowed on blocked tasks (status is "${task.status}")`,
      })
    }
  })

export type Task = z.output<typeof TaskRecordSchema>

// ---------------------------------------------------------------------------
// ArchivedTaskSchema
// ---------------------------------------------------------------------------

export const ArchivedTaskSchema = z
  .object({
    id: z.string().refine(isValidTaskId, (id) => ({ message: `Malformed task id "${id}"` })),
    title: z.string().default(''),
    status: z.literal('complete'),
    leaf: z.boolean().default(true),
    /** ISO-8601 completion timestamp */
    completed: z.string().min(1),
    /** Commit that closed the task */
    commit: z.string().min(1),
  })
  .passthrough()

export type ArchivedTask = z.output<typeof ArchivedTaskSchema>
