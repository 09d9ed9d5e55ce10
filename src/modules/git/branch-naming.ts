/**
 * Branch naming for task branches: `<prefix><id>-<slug>`. Ids never contain
 * "-", so the first dash after the prefix always ends the id.
 *
 * The task id is always part of the name, so two tasks with the same title
 * never share a branch.
 */

import type { Task } from '../task-store/schemas.js'

export interface BranchNamingOptions {
  /** Prefix for every task branch, e.g. "task/" */
  prefix: string
  /** Maximum slug length before trailing dashes are trimmed */
  slugMaxLength: number
}

export const DEFAULT_BRANCH_NAMING: BranchNamingOptions = {
  prefix: 'task/',
  slugMaxLength: 30,
}

/**
 * Branch-safe slug: lower-cased, whitespace runs become "-", anything outside
 * [a-z0-9-] is dropped, then truncated and stripped of trailing dashes.
 */
export function slugify(title: string, maxLength: number): string {
  return title
    .toLowerCase()
    .trim()
    .replace(/\s+/g, '-')
    .replace(/[^a-z0-9-]/g, '')
    .slice(0, maxLength)
    .replace(/-+$/, '')
}

export function branchNameFor(task: Pick<Task, 'id' | 'title'>, options: BranchNamingOptions = DEFAULT_BRANCH_NAMING): string {
  const slug = slugify(task.title, options.slugMaxLength)
  return slug.length > 0 ? `${options.prefix}${task.id}-${slug}` : `${options.prefix}${task.id}`
}
