/**
 * Loading of the ordered trigger list from `.taskloop/triggers.yaml`.
 *
 * @example
 * triggers:
 *   - condition: branch_commits >= 5
 *     role: reviewer
 *   - condition: verifying
 *     role: architect
 */

import { readFile } from 'node:fs/promises'
import yaml from 'js-yaml'
import { z } from 'zod'
import { ConfigError } from '../../core/errors.js'

/** Role names double as file names under `.taskloop/roles/` */
export const ROLE_NAME_PATTERN = /^[a-z0-9][a-z0-9_-]*$/i

export const TriggerDefinitionSchema = z.object({
  condition: z.string().min(1),
  role: z.string().regex(ROLE_NAME_PATTERN, 'Role name may only contain letters, digits, "-" and "_"'),
})

export type TriggerDefinition = z.infer<typeof TriggerDefinitionSchema>

/** Entries are validated one by one so a single bad entry does not discard the rest */
export const TriggerFileSchema = z
  .object({
    triggers: z.array(z.unknown()).nullable().default([]),
  })
  .strict()

/**
 * Read the raw trigger entries. A missing or empty file yields an empty list.
 *
 * @throws ConfigError when the file is not valid YAML or lacks a `triggers` list
 */
export async function readTriggerFile(path: string): Promise<unknown[]> {
  let content: string
  try {
    content = await readFile(path, 'utf-8')
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return []
    throw err
  }

  let raw: unknown
  try {
    raw = yaml.load(content)
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err)
    throw new ConfigError(`Invalid YAML in ${path}: ${detail}`, { path })
  }
  if (raw === undefined || raw === null) return []

  const parsed = TriggerFileSchema.safeParse(raw)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`,
    )
    throw new ConfigError(`Invalid trigger file ${path}: ${issues.join('; ')}`, { path })
  }
  return parsed.data.triggers ?? []
}
