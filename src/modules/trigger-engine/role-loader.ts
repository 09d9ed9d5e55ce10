/**
 * FileRoleLoader: reads role content from `<rolesDir>/<name>.md`.
 * Files are read on every call so edits take effect on the next iteration.
 */

import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { createLogger } from '../../utils/logger.js'
import { ROLE_NAME_PATTERN } from './trigger-config.js'
import type { Role, RoleLoader } from './types.js'

const logger = createLogger('role-loader')

export class FileRoleLoader implements RoleLoader {
  constructor(private readonly _rolesDir: string) {}

  async load(name: string): Promise<Role | null> {
    if (!ROLE_NAME_PATTERN.test(name)) {
      logger.warn({ role: name }, 'Ignoring role with an invalid name')
      return null
    }

    const path = join(this._rolesDir, `${name}.md`)
    try {
      const content = await readFile(path, 'utf-8')
      return { name, content }
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        logger.warn({ role: name, path }, 'Role file not found; using the base prompt')
        return null
      }
      throw err
    }
  }
}
