import { readFile, rm } from 'node:fs/promises'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('inbox')

/**
 * Read and delete the operator inbox file.
 *
 * @returns the trimmed message, or null when the file is missing or blank
 */
export async function readInbox(path: string): Promise<string | null> {
  let content: string
  try {
    content = await readFile(path, 'utf-8')
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null
    throw err
  }

  await rm(path, { force: true })
  const message = content.trim()
  if (message.length === 0) return null

  logger.info({ path, length: message.length }, 'Operator message received')
  return message
}
