/**
 * StopSignal: cooperative stop request for the loop.
 *
 * A stop can come from another process (`taskloop stop` writes the signal
 * file) or from this one (SIGINT/SIGTERM). Either way it is only observed
 * between iterations, never during an agent call.
 */

import { mkdir, rm, stat, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { StopCheck } from '../iteration-controller/iteration-controller.js'

export class StopSignal implements StopCheck {
  readonly path: string
  private _requested = false

  constructor(path: string) {
    this.path = path
  }

  /** Request a stop from inside this process */
  request(): void {
    this._requested = true
  }

  /** Request a stop by writing the signal file */
  async requestFile(): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true })
    await writeFile(this.path, `${new Date().toISOString()}\n`, 'utf-8')
  }

  async isRequested(): Promise<boolean> {
    if (this._requested) return true
    try {
      await stat(this.path)
      return true
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return false
      throw err
    }
  }

  /**
   * Check for a stop request and clear it, so the next run starts clean.
   *
   * @returns true when a stop was requested
   */
  async consume(): Promise<boolean> {
    const requested = await this.isRequested()
    this._requested = false
    await rm(this.path, { force: true })
    return requested
  }
}
