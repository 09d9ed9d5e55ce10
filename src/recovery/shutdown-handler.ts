/**
 * setupGracefulShutdown: registers SIGTERM and SIGINT handlers for a clean stop.
 *
 * The first signal requests a stop, which the loop honours between
 * iterations: the agent call in flight is allowed to finish. A second signal
 * exits immediately with code 130.
 *
 * Returns a cleanup function that removes the listeners (for test teardown).
 */

import type pino from 'pino'
import type { StopSignal } from '../modules/loop/stop-signal.js'
import { createLogger } from '../utils/logger.js'

const defaultLogger = createLogger('shutdown-handler')

export const FORCED_EXIT_CODE = 130

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ShutdownHandlerOptions {
  stopSignal: StopSignal
  logger?: pino.Logger
}

// ---------------------------------------------------------------------------
// setupGracefulShutdown
// ---------------------------------------------------------------------------

/**
 * Register SIGTERM and SIGINT handlers for graceful shutdown.
 *
 * @returns Cleanup function that removes the signal listeners
 */
export function setupGracefulShutdown(options: ShutdownHandlerOptions): () => void {
  const { stopSignal } = options
  const log = options.logger ?? defaultLogger
  let received = false

  const handle = (signal: NodeJS.Signals): void => {
    if (received) {
      log.warn({ signal }, 'Second signal received; exiting now')
      process.exit(FORCED_EXIT_CODE)
    }
    received = true
    stopSignal.request()
    log.info({ signal }, 'Stop requested; finishing the current iteration')
  }

  process.on('SIGINT', handle)
  process.on('SIGTERM', handle)

  // Return cleanup function for test teardown
  return (): void => {
    process.removeListener('SIGINT', handle)
    process.removeListener('SIGTERM', handle)
  }
}
