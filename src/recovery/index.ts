/**
 * Public API for the recovery module.
 */

export { reconcileStore, type ReconcileResult } from './crash-recovery.js'

export {
  setupGracefulShutdown,
  FORCED_EXIT_CODE,
  type ShutdownHandlerOptions,
} from './shutdown-handler.js'
