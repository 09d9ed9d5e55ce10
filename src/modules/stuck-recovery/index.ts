export { StuckTaskRecovery, blockTask, ITERATION_LIMIT_REASON } from './stuck-recovery.js'
