/**
 * loop module: barrel export.
 */

export { createLoopRunner } from './loop-runner.js'
export type { LoopRunner, LoopRunnerConfig, LoopRunnerDeps, LoopRunResult, LoopSummary } from './loop-runner.js'
export { StopSignal } from './stop-signal.js'
export { readInbox } from './inbox.js'
