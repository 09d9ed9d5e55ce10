/**
 * Taskloop interface: the public contract for a wired loop instance.
 *
 * Callers depend on this interface, not the concrete implementation.
 * Create an instance via `createTaskloop()` from taskloop-impl.ts.
 */

import type { TaskloopConfig } from '../modules/config/config-schema.js'
import type { AgentRunner } from '../modules/agent/agent-runner.js'
import type { BranchWorkflowManager } from '../modules/git/branch-workflow-manager.js'
import type { LoopRunResult } from '../modules/loop/loop-runner.js'
import type { StopSignal } from '../modules/loop/stop-signal.js'
import type { TaskStore } from '../modules/task-store/task-store.js'
import type { TypedEventBus } from './event-bus.js'

// ---------------------------------------------------------------------------
// TaskloopOptions
// ---------------------------------------------------------------------------

export interface TaskloopOptions {
  /** Git work tree the agent works in */
  projectRoot: string

  /** Fully resolved configuration (see ConfigSystem.load) */
  config: TaskloopConfig

  /** Replaces the CLI agent runner built from `config.agent` */
  agentRunner?: AgentRunner

  /** Replaces the git branch workflow */
  branches?: BranchWorkflowManager

  /**
   * Register SIGINT/SIGTERM handlers that request a stop.
   * @default true
   */
  handleSignals?: boolean

  /** Used for every loop wait: retry backoff, iteration delay, idle polling */
  sleep?: (ms: number) => Promise<void>
}

// ---------------------------------------------------------------------------
// Taskloop interface
// ---------------------------------------------------------------------------

/**
 * A fully wired loop.
 *
 * Lifecycle:
 *  1. Create via `createTaskloop(options)`; services are initialized before it resolves
 *  2. Subscribe to `eventBus` for progress
 *  3. `run()` until the loop goes idle or a stop is requested
 *  4. `shutdown()` parks any open branch and removes signal handlers
 */
export interface Taskloop {
  readonly eventBus: TypedEventBus

  readonly store: TaskStore

  readonly stopSignal: StopSignal

  /** Whether every service finished initializing */
  readonly isReady: boolean

  run(options?: { daemon?: boolean }): Promise<LoopRunResult>

  /** Safe to call more than once; later calls are no-ops */
  shutdown(): Promise<void>
}
