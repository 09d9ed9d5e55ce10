/**
 * Lifecycle contract for services that hold outside state (the git working
 * copy). createTaskloop initializes them before the loop runs and shuts them
 * down when it ends.
 */
export interface BaseService {
  /** Validate the environment and prepare state */
  initialize(): Promise<void>

  /** Release what initialize() acquired; called once, also after a failed initialize() */
  shutdown(): Promise<void>
}
