/**
 * ConfigSystem interface: public contract for the configuration subsystem.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { PartialTaskloopConfig, TaskloopConfig } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ConfigSystemOptions {
  /** Path to the project-level .taskloop/ directory (default: <cwd>/.taskloop) */
  projectConfigDir?: string
  /** Highest-priority values, typically populated from CLI flags */
  cliOverrides?: PartialTaskloopConfig
  /** Environment to read TASKLOOP_* overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Provides access to fully-merged, validated taskloop configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < project config < env vars < CLI flags
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * Must be called before `getConfig()`.
   *
   * @throws {ConfigError} if the config file or the merged result is invalid
   */
  load(): Promise<void>

  /**
   * Return the fully-merged, validated configuration.
   * @throws {ConfigError} if `load()` has not been called.
   */
  getConfig(): TaskloopConfig

  /**
   * Return a single value by dot-notation key (e.g. "loop.max_iterations").
   * @returns the value, or undefined if the key does not exist.
   */
  get(key: string): unknown

  /** Whether load() has been called and succeeded */
  readonly isLoaded: boolean
}
