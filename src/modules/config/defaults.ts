/**
 * Built-in default values for the taskloop configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   project config → environment variables → CLI flags
 */

import type { AgentSettings, GitSettings, LoopSettings, TaskloopConfig } from './config-schema.js'
import { CURRENT_CONFIG_FORMAT_VERSION } from './config-schema.js'

export const DEFAULT_LOOP_SETTINGS: LoopSettings = {
  max_iterations: 20,
  poll_interval_ms: 5_000,
  iteration_delay_ms: 2_000,
  max_consecutive_failures: 5,
  retry_delays_ms: [5_000, 15_000, 30_000, 60_000],
  completion_check: true,
}

export const DEFAULT_AGENT_SETTINGS: AgentSettings = {
  command: 'claude',
  args: ['-p', '--dangerously-skip-permissions', '--output-format', 'json'],
  // One hour
  timeout_ms: 3_600_000,
}

export const DEFAULT_GIT_SETTINGS: GitSettings = {
  branch_prefix: 'task/',
  slug_max_length: 30,
}

export const DEFAULT_CONFIG: TaskloopConfig = {
  config_format_version: CURRENT_CONFIG_FORMAT_VERSION,
  global: {},
  loop: DEFAULT_LOOP_SETTINGS,
  agent: DEFAULT_AGENT_SETTINGS,
  git: DEFAULT_GIT_SETTINGS,
}
