/**
 * Zod schemas for the taskloop configuration file.
 *
 * Snake-case keys mirror `.taskloop/config.yaml`. Every section is strict so a
 * misspelt key fails loudly instead of being ignored.
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Global settings
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const GlobalSettingsSchema = z
  .object({
    /** Unset means the logger's environment-based default */
    log_level: LogLevelSchema.optional(),
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

// ---------------------------------------------------------------------------
// Loop settings
// ---------------------------------------------------------------------------

export const LoopSettingsSchema = z
  .object({
    /** Agent invocations per task before it is treated as stuck */
    max_iterations: z.number().int().min(1),
    /** Sleep between idle polls in daemon mode */
    poll_interval_ms: z.number().int().min(0),
    /** Pause between iterations on the same task */
    iteration_delay_ms: z.number().int().min(0),
    /** Failed invocations in a row, across tasks, before the loop halts */
    max_consecutive_failures: z.number().int().min(1),
    /** Backoff before each retry of a transient failure */
    retry_delays_ms: z.array(z.number().int().min(0)),
    completion_check: z.boolean(),
  })
  .strict()

export type LoopSettings = z.infer<typeof LoopSettingsSchema>

// ---------------------------------------------------------------------------
// Agent settings
// ---------------------------------------------------------------------------

export const AgentSettingsSchema = z
  .object({
    command: z.string().min(1),
    args: z.array(z.string()),
    /** Ceiling for one invocation; the process is killed after it */
    timeout_ms: z.number().int().min(1),
  })
  .strict()

export type AgentSettings = z.infer<typeof AgentSettingsSchema>

// ---------------------------------------------------------------------------
// Git settings
// ---------------------------------------------------------------------------

export const GitSettingsSchema = z
  .object({
    /** Defaults to the branch checked out when the loop starts */
    base_branch: z.string().min(1).optional(),
    branch_prefix: z.string().min(1),
    slug_max_length: z.number().int().min(1),
  })
  .strict()

export type GitSettings = z.infer<typeof GitSettingsSchema>

// ---------------------------------------------------------------------------
// Top-level config
// ---------------------------------------------------------------------------

export const CURRENT_CONFIG_FORMAT_VERSION = '1'

export const SUPPORTED_CONFIG_FORMAT_VERSIONS: readonly string[] = ['1']

export const TaskloopConfigSchema = z
  .object({
    config_format_version: z.string().optional(),
    global: GlobalSettingsSchema,
    loop: LoopSettingsSchema,
    agent: AgentSettingsSchema,
    git: GitSettingsSchema,
  })
  .strict()

export type TaskloopConfig = z.infer<typeof TaskloopConfigSchema>

/** Shape accepted from the config file, environment and CLI overrides */
export const PartialTaskloopConfigSchema = TaskloopConfigSchema.deepPartial()

export type PartialTaskloopConfig = z.infer<typeof PartialTaskloopConfigSchema>
