/**
 * ConfigSystem implementation: loads configuration in hierarchy order.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → project config      (./.taskloop/config.yaml)
 *     → environment vars    (TASKLOOP_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import yaml from 'js-yaml'
import { ConfigError } from '../../core/errors.js'
import { isPlainObject } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import {
  PartialTaskloopConfigSchema,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
  TaskloopConfigSchema,
  type PartialTaskloopConfig,
  type TaskloopConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'

const logger = createLogger('config')

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    const current = result[key]
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val)
    } else if (val !== undefined) {
      result[key] = val
    }
  }
  return result
}

function formatIssues(issues: ReadonlyArray<{ path: (string | number)[]; message: string }>): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Map of TASKLOOP_ environment variable names to config paths.
 * Only overrides scalar values; does not support nested structures via env.
 */
export const ENV_VAR_MAP: Readonly<Record<string, string>> = {
  TASKLOOP_LOG_LEVEL: 'global.log_level',
  TASKLOOP_MAX_ITERATIONS: 'loop.max_iterations',
  TASKLOOP_POLL_INTERVAL_MS: 'loop.poll_interval_ms',
  TASKLOOP_AGENT_COMMAND: 'agent.command',
  TASKLOOP_AGENT_TIMEOUT_MS: 'agent.timeout_ms',
  TASKLOOP_BASE_BRANCH: 'git.base_branch',
}

function coerce(rawValue: string): unknown {
  if (rawValue === 'true') return true
  if (rawValue === 'false') return false
  if (/^\d+$/.test(rawValue)) return parseInt(rawValue, 10)
  if (/^\d*\.\d+$/.test(rawValue)) return parseFloat(rawValue)
  return rawValue
}

/** Nested object holding `value` at the dot-notation `path` */
function objectAtPath(path: string, value: unknown): Record<string, unknown> {
  const parts = path.split('.')
  let result: Record<string, unknown> = { [parts.pop() ?? '']: value }
  for (const part of parts.reverse()) {
    result = { [part]: result }
  }
  return result
}

/**
 * Read TASKLOOP_* variables into a partial config overlay. Each variable is
 * validated on its own; an invalid one is skipped with a warning.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): PartialTaskloopConfig {
  let overrides: Record<string, unknown> = {}

  for (const [envKey, configPath] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined || rawValue === '') continue

    const overlay = objectAtPath(configPath, coerce(rawValue))
    const parsed = PartialTaskloopConfigSchema.safeParse(overlay)
    if (!parsed.success) {
      logger.warn({ variable: envKey, value: rawValue, errors: parsed.error.issues }, 'Invalid environment override ignored')
      continue
    }
    overrides = deepMerge(overrides, overlay)
  }

  const parsed = PartialTaskloopConfigSchema.safeParse(overrides)
  return parsed.success ? parsed.data : {}
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor
// ---------------------------------------------------------------------------

function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: TaskloopConfig | null = null
  private readonly _projectConfigDir: string
  private readonly _cliOverrides: PartialTaskloopConfig
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions = {}) {
    this._projectConfigDir = options.projectConfigDir
      ? resolve(options.projectConfigDir)
      : resolve(process.cwd(), '.taskloop')
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  get configPath(): string {
    return join(this._projectConfigDir, 'config.yaml')
  }

  async load(): Promise<void> {
    // 1. Start with built-in defaults
    let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG)

    // 2. Apply project config if present
    const projectConfig = await this._loadYamlFile(this.configPath)
    if (projectConfig !== null) {
      merged = deepMerge(merged, projectConfig)
    }

    // 3. Apply environment variable overrides
    merged = deepMerge(merged, readEnvOverrides(this._env))

    // 4. Apply CLI flag overrides
    merged = deepMerge(merged, this._cliOverrides)

    // 5. Validate the merged config
    const result = TaskloopConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(`Configuration validation failed:\n${formatIssues(result.error.issues)}`, {
        issues: result.error.issues,
      })
    }

    this._config = result.data
    logger.debug('Configuration loaded successfully')
  }

  getConfig(): TaskloopConfig {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().', {})
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _loadYamlFile(filePath: string): Promise<PartialTaskloopConfig | null> {
    let raw: string
    try {
      raw = await readFile(filePath, 'utf-8')
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Failed to read config file at ${filePath}: ${message}`, { filePath })
    }

    let parsed: unknown
    try {
      parsed = yaml.load(raw)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Invalid YAML in config file at ${filePath}: ${message}`, { filePath })
    }
    if (parsed === null || parsed === undefined) return null

    const version = getByPath(parsed, 'config_format_version')
    if (typeof version === 'string' && !SUPPORTED_CONFIG_FORMAT_VERSIONS.includes(version)) {
      throw new ConfigError(
        `Unsupported config_format_version "${version}" in ${filePath} (supported: ${SUPPORTED_CONFIG_FORMAT_VERSIONS.join(', ')})`,
        { filePath, version },
      )
    }

    const result = PartialTaskloopConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(`Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`, {
        filePath,
        issues: result.error.issues,
      })
    }
    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem({ cliOverrides: { loop: { max_iterations: 5 } } })
 * await config.load()
 * const cfg = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
