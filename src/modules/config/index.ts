/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, ConfigSystemImpl, ENV_VAR_MAP, readEnvOverrides } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  TaskloopConfigSchema,
  PartialTaskloopConfigSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
} from './config-schema.js'
export type {
  TaskloopConfig,
  PartialTaskloopConfig,
  AgentSettings,
  GitSettings,
  LoopSettings,
  GlobalSettings,
} from './config-schema.js'
export { DEFAULT_CONFIG } from './defaults.js'
export { resolveProjectPaths, STATE_DIR_NAME } from './project-paths.js'
export type { ProjectPaths } from './project-paths.js'
