/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, ConfigSystemImpl, CONFIG_DIR_NAME, CONFIG_FILE_NAME } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  RebasePilotConfigSchema,
  PartialRebasePilotConfigSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
} from './config-schema.js'
export type {
  RebasePilotConfig,
  PartialRebasePilotConfig,
  AgentRoleConfig,
  AgentsSettings,
  PromptSettings,
  RebaseSettings,
  LogLevelValue,
} from './config-schema.js'
export { DEFAULT_CONFIG } from './defaults.js'
