/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, ConfigSystemImpl, CONFIG_FILE_NAME, ENV_VAR_MAP, expandHome, getByPath, readEnvOverrides } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export { GauntletConfigSchema, PartialGauntletConfigSchema, LogLevelSchema } from './config-schema.js'
export type { GauntletConfig, LogLevel, PartialGauntletConfig } from './config-schema.js'
export { DEFAULT_CONFIG, DEFAULT_CONFIG_DIR_NAME } from './defaults.js'
