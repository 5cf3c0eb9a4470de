/**
 * @gitcmd/core - errors and configuration shared by every gitcmd package.
 */

export * from './errors.js'

export {
  CONFIG_FILENAME,
  DEFAULT_CONFIG,
  DEFAULT_GITCMD_HOME,
  getConfigPath,
  getGitcmdHome,
  loadConfig,
  parseConfigToml,
  readConfigToml,
  resolveConfig,
  serializeConfigToml,
} from './config/config-toml.js'

export {
  validateConfigFile,
  type ValidationError,
  type ValidationResult,
} from './schemas/index.js'

export type { ConfigFile, GitSection, GitcmdConfig, OutputMode } from './types/config.js'
