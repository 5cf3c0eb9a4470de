/**
 * gitcmd config (config.toml) parser
 */

import { readFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { join } from 'node:path'
import TOML from '@iarna/toml'

import { ConfigParseError, ConfigValidationError } from '../errors.js'
import { validateConfigFile } from '../schemas/index.js'
import type { ConfigFile, GitcmdConfig } from '../types/config.js'

/** Default filename for the config file */
export const CONFIG_FILENAME = 'config.toml'

/** Default GITCMD_HOME location */
export const DEFAULT_GITCMD_HOME = join(homedir(), '.gitcmd')

/** Configuration used when no file is present */
export const DEFAULT_CONFIG: GitcmdConfig = {
  output: 'pipe',
  git: {
    binary: 'git',
    env: {},
  },
}

/**
 * Get the GITCMD_HOME directory path.
 * Uses GITCMD_HOME env var if set, otherwise defaults to ~/.gitcmd
 */
export function getGitcmdHome(): string {
  return process.env['GITCMD_HOME'] ?? DEFAULT_GITCMD_HOME
}

/**
 * Get the default config file path (GITCMD_HOME/config.toml).
 */
export function getConfigPath(): string {
  return join(getGitcmdHome(), CONFIG_FILENAME)
}

/**
 * Parse config.toml content into a validated ConfigFile
 *
 * @param content - Raw TOML string content
 * @param filePath - Path to the file (for error messages)
 * @throws ConfigParseError if TOML parsing fails
 * @throws ConfigValidationError if schema validation fails
 */
export function parseConfigToml(content: string, filePath?: string): ConfigFile {
  const source = filePath ?? CONFIG_FILENAME

  let parsed: unknown
  try {
    parsed = TOML.parse(content)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigParseError(`Failed to parse TOML: ${message}`, source)
  }

  const result = validateConfigFile(parsed)
  if (!result.valid) {
    throw new ConfigValidationError('Invalid config.toml', source, result.errors)
  }

  return result.data
}

/**
 * Read and parse a config.toml file from disk
 *
 * @returns Validated ConfigFile, or null when the file does not exist
 */
export async function readConfigToml(filePath: string): Promise<ConfigFile | null> {
  let content: string
  try {
    content = await readFile(filePath, 'utf8')
  } catch (err) {
    if ((err as NodeJS.ErrnoException | undefined)?.code === 'ENOENT') {
      return null
    }
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigParseError(`Failed to read file: ${message}`, filePath)
  }
  return parseConfigToml(content, filePath)
}

/**
 * Merge a parsed config file over the defaults.
 */
export function resolveConfig(file: ConfigFile | null, env: NodeJS.ProcessEnv = process.env): GitcmdConfig {
  const git = file?.git
  const config: GitcmdConfig = {
    output: file?.output ?? DEFAULT_CONFIG.output,
    git: {
      binary: env['GITCMD_GIT_BINARY'] || git?.binary || DEFAULT_CONFIG.git.binary,
      env: { ...DEFAULT_CONFIG.git.env, ...git?.env },
    },
  }
  if (git?.timeout !== undefined) {
    config.git.timeout = git.timeout
  }
  return config
}

/**
 * Load configuration from an explicit path, or GITCMD_HOME/config.toml.
 * A missing file yields the defaults.
 */
export async function loadConfig(filePath?: string): Promise<GitcmdConfig> {
  const file = await readConfigToml(filePath ?? getConfigPath())
  return resolveConfig(file)
}

/**
 * Serialize a ConfigFile to TOML string
 */
export function serializeConfigToml(config: ConfigFile): string {
  // Round-trip through JSON to drop undefined values, which TOML cannot encode
  const clean = JSON.parse(JSON.stringify(config))
  return TOML.stringify(clean)
}
