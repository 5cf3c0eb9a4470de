/**
 * Shared CLI helper utilities.
 *
 * WHY: Every command opens a repository the same way (global -C, --config
 * and --verbose options) and reports failures the same way. Keeping both
 * here keeps the command modules down to argument mapping.
 */

import type { Command } from 'commander'

import { GitCommandError, GitNotFoundError, isConfigError, loadConfig } from '@gitcmd/core'
import { Repository, type RepositoryOptions } from '@gitcmd/git'

import { colors } from './ui.js'

/**
 * Options registered on the root program.
 */
export type GlobalOptions = {
  repo?: string | undefined
  config?: string | undefined
  verbose?: boolean | undefined
}

/**
 * Load configuration and wire --verbose to the git logger.
 */
export async function getRepositoryOptions(command: Command): Promise<RepositoryOptions> {
  const globals = command.optsWithGlobals<GlobalOptions>()
  const config = await loadConfig(globals.config)
  const logger = globals.verbose ? (line: string) => console.error(colors.dim(line)) : undefined
  return { config, logger }
}

/**
 * Directory given with -C/--repo, or the current directory.
 */
export function getRepositoryPath(command: Command): string {
  return command.optsWithGlobals<GlobalOptions>().repo ?? process.cwd()
}

/**
 * Open the repository a command operates on.
 */
export async function openRepository(command: Command): Promise<Repository> {
  return Repository.at(getRepositoryPath(command), await getRepositoryOptions(command))
}

/**
 * Format error for display.
 */
export function formatError(error: unknown): string {
  if (error instanceof GitCommandError) {
    const [headline = error.message] = error.message.split('\n')
    const lines = [colors.error(`Error: ${headline}`)]
    const detail = (error.stderr || error.stdout).trimEnd()
    for (const line of detail ? detail.split('\n') : []) {
      lines.push(colors.muted(`  ${line}`))
    }
    return lines.join('\n')
  }

  if (error instanceof GitNotFoundError) {
    return [
      colors.error(`Error: ${error.message}`),
      colors.muted('  Install git, or set [git] binary in config.toml or GITCMD_GIT_BINARY'),
    ].join('\n')
  }

  if (isConfigError(error)) {
    return [colors.error(`Error: ${error.message}`), colors.muted(`  in ${error.source}`)].join('\n')
  }

  if (error instanceof Error) {
    return colors.error(`Error: ${error.message}`)
  }

  return colors.error(`Error: ${String(error)}`)
}

/**
 * Handle CLI errors with consistent formatting.
 * Prints error message and exits with code 1.
 */
export function handleCliError(error: unknown): never {
  console.error(formatError(error))
  process.exit(1)
}
