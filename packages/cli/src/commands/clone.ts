/**
 * Clone command - copy a remote repository.
 */

import { resolve } from 'node:path'

import type { Command } from 'commander'

import { Repository, defaultCloneDirectory } from '@gitcmd/git'

import { getRepositoryOptions, getRepositoryPath, handleCliError } from '../helpers.js'
import { formatPath, success, withSpinner } from '../ui.js'
import { parsePositiveInt } from './parsers.js'

interface CloneCliOptions {
  branch?: string
  origin?: string
  depth?: number
  bare?: boolean
}

/**
 * Destination of a clone: `dir` (or the name derived from the url)
 * resolved against the -C directory.
 */
export function cloneTarget(url: string, dir: string | undefined, base: string): string {
  return resolve(base, dir ?? defaultCloneDirectory(url))
}

export function registerCloneCommand(program: Command): void {
  program
    .command('clone')
    .description('Clone a repository into a new directory')
    .argument('<url>', 'Repository to clone')
    .argument('[dir]', 'Destination, relative to -C when given (default: derived from the url)')
    .option('-b, --branch <name>', 'Branch to check out')
    .option('-o, --origin <name>', 'Remote name instead of origin')
    .option('--depth <n>', 'Shallow clone with this many commits', parsePositiveInt)
    .option('--bare', 'Make a bare clone')
    .action(async (url: string, dir: string | undefined, options: CloneCliOptions, command: Command) => {
      try {
        const repositoryOptions = await getRepositoryOptions(command)
        const repo = await withSpinner(`Cloning ${url}`, () =>
          Repository.clone(url, cloneTarget(url, dir, getRepositoryPath(command)), repositoryOptions, {
            branch: options.branch,
            origin: options.origin,
            depth: options.depth,
            bare: options.bare,
          })
        )
        success(`Cloned into ${formatPath(repo.path)}`)
      } catch (error) {
        handleCliError(error)
      }
    })
}
