/**
 * Init command - create a repository.
 */

import type { Command } from 'commander'

import { Repository } from '@gitcmd/git'

import { getRepositoryOptions, getRepositoryPath, handleCliError } from '../helpers.js'
import { formatPath, success } from '../ui.js'

interface InitCliOptions {
  bare?: boolean
  initialBranch?: string
}

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Create a repository, making the directory if needed')
    .argument('[path]', 'Directory to initialize (default: -C path or current directory)')
    .option('--bare', 'Create a bare repository')
    .option('-b, --initial-branch <name>', 'Name of the first branch')
    .action(async (path: string | undefined, options: InitCliOptions, command: Command) => {
      try {
        const repo = await Repository.init(path ?? getRepositoryPath(command), await getRepositoryOptions(command), {
          bare: options.bare,
          initialBranch: options.initialBranch,
        })
        success(`Initialized repository in ${formatPath(repo.path)}`)
      } catch (error) {
        handleCliError(error)
      }
    })
}
