/**
 * Add command - stage changes.
 */

import type { Command } from 'commander'

import { AddCommand } from '@gitcmd/git'

import { handleCliError, openRepository } from '../helpers.js'

interface AddCliOptions {
  all?: boolean
  update?: boolean
  force?: boolean
}

export function registerAddCommand(program: Command): void {
  program
    .command('add')
    .description('Stage changes (everything when no paths are given)')
    .argument('[paths...]', 'Paths to stage')
    .option('-A, --all', 'Stage all changes, including deletions')
    .option('-u, --update', 'Stage changes to tracked files only')
    .option('-f, --force', 'Stage ignored files too')
    .action(async (paths: string[], options: AddCliOptions, command: Command) => {
      try {
        const repo = await openRepository(command)
        const everything = paths.length === 0 && !options.update
        await repo.run(
          new AddCommand({
            all: options.all || everything ? true : undefined,
            update: options.update,
            force: options.force,
            pathspecs: paths,
          })
        )
      } catch (error) {
        handleCliError(error)
      }
    })
}
