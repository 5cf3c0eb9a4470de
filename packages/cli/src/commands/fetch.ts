/**
 * Fetch command - download refs from remotes.
 */

import type { Command } from 'commander'

import { FetchCommand } from '@gitcmd/git'

import { handleCliError, openRepository } from '../helpers.js'
import { success, withSpinner } from '../ui.js'

interface FetchCliOptions {
  all?: boolean
  prune?: boolean
  tags?: boolean
}

export function registerFetchCommand(program: Command): void {
  program
    .command('fetch')
    .description('Download objects and refs (all remotes when none is named)')
    .argument('[remote]', 'Remote to fetch from')
    .argument('[refspecs...]', 'Refspecs to fetch')
    .option('--all', 'Fetch every remote')
    .option('-p, --prune', 'Remove refs deleted on the remote')
    .option('-t, --tags', 'Fetch all tags')
    .action(async (remote: string | undefined, refspecs: string[], options: FetchCliOptions, command: Command) => {
      try {
        const repo = await openRepository(command)
        await withSpinner(`Fetching ${remote ?? 'all remotes'}`, () =>
          repo.run(
            new FetchCommand({
              all: options.all || remote === undefined,
              remote,
              refspecs,
              prune: options.prune,
              tags: options.tags,
            })
          )
        )
        success('Fetched')
      } catch (error) {
        handleCliError(error)
      }
    })
}
