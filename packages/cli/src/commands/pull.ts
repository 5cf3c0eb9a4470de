/**
 * Pull command - fetch and integrate.
 */

import type { Command } from 'commander'

import { PullCommand } from '@gitcmd/git'

import { handleCliError, openRepository } from '../helpers.js'
import { success, withSpinner } from '../ui.js'

interface PullCliOptions {
  rebase?: boolean
  ffOnly?: boolean
  allowUnrelatedHistories?: boolean
}

export function registerPullCommand(program: Command): void {
  program
    .command('pull')
    .description('Fetch and integrate changes from the upstream branch')
    .argument('[remote]', 'Remote to pull from')
    .argument('[refspecs...]', 'Refspecs to pull')
    .option('-r, --rebase', 'Rebase instead of merging')
    .option('--ff-only', 'Refuse anything but a fast-forward')
    .option('--allow-unrelated-histories', 'Merge histories without a common ancestor')
    .action(async (remote: string | undefined, refspecs: string[], options: PullCliOptions, command: Command) => {
      try {
        const repo = await openRepository(command)
        await withSpinner('Pulling', () =>
          repo.run(
            new PullCommand({
              remote,
              refspecs,
              rebase: options.rebase,
              ffOnly: options.ffOnly,
              allowUnrelatedHistories: options.allowUnrelatedHistories,
            })
          )
        )
        success('Pulled')
      } catch (error) {
        handleCliError(error)
      }
    })
}
