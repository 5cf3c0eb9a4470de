/**
 * Push command - update remote refs.
 */

import type { Command } from 'commander'

import { PushCommand } from '@gitcmd/git'

import { handleCliError, openRepository } from '../helpers.js'
import { success, withSpinner } from '../ui.js'

interface PushCliOptions {
  all?: boolean
  tags?: boolean
  force?: boolean
  setUpstream?: boolean
}

export function registerPushCommand(program: Command): void {
  program
    .command('push')
    .description('Update remote refs')
    .argument('[remote]', 'Remote to push to')
    .argument('[refspecs...]', 'Refspecs to push')
    .option('--all', 'Push every branch')
    .option('--tags', 'Push every tag')
    .option('-f, --force', 'Overwrite remote refs')
    .option('-u, --set-upstream', 'Track the pushed branch')
    .action(async (remote: string | undefined, refspecs: string[], options: PushCliOptions, command: Command) => {
      try {
        const repo = await openRepository(command)
        await withSpinner(`Pushing${remote ? ` to ${remote}` : ''}`, () =>
          repo.run(
            new PushCommand({
              remote,
              refspecs,
              all: options.all,
              tags: options.tags,
              force: options.force,
              setUpstream: options.setUpstream,
            })
          )
        )
        success('Pushed')
      } catch (error) {
        handleCliError(error)
      }
    })
}
